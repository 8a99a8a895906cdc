/**
 * Read-only state API: the dashboard's view of the controller.
 */

import { Router } from "express";
import type { StateStore } from "../../stake-manager/src/state.ts";
import { minutesUntilNextEpoch } from "../../stake-manager/src/epoch.ts";

export function stateRouter(store: StateStore, bufferBlocks: number): Router {
  const router = Router();

  /** GET /api/state: snapshot, epoch ETA, status log */
  router.get("/state", (_req, res) => {
    const { state, logEntries } = store.snapshot();
    res.json({
      state,
      minutesUntilNextEpoch: minutesUntilNextEpoch(state.blockHeight, bufferBlocks),
      logEntries,
    });
  });

  /** GET /api/logs: status log entries, oldest first */
  router.get("/logs", (_req, res) => {
    res.json(store.logEntries());
  });

  return router;
}
