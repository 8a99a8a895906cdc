/**
 * Action journal API: claims, restakes, skips and failures, newest first.
 */

import { Router } from "express";
import type { ActionJournal } from "../../stake-manager/src/journal.ts";
import { redactSecrets } from "../secrets.ts";

export function actionsRouter(journal: ActionJournal): Router {
  const router = Router();

  /** GET /api/actions?limit=50 */
  router.get("/", (req, res) => {
    const limit = Math.min(200, Math.max(1, Number(req.query.limit) || 50));
    try {
      res.json(journal.recent(limit));
    } catch (e) {
      res.status(500).json({ error: redactSecrets(e instanceof Error ? e.message : String(e)) });
    }
  });

  return router;
}
