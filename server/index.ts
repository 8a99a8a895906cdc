/**
 * Dashboard listener, started in-process by the controller when a port is configured.
 */

import type { Server } from "http";
import type { Logger } from "../stake-manager/src/log.ts";
import { createApp, type DashboardDeps } from "./app.ts";

export interface DashboardHandle {
  close(): Promise<void>;
}

export function startDashboard(
  deps: DashboardDeps,
  host: string,
  port: number,
  log: Logger,
): Promise<DashboardHandle> {
  const app = createApp(deps);
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(port, host, () => {
      log.info(`Dashboard: http://${host === "0.0.0.0" ? "localhost" : host}:${port}`);
      resolve({
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
    server.once("error", reject);
  });
}
