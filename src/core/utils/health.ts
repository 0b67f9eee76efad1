/**
 * Health check endpoint
 */

import http from "http";
import { Logger } from "./logger";

/**
 * Serves `GET /healthz` → `ok` on the given port. Port 0 disables it.
 * A failure to listen is logged; the monitor keeps running without it.
 */
export function startHealthServer(port: number): http.Server | null {
  if (!port) return null;
  const server = http.createServer((req, res) => {
    if (req.url === "/healthz") {
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end("ok");
    } else {
      res.writeHead(404);
      res.end();
    }
  });
  server.on("error", (e) => {
    Logger.error(`Health check server failed`, e, { port });
  });
  server.listen(port, () => {
    Logger.info("Health check endpoint listening on /healthz", { port });
  });
  return server;
}
