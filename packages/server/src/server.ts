import type { Server } from "node:http";
import type { Express } from "express";
import { logger as rootLogger, type Logger } from "@pharmacy-agent/core";

export interface ListenOptions {
  port: number;
  host: string;
  logger?: Logger | undefined;
}

/** Starts listening and resolves once the port is bound. */
export function listen(app: Express, options: ListenOptions): Promise<Server> {
  const log = (options.logger ?? rootLogger).child({ module: "server" });
  return new Promise((resolve, reject) => {
    const server = app.listen(options.port, options.host);
    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      log.info({ port: options.port, host: options.host }, "listening");
      resolve(server);
    });
  });
}

export function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}
