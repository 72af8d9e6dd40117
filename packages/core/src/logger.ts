import pino from "pino";

export type Logger = pino.Logger;

export const logger = pino({
  name: "pharmacy-agent",
  level: process.env.LOG_LEVEL ?? "info",
});
