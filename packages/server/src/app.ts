import { randomUUID } from "node:crypto";
import { fileURLToPath } from "node:url";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import {
  IncomingTurnSchema,
  logger as rootLogger,
  type AgentEvent,
  type IncomingTurn,
  type Logger,
} from "@pharmacy-agent/core";
import { SseEmitter } from "./stream-emitter.js";

/** The chat page served at `/`. */
export const DEFAULT_PUBLIC_DIR = fileURLToPath(new URL("../public/", import.meta.url));

/** One request's worth of agent work; AgentLoop satisfies it. */
export interface ChatRun {
  run(history: readonly IncomingTurn[], signal?: AbortSignal): AsyncIterable<AgentEvent>;
}

export type LoopFactory = (requestId: string) => ChatRun;

export interface AppOptions {
  createLoop: LoopFactory;
  /** Value of Access-Control-Allow-Origin. Defaults to `*`. */
  corsOrigin?: string | undefined;
  /** Directory of static files; `false` serves none. */
  publicDir?: string | false | undefined;
  logger?: Logger | undefined;
}

export const ChatRequestSchema = z.object({
  messages: z
    .array(IncomingTurnSchema)
    .min(1, "messages must contain at least one turn")
    .refine((turns) => turns[turns.length - 1]?.role === "user", {
      message: "the last message must come from the user",
    }),
});
export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export function createApp(options: AppOptions): Express {
  const log = (options.logger ?? rootLogger).child({ module: "http" });
  const corsOrigin = options.corsOrigin ?? "*";
  const publicDir = options.publicDir ?? DEFAULT_PUBLIC_DIR;

  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "256kb" }));

  app.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", corsOrigin);
    if (corsOrigin !== "*") res.setHeader("Vary", "Origin");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/chat", async (req, res) => {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues[0]?.message ?? "invalid request body" });
      return;
    }

    const { messages } = parsed.data;
    const requestId = randomUUID();
    const reqLog = log.child({ requestId });

    let loop: ChatRun;
    try {
      loop = options.createLoop(requestId);
    } catch (err) {
      reqLog.error({ err }, "could not create agent loop");
      res.status(500).json({ error: "internal server error" });
      return;
    }

    reqLog.info({ turns: messages.length }, "chat request");

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.flushHeaders();

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        reqLog.info("client disconnected");
        controller.abort();
      }
    });

    const emitter = new SseEmitter(res);
    try {
      for await (const event of loop.run(messages, controller.signal)) {
        if (!(await emitter.send(event))) {
          controller.abort();
          break;
        }
      }
    } catch (err) {
      reqLog.error({ err }, "chat stream error");
      await emitter.write({ type: "error", content: "internal server error" });
      await emitter.write({ type: "done", reason: "failed" });
    } finally {
      emitter.end();
    }
  });

  if (publicDir !== false) {
    app.use(express.static(publicDir));
  }

  app.use((_req, res) => {
    res.status(404).json({ error: "not found" });
  });

  // express recognises error handlers by their four parameters
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "request body is not valid JSON" });
      return;
    }
    log.error({ err }, "unhandled request error");
    res.status(500).json({ error: "internal server error" });
  });

  return app;
}
