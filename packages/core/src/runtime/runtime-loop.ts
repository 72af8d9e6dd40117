import { randomUUID } from "node:crypto";
import type { AgentConfig } from "../interfaces/agent-config.js";
import type { AgentEvent } from "../interfaces/agent-event.js";
import type { IncomingTurn } from "../interfaces/message.js";
import {
  GatewayEventSchema,
  type GatewayEvent,
  type ModelGateway,
  type ModelRequest,
} from "../interfaces/model-gateway.js";
import type { ToolCall } from "../interfaces/tool.js";
import type { ToolCatalog } from "../catalog/tool-catalog.js";
import type { PolicyFilter } from "../policy/policy-filter.js";
import { ToolDispatcher, serializeOutcome } from "../dispatch/tool-dispatcher.js";
import { AgentLoopError, GatewayFailure, InvalidHistory, LoopLimitExceeded } from "../errors.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import { RuntimeState, type RuntimePhase, type RuntimeSnapshot } from "./runtime-state.js";

export interface AgentLoopOptions {
  gateway: ModelGateway;
  catalog: ToolCatalog;
  policy: PolicyFilter;
  agentConfig: AgentConfig;
  /** Correlates log lines of one request. Generated when omitted. */
  requestId?: string | undefined;
  logger?: Logger | undefined;
  /** Called on each phase transition for observability */
  onPhaseChange?: ((phase: RuntimePhase) => void) | undefined;
}

export const UNABLE_TO_COMPLETE_MESSAGE =
  "I'm sorry, I wasn't able to complete this request. Please try rephrasing your question.\n\n" +
  "מצטער, לא הצלחתי להשלים את הבקשה. נסה לנסח את השאלה מחדש.";

export const GATEWAY_ERROR_MESSAGE =
  "Something went wrong while contacting the assistant. Please try again.";

/**
 * AgentLoop drives one chat request:
 *
 *   start → policy_check → blocked
 *                        → model_turn ⇄ tool_exec
 *                          model_turn → done
 *
 * with `failed` and `limit_exceeded` as abnormal terminals. Events come out
 * of `run()` in the order they happen and the last one is always `done`,
 * unless the caller cancelled, in which case the stream just ends.
 *
 * Instances are single-use.
 */
export class AgentLoop {
  private readonly state: RuntimeState;
  private readonly dispatcher: ToolDispatcher;
  private readonly options: AgentLoopOptions;
  private readonly log: Logger;
  private started = false;

  constructor(options: AgentLoopOptions) {
    const requestId = options.requestId ?? randomUUID();
    this.state = new RuntimeState(requestId, options.agentConfig.id);
    this.dispatcher = new ToolDispatcher(options.catalog);
    this.options = options;
    this.log = (options.logger ?? rootLogger).child({ module: "agent-loop", requestId });
  }

  get snapshot(): RuntimeSnapshot {
    return this.state.snapshot;
  }

  async *run(
    history: readonly IncomingTurn[],
    signal?: AbortSignal
  ): AsyncGenerator<AgentEvent, void, undefined> {
    if (this.started) {
      throw new Error("AgentLoop.run() may only be called once per instance");
    }
    this.started = true;
    const startMs = Date.now();

    try {
      yield* this.drive(history, signal);
    } catch (err) {
      if (signal?.aborted) {
        this.transition("cancelled");
        this.log.info({ round: this.state.snapshot.round }, "request cancelled by caller");
        return;
      }

      if (err instanceof LoopLimitExceeded) {
        this.transition("limit_exceeded");
        this.log.warn({ rounds: err.rounds }, err.message);
        yield { type: "text_delta", text: UNABLE_TO_COMPLETE_MESSAGE };
        yield { type: "done", reason: "limit_exceeded" };
        return;
      }

      this.transition("failed");
      if (err instanceof GatewayFailure) {
        this.log.error({ err, kind: err.kind }, "model gateway failure");
        yield { type: "error", code: err.code, message: GATEWAY_ERROR_MESSAGE };
      } else if (err instanceof InvalidHistory) {
        this.log.warn(err.message);
        yield { type: "error", code: err.code, message: err.message };
      } else {
        this.log.error({ err }, "agent loop failed");
        yield { type: "error", code: "internal_error", message: GATEWAY_ERROR_MESSAGE };
      }
      yield { type: "done", reason: "failed" };
    } finally {
      this.log.debug(
        { phase: this.state.snapshot.phase, rounds: this.state.snapshot.round, durationMs: Date.now() - startMs },
        "request finished"
      );
      this.state.release();
    }
  }

  private async *drive(
    history: readonly IncomingTurn[],
    signal: AbortSignal | undefined
  ): AsyncGenerator<AgentEvent, void, undefined> {
    const latest = history.at(-1);
    if (latest?.role !== "user") {
      throw new InvalidHistory("The conversation must end with a user message");
    }
    for (const turn of history) {
      this.state.appendTurn({ role: turn.role, content: turn.content });
    }

    // [policy_check]
    this.transition("policy_check");
    const decision = this.options.policy.evaluate(latest.content);
    if (!decision.allowed) {
      this.transition("blocked");
      this.log.info({ category: decision.category, language: decision.language }, "request blocked by policy");
      yield { type: "text_delta", text: decision.reason };
      yield { type: "done", reason: "blocked" };
      return;
    }

    const { maxRounds } = this.options.agentConfig;

    while (true) {
      signal?.throwIfAborted();
      if (this.state.snapshot.round >= maxRounds) {
        throw new LoopLimitExceeded(maxRounds);
      }
      this.state.advanceRound();

      // [model_turn]
      this.transition("model_turn");
      const turn = yield* this.modelTurn(signal);

      if (turn.calls.length === 0) {
        this.state.appendTurn({ role: "assistant", content: turn.text });
        this.transition("done");
        yield { type: "done", reason: "completed" };
        return;
      }

      // [tool_exec]
      this.transition("tool_exec");
      this.state.appendTurn({ role: "assistant", content: turn.text, toolCalls: turn.calls });
      for (const call of turn.calls) {
        this.state.recordToolCall(call.id);
      }

      const results = this.dispatcher.dispatch(turn.calls);
      for (const result of results) {
        this.state.recordToolResult(result);
        this.state.appendTurn({
          role: "tool",
          content: serializeOutcome(result.outcome),
          toolCallId: result.toolCallId,
        });
        this.log.debug(
          { tool: result.name, status: result.outcome.status, durationMs: result.durationMs },
          "tool executed"
        );
        yield {
          type: "tool_call",
          id: result.toolCallId,
          name: result.name,
          input: result.input,
          output: result.outcome,
        };
      }
    }
  }

  /**
   * One model round-trip. Text deltas are forwarded as they arrive; tool
   * calls are collected and returned once the gateway reports the turn
   * complete.
   */
  private async *modelTurn(
    signal: AbortSignal | undefined
  ): AsyncGenerator<AgentEvent, { text: string; calls: ToolCall[] }, undefined> {
    const controller = new AbortController();
    const onCallerAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    // The timeout budget only counts time spent waiting on the gateway, not
    // time the consumer holds the generator suspended at a yield.
    let timedOut = false;
    let waitedMs = 0;
    const { gatewayTimeoutMs } = this.options.agentConfig;

    const calls: ToolCall[] = [];
    let text = "";
    let iterator: AsyncIterator<GatewayEvent> | undefined;

    try {
      iterator = this.options.gateway
        .stream(this.buildRequest(controller.signal))
        [Symbol.asyncIterator]();

      while (true) {
        let step: IteratorResult<GatewayEvent>;
        const waitStart = Date.now();
        const timer = setTimeout(() => {
          timedOut = true;
          controller.abort(new Error(`Model call exceeded ${gatewayTimeoutMs}ms`));
        }, Math.max(gatewayTimeoutMs - waitedMs, 0));
        try {
          step = await raceAbort(iterator.next(), controller.signal);
        } catch (err) {
          throw classifyFailure(err, timedOut, signal);
        } finally {
          clearTimeout(timer);
          waitedMs += Date.now() - waitStart;
        }

        if (step.done) {
          throw new GatewayFailure("malformed", "Model stream ended without completing the turn");
        }

        const parsed = GatewayEventSchema.safeParse(step.value);
        if (!parsed.success) {
          throw new GatewayFailure("malformed", `Malformed gateway event: ${parsed.error.message}`);
        }
        const event = parsed.data;

        switch (event.type) {
          case "text_delta":
            if (event.text.length === 0) break;
            text += event.text;
            yield { type: "text_delta", text: event.text };
            break;

          case "tool_call":
            if (calls.some((c) => c.id === event.call.id)) {
              throw new GatewayFailure("malformed", `Duplicate tool call id "${event.call.id}"`);
            }
            calls.push(event.call);
            break;

          case "error":
            throw new GatewayFailure("provider", `${event.code}: ${event.message}`);

          case "turn_complete":
            this.log.debug({ stopReason: event.stopReason, toolCalls: calls.length }, "model turn complete");
            return { text, calls };
        }
      }
    } finally {
      signal?.removeEventListener("abort", onCallerAbort);
      controller.abort();
      void iterator?.return?.().catch((err: unknown) => {
        this.log.debug({ err }, "gateway stream did not close cleanly");
      });
    }
  }

  private buildRequest(signal: AbortSignal): ModelRequest {
    const config = this.options.agentConfig;
    return {
      model: config.model,
      systemPrompt: config.systemPrompt,
      messages: this.state.snapshot.messages,
      tools: this.options.catalog.definitions(),
      maxTokens: config.maxTokens,
      temperature: config.temperature,
      signal,
    };
  }

  private transition(phase: RuntimePhase): void {
    this.state.setPhase(phase);
    this.options.onPhaseChange?.(phase);
  }
}

/** Settles with `promise`, or rejects as soon as `signal` aborts. */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

function classifyFailure(
  err: unknown,
  timedOut: boolean,
  callerSignal: AbortSignal | undefined
): unknown {
  // caller cancellation propagates as-is; run() recognises it by the signal
  if (callerSignal?.aborted) return err;
  if (err instanceof AgentLoopError) return err;
  if (timedOut) {
    return new GatewayFailure("timeout", "Model call timed out", { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new GatewayFailure("network", message, { cause: err });
}
