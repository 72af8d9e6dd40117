import type { ToolCall, ToolOutcome, ToolResult } from "../interfaces/tool.js";
import type { ToolCatalog } from "../catalog/tool-catalog.js";

/**
 * ToolDispatcher executes the tool calls of one model round.
 *
 * - Calls run in the order received, one result per call, each carrying the
 *   call's correlation id.
 * - Failures are data: unknown tool names, unparseable argument JSON and
 *   invalid arguments all produce a `validation_error` outcome, and never
 *   stop the remaining calls.
 * - Tools are synchronous lookups; nothing here suspends.
 */
export class ToolDispatcher {
  private readonly catalog: ToolCatalog;

  constructor(catalog: ToolCatalog) {
    this.catalog = catalog;
  }

  dispatch(calls: readonly ToolCall[]): ToolResult[] {
    return calls.map((call) => this.executeOne(call));
  }

  executeOne(call: ToolCall): ToolResult {
    const startMs = Date.now();
    const finish = (input: unknown, outcome: ToolOutcome): ToolResult => ({
      toolCallId: call.id,
      name: call.name,
      input,
      outcome,
      durationMs: Date.now() - startMs,
    });

    const parsed = parseArguments(call.arguments);
    if (!parsed.ok) {
      return finish(call.arguments, {
        status: "validation_error",
        error: "Arguments are not valid JSON",
      });
    }

    const tool = this.catalog.get(call.name);
    if (!tool) {
      return finish(parsed.value, {
        status: "validation_error",
        error: `Unknown tool: ${call.name}`,
      });
    }

    return finish(parsed.value, tool.execute(parsed.value));
  }
}

function parseArguments(raw: string): { ok: true; value: unknown } | { ok: false } {
  // some models send an empty string for "no arguments"
  if (raw.trim() === "") return { ok: true, value: {} };
  try {
    return { ok: true, value: JSON.parse(raw) as unknown };
  } catch {
    return { ok: false };
  }
}

/** What the model (and the client's tool_call frame) sees of an outcome. */
export function outcomePayload(outcome: ToolOutcome): unknown {
  if (outcome.status === "ok") {
    return outcome.data;
  }
  return { error: outcome.error, code: outcome.status };
}

/** The text placed in the tool-role turn the model reads. */
export function serializeOutcome(outcome: ToolOutcome): string {
  return JSON.stringify(outcomePayload(outcome));
}
