import Anthropic from "@anthropic-ai/sdk";
import type {
  ConversationTurn,
  GatewayEvent,
  ModelGateway,
  ModelRequest,
  ToolDefinition,
} from "@pharmacy-agent/core";
import { httpErrorCode, toInputSchema } from "../shared/tool-schema.js";

export interface AnthropicGatewayConfig {
  apiKey: string;
  defaultModel: string;
}

type StopReason = Extract<GatewayEvent, { type: "turn_complete" }>["stopReason"];

export class AnthropicGateway implements ModelGateway {
  readonly providerId = "anthropic";

  private readonly client: Anthropic;
  private readonly defaultModel: string;

  constructor(config: AnthropicGatewayConfig) {
    this.client = new Anthropic({ apiKey: config.apiKey });
    this.defaultModel = config.defaultModel;
  }

  async *stream(request: ModelRequest): AsyncGenerator<GatewayEvent, void, undefined> {
    const { systemMessages, conversation } = this.splitMessages(request.messages);
    const systemText = [request.systemPrompt, ...systemMessages]
      .filter((s): s is string => s !== undefined && s !== "")
      .join("\n\n");
    const tools = request.tools.length > 0 ? this.convertTools(request.tools) : undefined;

    // tool_use blocks arrive as a start event, JSON fragments, then a stop
    const openToolBlocks = new Map<number, { id: string; name: string; json: string }>();
    let stopReason: StopReason = "end_turn";

    try {
      const stream = this.client.messages.stream(
        {
          model: request.model || this.defaultModel,
          max_tokens: request.maxTokens,
          ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
          ...(systemText !== "" ? { system: systemText } : {}),
          messages: conversation,
          ...(tools !== undefined ? { tools } : {}),
        },
        { signal: request.signal }
      );

      for await (const event of stream) {
        switch (event.type) {
          case "content_block_start":
            if (event.content_block.type === "tool_use") {
              openToolBlocks.set(event.index, {
                id: event.content_block.id,
                name: event.content_block.name,
                json: "",
              });
            }
            break;

          case "content_block_delta":
            if (event.delta.type === "text_delta") {
              if (event.delta.text) yield { type: "text_delta", text: event.delta.text };
            } else if (event.delta.type === "input_json_delta") {
              const block = openToolBlocks.get(event.index);
              if (block) block.json += event.delta.partial_json;
            }
            break;

          case "content_block_stop": {
            const block = openToolBlocks.get(event.index);
            if (block) {
              openToolBlocks.delete(event.index);
              yield {
                type: "tool_call",
                call: { id: block.id, name: block.name, arguments: block.json || "{}" },
              };
            }
            break;
          }

          case "message_delta":
            if (event.delta.stop_reason) stopReason = mapStopReason(event.delta.stop_reason);
            break;

          case "message_stop":
            yield { type: "turn_complete", stopReason };
            return;

          default:
            break;
        }
      }
    } catch (error) {
      yield this.normalizeError(error);
      return;
    }

    yield {
      type: "error",
      code: "incomplete_stream",
      message: "Stream ended before message_stop",
    };
  }

  /**
   * Tool results become `tool_result` blocks in a user message. Consecutive
   * tool turns share one message, since the API expects every result of a
   * round in the user turn that follows it.
   */
  private splitMessages(messages: readonly ConversationTurn[]): {
    systemMessages: string[];
    conversation: Anthropic.MessageParam[];
  } {
    const systemMessages: string[] = [];
    const conversation: Anthropic.MessageParam[] = [];
    let pendingResults: Anthropic.ToolResultBlockParam[] | undefined;

    for (const msg of messages) {
      if (msg.role === "tool") {
        const block: Anthropic.ToolResultBlockParam = {
          type: "tool_result",
          tool_use_id: msg.toolCallId ?? "",
          content: msg.content,
        };
        if (pendingResults) {
          pendingResults.push(block);
        } else {
          pendingResults = [block];
          conversation.push({ role: "user", content: pendingResults });
        }
        continue;
      }
      pendingResults = undefined;

      if (msg.role === "system") {
        systemMessages.push(msg.content);
      } else if (msg.role === "assistant" && msg.toolCalls && msg.toolCalls.length > 0) {
        const content: Array<Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam> = [];
        if (msg.content !== "") content.push({ type: "text", text: msg.content });
        for (const call of msg.toolCalls) {
          content.push({ type: "tool_use", id: call.id, name: call.name, input: parseInput(call.arguments) });
        }
        conversation.push({ role: "assistant", content });
      } else {
        conversation.push({ role: msg.role, content: msg.content });
      }
    }

    return { systemMessages, conversation };
  }

  private convertTools(tools: readonly ToolDefinition[]): Anthropic.Tool[] {
    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: toInputSchema(tool),
    }));
  }

  private normalizeError(error: unknown): GatewayEvent {
    if (error instanceof Anthropic.APIError) {
      return {
        type: "error",
        code: httpErrorCode(error.status),
        message: error.message,
      };
    }
    return {
      type: "error",
      code: "unknown",
      message: error instanceof Error ? error.message : String(error),
    };
  }
}

function mapStopReason(reason: string): StopReason {
  switch (reason) {
    case "tool_use":
      return "tool_use";
    case "max_tokens":
      return "max_tokens";
    case "stop_sequence":
      return "stop_sequence";
    default:
      return "end_turn";
  }
}

function parseInput(raw: string): Record<string, unknown> {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return {};
  }
  return value !== null && typeof value === "object" && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}
