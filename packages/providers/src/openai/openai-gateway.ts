import OpenAI from "openai";
import type {
  ConversationTurn,
  GatewayEvent,
  ModelGateway,
  ModelRequest,
  ToolDefinition,
} from "@pharmacy-agent/core";
import { httpErrorCode, toInputSchema } from "../shared/tool-schema.js";

export interface OpenAIGatewayConfig {
  apiKey: string;
  defaultModel: string;
  baseURL?: string | undefined;
}

type StopReason = Extract<GatewayEvent, { type: "turn_complete" }>["stopReason"];

export class OpenAIGateway implements ModelGateway {
  readonly providerId = "openai";

  private readonly client: OpenAI;
  private readonly defaultModel: string;

  constructor(config: OpenAIGatewayConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      ...(config.baseURL ? { baseURL: config.baseURL } : {}),
    });
    this.defaultModel = config.defaultModel;
  }

  async *stream(request: ModelRequest): AsyncGenerator<GatewayEvent, void, undefined> {
    const tools = request.tools.length > 0 ? this.convertTools(request.tools) : undefined;
    const toolCallAccumulator = new Map<number, { id: string; name: string; arguments: string }>();
    let finishReason: string | null = null;

    try {
      const stream = await this.client.chat.completions.create(
        {
          model: request.model || this.defaultModel,
          max_tokens: request.maxTokens,
          ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
          messages: this.convertMessages(request.messages, request.systemPrompt),
          ...(tools !== undefined ? { tools, tool_choice: "auto" as const } : {}),
          stream: true,
        },
        { signal: request.signal }
      );

      for await (const chunk of stream) {
        const choice = chunk.choices[0];
        if (!choice) continue;

        const delta = choice.delta;

        if (delta.content) {
          yield { type: "text_delta", text: delta.content };
        }

        if (delta.tool_calls) {
          for (const tc of delta.tool_calls) {
            const existing = toolCallAccumulator.get(tc.index);
            if (existing) {
              existing.arguments += tc.function?.arguments ?? "";
            } else {
              toolCallAccumulator.set(tc.index, {
                id: tc.id ?? "",
                name: tc.function?.name ?? "",
                arguments: tc.function?.arguments ?? "",
              });
            }
          }
        }

        if (choice.finish_reason) {
          finishReason = choice.finish_reason;
        }
      }
    } catch (error) {
      yield this.normalizeError(error);
      return;
    }

    if (finishReason === null) {
      yield {
        type: "error",
        code: "incomplete_stream",
        message: "Stream ended without a finish reason",
      };
      return;
    }

    const ordered = [...toolCallAccumulator.entries()].sort(([a], [b]) => a - b);
    for (const [, call] of ordered) {
      yield { type: "tool_call", call };
    }
    yield { type: "turn_complete", stopReason: mapFinishReason(finishReason) };
  }

  private convertMessages(
    messages: readonly ConversationTurn[],
    systemPrompt?: string
  ): OpenAI.ChatCompletionMessageParam[] {
    const result: OpenAI.ChatCompletionMessageParam[] = [];

    if (systemPrompt) {
      result.push({ role: "system", content: systemPrompt });
    }

    for (const msg of messages) {
      if (msg.role === "system") {
        result.push({ role: "system", content: msg.content });
      } else if (msg.role === "user") {
        result.push({ role: "user", content: msg.content });
      } else if (msg.role === "assistant") {
        if (msg.toolCalls && msg.toolCalls.length > 0) {
          result.push({
            role: "assistant",
            content: msg.content === "" ? null : msg.content,
            tool_calls: msg.toolCalls.map((call) => ({
              id: call.id,
              type: "function" as const,
              function: { name: call.name, arguments: call.arguments },
            })),
          });
        } else {
          result.push({ role: "assistant", content: msg.content });
        }
      } else {
        result.push({
          role: "tool",
          tool_call_id: msg.toolCallId ?? "",
          content: msg.content,
        });
      }
    }

    return result;
  }

  private convertTools(tools: readonly ToolDefinition[]): OpenAI.ChatCompletionTool[] {
    return tools.map((tool) => ({
      type: "function" as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: toInputSchema(tool),
      },
    }));
  }

  private normalizeError(error: unknown): GatewayEvent {
    if (error instanceof OpenAI.APIError) {
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

function mapFinishReason(reason: string): StopReason {
  switch (reason) {
    case "tool_calls":
    case "function_call":
      return "tool_use";
    case "length":
      return "max_tokens";
    default:
      return "end_turn";
  }
}
