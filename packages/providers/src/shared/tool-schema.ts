import type { ToolDefinition, ToolParameter } from "@pharmacy-agent/core";

// type aliases, not interfaces: the SDK parameter types carry index signatures
export type JsonSchemaProperty = {
  type: ToolParameter["type"];
  description: string;
  pattern?: string;
};

export type ToolInputSchema = {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
};

/** JSON Schema object describing a tool's arguments, as both providers take it. */
export function toInputSchema(tool: ToolDefinition): ToolInputSchema {
  const entries = Object.entries(tool.parameters);
  return {
    type: "object",
    properties: Object.fromEntries(
      entries.map(([key, param]) => [
        key,
        {
          type: param.type,
          description: param.description,
          ...(param.pattern !== undefined ? { pattern: param.pattern } : {}),
        },
      ])
    ),
    required: entries.filter(([, param]) => param.required).map(([key]) => key),
  };
}

/** Provider error codes as carried by gateway `error` events. */
export function httpErrorCode(status: number | undefined): string {
  return status === undefined ? "connection_error" : `http_${status}`;
}
