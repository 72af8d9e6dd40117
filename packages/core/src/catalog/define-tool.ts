import { z } from "zod";
import {
  ToolDefinitionSchema,
  type Tool,
  type ToolOutcome,
  type ToolParameter,
} from "../interfaces/tool.js";

export interface ToolSpec<Shape extends z.ZodRawShape> {
  name: string;
  description: string;
  args: z.ZodObject<Shape>;
  handler: (args: z.output<z.ZodObject<Shape>>) => ToolOutcome;
}

/**
 * Builds a Tool whose declared parameter schema is derived from the
 * zod object that validates its arguments.
 *
 * Supported argument types: string, number (integer when `.int()`), boolean,
 * each optionally wrapped in `.optional()`. A `z.preprocess()` step is seen
 * through to the schema it feeds. A `.regex()` on a string becomes the declared
 * `pattern`.
 */
export function defineTool<Shape extends z.ZodRawShape>(spec: ToolSpec<Shape>): Tool {
  const definition = ToolDefinitionSchema.parse({
    name: spec.name,
    description: spec.description,
    parameters: describeParameters(spec.args.shape),
  });

  return {
    definition,
    execute(args: unknown): ToolOutcome {
      const parsed = spec.args.safeParse(args);
      if (!parsed.success) {
        return { status: "validation_error", error: formatIssues(parsed.error) };
      }
      return spec.handler(parsed.data);
    },
  };
}

export function describeParameters(shape: z.ZodRawShape): Record<string, ToolParameter> {
  const parameters: Record<string, ToolParameter> = {};

  for (const [key, field] of Object.entries(shape)) {
    let inner: z.ZodTypeAny = field;
    let required = true;
    if (inner instanceof z.ZodOptional) {
      required = false;
      inner = inner.unwrap();
    }
    if (inner instanceof z.ZodEffects) inner = inner.innerType();

    const pattern = inner instanceof z.ZodString ? regexSource(inner) : undefined;
    parameters[key] = {
      type: jsonType(key, inner),
      description: field.description ?? inner.description ?? "",
      required,
      ...(pattern !== undefined ? { pattern } : {}),
    };
  }

  return parameters;
}

function jsonType(key: string, schema: z.ZodTypeAny): ToolParameter["type"] {
  if (schema instanceof z.ZodString) return "string";
  if (schema instanceof z.ZodNumber) return schema.isInt ? "integer" : "number";
  if (schema instanceof z.ZodBoolean) return "boolean";
  throw new Error(`Unsupported type for tool parameter "${key}"`);
}

function regexSource(schema: z.ZodString): string | undefined {
  for (const check of schema._def.checks) {
    if (check.kind === "regex") return check.regex.source;
  }
  return undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.length > 0 ? i.path.join(".") : "arguments"}: ${i.message}`)
    .join("; ");
}
