/**
 * Structured output ("tool call") helpers
 */

import Ajv, { ValidateFunction } from "ajv";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { SchemaViolationError, ValidationError } from "../errors";
import { LanguageModelRequest } from "../types";
import type { LanguageModel } from "./languageModel";

export type JsonSchema = Record<string, unknown>;

export interface LanguageModelTool<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  schema: S;
}

const ajv = new Ajv({ allErrors: true, strict: false });
const compiled = new WeakMap<JsonSchema, ValidateFunction>();

/**
 * Check a backend's tool output against the JSON Schema the caller supplied.
 */
export function validateToolOutput(toolName: string, schema: JsonSchema, value: unknown): unknown {
  const validate = compileSchema(toolName, schema);

  if (!validate(value)) {
    const issues = (validate.errors ?? []).map((error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`);
    throw new SchemaViolationError(toolName, issues);
  }
  return value;
}

function compileSchema(toolName: string, schema: JsonSchema): ValidateFunction {
  const cached = compiled.get(schema);
  if (cached) return cached;

  let validate: ValidateFunction;
  try {
    validate = ajv.compile(schema);
  } catch (error) {
    throw new ValidationError(
      `invalid JSON Schema for tool ${toolName}: ${error instanceof Error ? error.message : String(error)}`,
      { toolName }
    );
  }
  compiled.set(schema, validate);
  return validate;
}

/**
 * Non-generic entry point to zod-to-json-schema; its generic signature
 * instantiates too deeply when checked against an arbitrary zod schema.
 */
function convertZodSchema(schema: z.ZodTypeAny): unknown {
  return zodToJsonSchema(schema, { $refStrategy: "none" });
}

export function toolJsonSchema(schema: z.ZodTypeAny): JsonSchema {
  const generated = z.record(z.unknown()).parse(convertZodSchema(schema));
  delete generated.$schema;
  return generated;
}

/**
 * Ask `model` for output shaped like `tool.schema` and parse it into the
 * schema's type.
 */
export async function useTool<S extends z.ZodTypeAny>(
  model: LanguageModel,
  request: LanguageModelRequest,
  tool: LanguageModelTool<S>,
  options: { signal?: AbortSignal } = {}
): Promise<z.output<S>> {
  const response = await model.useAnyTool(request, tool.name, tool.description, toolJsonSchema(tool.schema), options);

  const parsed = tool.schema.safeParse(response);
  if (!parsed.success) {
    throw new SchemaViolationError(
      tool.name,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "/"}: ${issue.message}`)
    );
  }
  return parsed.data;
}
