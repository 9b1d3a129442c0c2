import { z } from "zod";
import type { ToolParameter } from "../interfaces/tool.js";

type ParameterShape = Omit<ToolParameter, "description" | "required">;

/**
 * Derives the model-facing parameter declarations from a tool's zod argument
 * schema. Optional, nullable and defaulted fields are declared not required;
 * `.describe()` text becomes the parameter description.
 */
export function describeArguments(
  schema: z.AnyZodObject
): Record<string, ToolParameter> {
  const shape: Record<string, z.ZodTypeAny> = schema.shape;
  return Object.fromEntries(
    Object.entries(shape).map(([key, field]) => [key, describeField(key, field)])
  );
}

function describeField(key: string, field: z.ZodTypeAny): ToolParameter {
  let inner = field;
  let required = true;

  while (
    inner instanceof z.ZodOptional ||
    inner instanceof z.ZodNullable ||
    inner instanceof z.ZodDefault
  ) {
    required = false;
    inner = inner instanceof z.ZodDefault ? inner.removeDefault() : inner.unwrap();
  }

  return {
    ...describeType(key, inner),
    description: field.description ?? inner.description ?? "",
    required,
  };
}

function describeType(key: string, field: z.ZodTypeAny): ParameterShape {
  if (field instanceof z.ZodString) {
    return { type: "string" };
  }
  if (field instanceof z.ZodNumber) {
    return { type: field.isInt ? "integer" : "number" };
  }
  if (field instanceof z.ZodBoolean) {
    return { type: "boolean" };
  }
  if (field instanceof z.ZodEnum) {
    const options: readonly string[] = field.options;
    return { type: "string", enum: [...options] };
  }
  if (field instanceof z.ZodArray) {
    return { type: "array", items: describeField(`${key}[]`, field.element) };
  }
  if (field instanceof z.ZodObject) {
    return { type: "object" };
  }
  throw new TypeError(`Unsupported argument type for '${key}'`);
}
