import type { ToolParameter } from "@course-rag/core";

// Type aliases, not interfaces: SDK schema slots are index-signature records
export type JsonSchemaProperty = {
  type: ToolParameter["type"];
  description: string;
  enum?: string[];
  items?: JsonSchemaProperty;
};

export type ObjectJsonSchema = {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
};

/**
 * Renders tool parameter declarations as the JSON Schema object both
 * providers expect for function/tool input.
 */
export function toObjectSchema(
  parameters: Record<string, ToolParameter>
): ObjectJsonSchema {
  return {
    type: "object",
    properties: Object.fromEntries(
      Object.entries(parameters).map(([key, param]) => [key, toProperty(param)])
    ),
    required: Object.entries(parameters)
      .filter(([, param]) => param.required)
      .map(([key]) => key),
  };
}

function toProperty(param: ToolParameter): JsonSchemaProperty {
  return {
    type: param.type,
    description: param.description,
    ...(param.enum ? { enum: param.enum } : {}),
    ...(param.items ? { items: toProperty(param.items) } : {}),
  };
}
