import { z } from "zod";

export const ToolParameterTypeSchema = z.enum([
  "string",
  "integer",
  "number",
  "boolean",
  "array",
  "object",
]);
export type ToolParameterType = z.infer<typeof ToolParameterTypeSchema>;

export interface ToolParameter {
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum?: string[] | undefined;
  items?: ToolParameter | undefined;
}

export const ToolParameterSchema: z.ZodType<ToolParameter> = z.object({
  type: ToolParameterTypeSchema,
  description: z.string(),
  required: z.boolean(),
  enum: z.array(z.string()).optional(),
  items: z.lazy(() => ToolParameterSchema).optional(),
});

export const ToolNameSchema = z.string().regex(/^[a-z][a-z0-9_-]*$/);

// What the model is told about a tool. Derived from the tool's argument schema.
export const ToolDeclarationSchema = z.object({
  name: ToolNameSchema,
  description: z.string().min(1),
  parameters: z.record(ToolParameterSchema),
});
export type ToolDeclaration = z.infer<typeof ToolDeclarationSchema>;

export const ToolInvocationSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  // serialized JSON exactly as the model emitted it
  arguments: z.string(),
});
export type ToolInvocation = z.infer<typeof ToolInvocationSchema>;

export const CitationSchema = z.object({
  text: z.string(),
  url: z.string().optional(),
});
export type Citation = z.infer<typeof CitationSchema>;

export interface ToolOutcome {
  content: string;
  citations: Citation[];
}

/**
 * A capability the model may invoke. Arguments are declared once, as a zod
 * object schema; the registry validates against it and derives the
 * declaration sent to the model from it.
 */
export interface Tool<S extends z.AnyZodObject = z.AnyZodObject> {
  readonly name: string;
  readonly description: string;
  readonly arguments: S;
  execute(args: z.infer<S>): Promise<ToolOutcome>;
}

/** The slice of the registry the generation loop depends on. */
export interface ToolExecutor {
  execute(name: string, rawArguments: string): Promise<ToolOutcome>;
}
