import { z } from "zod";
import { readFile, access } from "node:fs/promises";
import { resolve } from "node:path";
import matter from "gray-matter";

export const CONFIG_FILE_NAME = "course-rag.config.yaml";

export const ProviderSchema = z.enum(["openai", "anthropic"]);

const DEFAULT_MODELS: Record<z.infer<typeof ProviderSchema>, string> = {
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-haiku-20241022",
};

const API_KEY_ENV: Record<z.infer<typeof ProviderSchema>, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
};

const ConfigFields = z.object({
  provider: ProviderSchema.default("openai"),
  apiKey: z
    .string({ required_error: "API key is required (set OPENAI_API_KEY or ANTHROPIC_API_KEY)" })
    .min(1),
  model: z.string().min(1).optional(),
  baseURL: z.string().url().optional(),
  maxTokens: z.coerce.number().int().positive().default(800),
  temperature: z.coerce.number().min(0).max(2).default(0),
  maxHistory: z.coerce.number().int().nonnegative().default(2),
  maxResults: z.coerce.number().int().positive().default(5),
  toolTimeoutMs: z.coerce.number().int().positive().default(30_000),
  catalogPath: z.string().min(1).default("data/courses.json"),
  port: z.coerce.number().int().min(0).max(65_535).default(8000),
  host: z.string().min(1).default("0.0.0.0"),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

// Secrets stay out of the file
const FileConfigSchema = ConfigFields.omit({ apiKey: true }).partial().strict();

export const AppConfigSchema = ConfigFields.transform((config) => ({
  ...config,
  model: config.model ?? DEFAULT_MODELS[config.provider],
}));
export type AppConfig = z.infer<typeof AppConfigSchema>;

const ENV_KEYS = {
  provider: "LLM_PROVIDER",
  model: "LLM_MODEL",
  baseURL: "LLM_BASE_URL",
  maxTokens: "MAX_TOKENS",
  temperature: "TEMPERATURE",
  maxHistory: "MAX_HISTORY",
  maxResults: "MAX_RESULTS",
  toolTimeoutMs: "TOOL_TIMEOUT_MS",
  catalogPath: "CATALOG_PATH",
  port: "PORT",
  host: "HOST",
  logLevel: "LOG_LEVEL",
} as const;

export interface LoadConfigOptions {
  projectRoot: string;
  env?: Record<string, string | undefined>;
}

/**
 * Resolves the runtime configuration: defaults, then the optional
 * course-rag.config.yaml at the project root, then environment variables.
 * `catalogPath` comes back absolute, resolved against the project root.
 *
 * Throws listing every issue when the result does not validate.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const fileConfig = await readConfigFile(options.projectRoot);

  const raw: Record<string, unknown> = { ...fileConfig, ...readEnv(env) };
  const provider = ProviderSchema.safeParse(raw["provider"] ?? "openai");
  if (provider.success) {
    const apiKey = env[API_KEY_ENV[provider.data]];
    if (apiKey) raw["apiKey"] = apiKey;
  }

  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return {
    ...result.data,
    catalogPath: resolve(options.projectRoot, result.data.catalogPath),
  };
}

function readEnv(env: Record<string, string | undefined>): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== "") values[key] = value;
  }
  return values;
}

async function readConfigFile(
  projectRoot: string
): Promise<z.infer<typeof FileConfigSchema>> {
  const configPath = resolve(projectRoot, CONFIG_FILE_NAME);

  try {
    await access(configPath);
  } catch {
    // the file is optional
    return {};
  }

  const content = await readFile(configPath, "utf-8");

  let raw: unknown;
  try {
    // gray-matter parses a bare YAML document when it is wrapped as front matter
    raw = matter(`---\n${content}\n---`).data;
  } catch (err) {
    throw new Error(
      `Failed to parse ${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = FileConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid ${CONFIG_FILE_NAME}: ${issues}`);
  }

  return result.data;
}
