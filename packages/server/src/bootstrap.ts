import {
  GenerationLoop,
  RagSystem,
  SessionStore,
  ToolRegistry,
  disabledLogger,
  type LLMAdapter,
  type Logger,
} from "@course-rag/core";
import { createAdapter } from "@course-rag/providers";
import {
  CourseOutlineTool,
  CourseSearchTool,
  InMemoryVectorStore,
  loadCourseCatalog,
  type VectorStore,
} from "@course-rag/search";
import type { AppConfig } from "./config/app-config.js";

export interface RagDependencies {
  logger?: Logger | undefined;
  /** Overrides the provider adapter built from the config */
  adapter?: LLMAdapter | undefined;
  /** Overrides the in-memory store loaded from `config.catalogPath` */
  store?: VectorStore | undefined;
}

export interface RagRuntime {
  rag: RagSystem;
  store: VectorStore;
  tools: ToolRegistry;
}

/**
 * Wires the course store, both course tools, the session store and the
 * generation loop into a RagSystem.
 */
export async function createRagSystem(
  config: AppConfig,
  deps: RagDependencies = {}
): Promise<RagRuntime> {
  const logger = deps.logger ?? disabledLogger();

  const store =
    deps.store ??
    new InMemoryVectorStore({
      catalog: await loadCourseCatalog(config.catalogPath),
      maxResults: config.maxResults,
      logger: logger.child({ component: "store" }),
    });

  const tools = new ToolRegistry({
    timeoutMs: config.toolTimeoutMs,
    logger: logger.child({ component: "tools" }),
  });
  tools.register(new CourseSearchTool(store));
  tools.register(new CourseOutlineTool(store));

  const adapter =
    deps.adapter ??
    createAdapter(
      config.provider === "anthropic"
        ? { provider: "anthropic", apiKey: config.apiKey, defaultModel: config.model }
        : {
            provider: "openai",
            apiKey: config.apiKey,
            defaultModel: config.model,
            baseURL: config.baseURL,
          }
    );

  const loop = new GenerationLoop({
    adapter,
    model: config.model,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    logger: logger.child({ component: "loop" }),
  });

  const rag = new RagSystem({
    loop,
    tools,
    sessions: new SessionStore({ maxExchanges: config.maxHistory }),
    analytics: store,
    logger: logger.child({ component: "rag" }),
  });

  logger.info(
    { provider: adapter.providerId, model: config.model, tools: tools.size },
    "rag system ready"
  );

  return { rag, store, tools };
}
