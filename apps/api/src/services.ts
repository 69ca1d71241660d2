import type { FastifyBaseLogger } from "fastify";
import type { ProviderFactory } from "./ai/provider.js";
import { createOpenAiProviderFactory } from "./ai/openaiProvider.js";
import type { AgentRegistry } from "./agents/registry.js";
import { createDefaultAgentRegistry } from "./agents/registry.js";
import type { AppConfig } from "./config.js";
import { CreditLedger } from "./credits/creditLedger.js";
import { createDb } from "./db.js";
import { JobOrchestrator } from "./jobs/jobOrchestrator.js";
import { createMemoryStore } from "./store/memoryStore.js";
import { createSupabaseStore } from "./store/supabaseStore.js";
import type { Store } from "./store/types.js";

// ─── Contenedor de servicios (uno por proceso) ─────────────────────

export interface Services {
  config: AppConfig;
  store: Store;
  providerFactory: ProviderFactory;
  registry: AgentRegistry;
  ledger: CreditLedger;
  orchestrator: JobOrchestrator;
}

export interface ServiceOverrides {
  store?: Store;
  providerFactory?: ProviderFactory;
  registry?: AgentRegistry;
}

function createStore(config: AppConfig, logger: FastifyBaseLogger): Store {
  const db = createDb(config);
  if (db) return createSupabaseStore(db);
  logger.warn("SUPABASE_URL/SUPABASE_SERVICE_ROLE_KEY not set, using in-memory store");
  return createMemoryStore();
}

export function createServices(
  config: AppConfig,
  logger: FastifyBaseLogger,
  overrides: ServiceOverrides = {},
): Services {
  const store = overrides.store ?? createStore(config, logger);
  const providerFactory =
    overrides.providerFactory ??
    createOpenAiProviderFactory({
      apiKey: config.OPENAI_API_KEY,
      model: config.OPENAI_MODEL,
      baseUrl: config.OPENAI_BASE_URL,
      timeoutMs: config.AGENT_TIMEOUT_MS,
    });
  const registry = overrides.registry ?? createDefaultAgentRegistry();
  const ledger = new CreditLedger(store, logger.child({ component: "credits" }));

  const secrets = [config.OPENAI_API_KEY, config.SUPABASE_SERVICE_ROLE_KEY, config.API_TOKEN].filter(
    (value): value is string => value !== undefined,
  );

  const orchestrator = new JobOrchestrator(
    store,
    ledger,
    registry,
    providerFactory,
    logger.child({ component: "jobs" }),
    {
      maxTokens: config.AGENT_MAX_TOKENS,
      timeoutMs: config.AGENT_TIMEOUT_MS,
      maxErrors: config.JOB_MAX_ERRORS,
      secrets,
    },
  );

  return { config, store, providerFactory, registry, ledger, orchestrator };
}
