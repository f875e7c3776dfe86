// src/services/pipeline-deps.ts — shared research dependencies for the HTTP routes and shutdown
import { getConfig } from '@/config/accessors';
import { SessionHistory } from '@/memory/sessionHistory';
import { getModelCache } from '@/models/modelCache';
import { AxiosHttpClient } from '@/services/http/httpClient';
import { ResearchOrchestrator, type OrchestratorDeps } from '@/services/orchestrator';
import { createRetrieverFactory } from '@/services/retrieval/retrievalPipeline';
import { createSearchProvider } from '@/services/search';

let cachedDeps: OrchestratorDeps | null = null;
let cachedOrchestrator: ResearchOrchestrator | null = null;

/**
 * Returns the process-wide dependencies: one model cache, one search provider,
 * one HTTP client and one history. Retrieval state (robots cache, politeness,
 * concurrency cap) is created per run by the retriever factory.
 */
export function getPipelineDeps(): OrchestratorDeps {
  if (cachedDeps) return cachedDeps;

  const config = getConfig();
  const http = new AxiosHttpClient({ maxBytes: config.fetch.maxBytes });

  cachedDeps = {
    models: getModelCache(config.model),
    createRetriever: createRetrieverFactory({
      search: createSearchProvider(config.search, config.fetch.timeoutMs),
      http,
      topK: config.search.topK,
      fetch: config.fetch,
      safety: config.safety,
    }),
    history: new SessionHistory(config.research.historyMaxEntries),
    research: config.research,
    model: config.model,
  };
  return cachedDeps;
}

export function getOrchestrator(): ResearchOrchestrator {
  if (!cachedOrchestrator) cachedOrchestrator = new ResearchOrchestrator(getPipelineDeps());
  return cachedOrchestrator;
}
