/**
 * Agent Catalog — the chat service's agent graph.
 *
 *   Triage Agent ──▶ Stock Agent   (get_stock_data)
 *        └────────▶ Spanish Agent
 */

import { buildAgentGraph, type AgentGraph } from './runtime/agent-registry.js';
import { createStockDataTool } from './stock/tools.js';
import { stockAgentSpec } from './stock/agent.js';
import { spanishAgentSpec } from './spanish/agent.js';
import { triageAgentSpec, TRIAGE_AGENT_NAME } from './triage/agent.js';
import type { QuoteSource } from '../lib/market-data.js';

export const DEFAULT_START_AGENT = TRIAGE_AGENT_NAME;

export interface CatalogDeps {
  quoteSource: QuoteSource;
}

export function createAgentCatalog(deps: CatalogDeps): AgentGraph {
  return buildAgentGraph({
    tools: [createStockDataTool(deps.quoteSource)],
    agents: [triageAgentSpec, stockAgentSpec, spanishAgentSpec],
  });
}
