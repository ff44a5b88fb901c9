/**
 * Stock Agent — Configuration
 *
 * Answers stock-price questions with the get_stock_data tool. Has no
 * handoffs: once triage routes a request here, this agent finishes it.
 */

import type { AgentSpec } from '../runtime/agent-protocol.js';
import { STOCK_AGENT_INSTRUCTIONS } from './prompts.js';
import { STOCK_DATA_TOOL_NAME } from './tools.js';

export const STOCK_AGENT_NAME = 'Stock Agent';

export const stockAgentSpec: AgentSpec = {
  name: STOCK_AGENT_NAME,
  instructions: STOCK_AGENT_INSTRUCTIONS,
  handoffDescription: 'Looks up stock prices and company market data for ticker symbols.',
  tools: [STOCK_DATA_TOOL_NAME],
};
