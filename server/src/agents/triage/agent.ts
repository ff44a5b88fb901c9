/**
 * Triage Agent — Configuration
 *
 * Entry point for every chat turn. Routes stock questions to the Stock
 * Agent and Spanish conversation to the Spanish Agent; otherwise asks the
 * user to clarify.
 */

import type { AgentSpec } from '../runtime/agent-protocol.js';
import { TRIAGE_AGENT_INSTRUCTIONS } from './prompts.js';
import { STOCK_AGENT_NAME } from '../stock/agent.js';
import { SPANISH_AGENT_NAME } from '../spanish/agent.js';

export const TRIAGE_AGENT_NAME = 'Triage Agent';

export const triageAgentSpec: AgentSpec = {
  name: TRIAGE_AGENT_NAME,
  instructions: TRIAGE_AGENT_INSTRUCTIONS,
  handoffs: [STOCK_AGENT_NAME, SPANISH_AGENT_NAME],
};
