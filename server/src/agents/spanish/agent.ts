import type { AgentSpec } from '../runtime/agent-protocol.js';
import { SPANISH_AGENT_INSTRUCTIONS } from './prompts.js';

export const SPANISH_AGENT_NAME = 'Spanish Agent';

/** Conversational agent that only answers in Spanish. No tools. */
export const spanishAgentSpec: AgentSpec = {
  name: SPANISH_AGENT_NAME,
  instructions: SPANISH_AGENT_INSTRUCTIONS,
  handoffDescription: 'Holds conversations in Spanish.',
};
