/**
 * Agent Registry — builds and holds the immutable agent graph.
 *
 * Agents reference tools and handoff targets by name in configuration.
 * `buildAgentGraph` resolves those names into object references, reports
 * every dangling or duplicate reference at once, and freezes the result so
 * the same graph can back any number of concurrent runs.
 */

import { z } from 'zod';
import type { Agent, AgentDescriptor, AgentSpec, Tool, ToolDescriptor } from './agent-protocol.js';
import { ConfigurationError } from './errors.js';
import { ToolRegistry } from './tool-registry.js';
import { formatIssues } from '../../lib/validate.js';

const agentSpecSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  instructions: z.string().trim().min(1, 'instructions are required'),
  handoffDescription: z.string().optional(),
  tools: z.array(z.string()).optional(),
  handoffs: z.array(z.string()).optional(),
});

export interface AgentGraphConfig {
  tools: readonly Tool[] | ToolRegistry;
  agents: readonly AgentSpec[];
}

export class AgentGraph {
  private readonly agents: ReadonlyMap<string, Agent>;

  constructor(
    agents: ReadonlyMap<string, Agent>,
    readonly tools: ToolRegistry,
  ) {
    this.agents = agents;
  }

  /** Look up an agent by name. */
  get(name: string): Agent | undefined {
    return this.agents.get(name);
  }

  /** @throws ConfigurationError when no agent has this name */
  require(name: string): Agent {
    const agent = this.agents.get(name);
    if (!agent) {
      throw new ConfigurationError(`Unknown agent "${name}"`);
    }
    return agent;
  }

  /** Identity membership: true only for the exact object this graph built. */
  has(agent: Agent): boolean {
    return this.agents.get(agent.name) === agent;
  }

  list(): Agent[] {
    return [...this.agents.values()];
  }

  get size(): number {
    return this.agents.size;
  }

  describe(name: string): AgentDescriptor | undefined {
    const agent = this.agents.get(name);
    return agent ? describeAgent(agent) : undefined;
  }

  /** Descriptors of the tools an agent may call, in declaration order. */
  toolDescriptors(agent: Agent): ToolDescriptor[] {
    const descriptors: ToolDescriptor[] = [];
    for (const tool of agent.tools) {
      const descriptor = this.tools.describe(tool.name);
      if (descriptor) descriptors.push(descriptor);
    }
    return descriptors;
  }
}

export function describeAgent(agent: Agent): AgentDescriptor {
  return {
    name: agent.name,
    description: agent.handoffDescription ?? '',
  };
}

const HANDOFF_TOOL_PREFIX = 'transfer_to_';

/** `Stock Agent` → `transfer_to_stock_agent`, the tool name a handoff is offered under. */
export function handoffToolName(agentName: string): string {
  const slug = agentName
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return `${HANDOFF_TOOL_PREFIX}${slug}`.slice(0, 64);
}

function findDuplicates(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) dupes.add(name);
    seen.add(name);
  }
  return [...dupes];
}

/**
 * Validate agent specifications against the tool set and each other, then
 * build the frozen graph.
 *
 * @throws ConfigurationError listing every problem found
 */
export function buildAgentGraph(config: AgentGraphConfig): AgentGraph {
  const registry = config.tools instanceof ToolRegistry ? config.tools : new ToolRegistry(config.tools);
  const issues: string[] = [];
  const specs: AgentSpec[] = [];

  config.agents.forEach((raw, index) => {
    const parsed = agentSpecSchema.safeParse(raw);
    if (!parsed.success) {
      const label = typeof raw?.name === 'string' && raw.name ? raw.name : `#${index}`;
      for (const line of formatIssues(parsed.error.issues)) {
        issues.push(`agent ${label}: ${line}`);
      }
      return;
    }
    specs.push(parsed.data);
  });

  for (const name of findDuplicates(specs.map(s => s.name))) {
    issues.push(`duplicate agent name "${name}"`);
  }

  const agentNames = new Set(specs.map(s => s.name));
  for (const spec of specs) {
    const toolNames = spec.tools ?? [];
    const handoffNames = spec.handoffs ?? [];
    for (const name of findDuplicates(toolNames)) {
      issues.push(`agent ${spec.name}: tool "${name}" listed more than once`);
    }
    for (const name of findDuplicates(handoffNames)) {
      issues.push(`agent ${spec.name}: handoff "${name}" listed more than once`);
    }
    for (const name of toolNames) {
      if (!registry.has(name)) {
        issues.push(`agent ${spec.name}: unknown tool "${name}"`);
      }
    }
    for (const name of handoffNames) {
      if (!agentNames.has(name)) {
        issues.push(`agent ${spec.name}: unknown handoff target "${name}"`);
      }
    }

    // Every handoff is offered to the model as a tool; those names must stay unique.
    const handoffByToolName = new Map<string, string>();
    for (const name of new Set(handoffNames)) {
      const toolName = handoffToolName(name);
      if (toolName === HANDOFF_TOOL_PREFIX) {
        issues.push(`agent ${spec.name}: handoff "${name}" has no usable transfer tool name`);
        continue;
      }
      const earlier = handoffByToolName.get(toolName);
      if (earlier !== undefined) {
        issues.push(`agent ${spec.name}: handoffs "${earlier}" and "${name}" share transfer tool "${toolName}"`);
        continue;
      }
      handoffByToolName.set(toolName, name);
    }
    for (const name of new Set(toolNames)) {
      const target = handoffByToolName.get(name);
      if (target !== undefined) {
        issues.push(`agent ${spec.name}: tool "${name}" clashes with the transfer tool for handoff "${target}"`);
      }
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid agent configuration', issues);
  }

  // Two passes so handoff cycles can be expressed as plain references:
  // create every agent first, then fill in handoff lists and freeze.
  const handoffLists = new Map<string, Agent[]>();
  const agents = new Map<string, Agent>();
  for (const spec of specs) {
    const handoffs: Agent[] = [];
    const tools: Tool[] = [];
    for (const name of spec.tools ?? []) {
      const tool = registry.get(name);
      if (tool) tools.push(tool);
    }
    handoffLists.set(spec.name, handoffs);
    agents.set(spec.name, {
      name: spec.name,
      instructions: spec.instructions,
      ...(spec.handoffDescription !== undefined && { handoffDescription: spec.handoffDescription }),
      tools: Object.freeze(tools),
      handoffs,
    });
  }

  for (const spec of specs) {
    const handoffs = handoffLists.get(spec.name) ?? [];
    for (const name of spec.handoffs ?? []) {
      const target = agents.get(name);
      if (target) handoffs.push(target);
    }
    Object.freeze(handoffs);
  }
  for (const agent of agents.values()) {
    Object.freeze(agent);
  }

  return new AgentGraph(agents, registry);
}
