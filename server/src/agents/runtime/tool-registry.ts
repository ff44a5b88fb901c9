/**
 * Tool Registry — name → tool lookup plus the metadata the model sees.
 *
 * Holds no per-run state. Tool definitions are checked once at
 * construction; argument schemas are derived from each tool's declared
 * parameters and reused for every call.
 */

import { z } from 'zod';
import type {
  ParameterType,
  Tool,
  ToolArguments,
  ToolDescriptor,
  ToolInputSchema,
  ToolParameter,
  ToolParameters,
} from './agent-protocol.js';
import { ConfigurationError } from './errors.js';
import { formatIssues } from '../../lib/validate.js';

/** Names the model providers accept for tools */
export const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

const parameterTypeSchema = z.enum(['string', 'number', 'boolean']);

const toolDefinitionSchema = z.object({
  name: z.string().regex(TOOL_NAME_PATTERN, 'must be 1-64 letters, digits, "_" or "-"'),
  description: z.string().trim().min(1, 'description is required'),
  parameters: z.record(
    z.union([
      parameterTypeSchema,
      z.object({
        type: parameterTypeSchema,
        description: z.string().optional(),
        optional: z.boolean().optional(),
      }),
    ]),
  ),
  invoke: z.function(),
});

type ArgumentValue = string | number | boolean | undefined;

function normalizeParameter(param: ParameterType | ToolParameter): ToolParameter {
  return typeof param === 'string' ? { type: param } : param;
}

function fieldSchema(type: ParameterType): z.ZodType<string | number | boolean> {
  switch (type) {
    case 'string':
      return z.string();
    case 'number':
      return z.number().finite();
    case 'boolean':
      return z.boolean();
  }
}

function buildArgumentSchema(parameters: ToolParameters) {
  const shape: Record<string, z.ZodType<ArgumentValue>> = {};
  for (const [field, raw] of Object.entries(parameters)) {
    const param = normalizeParameter(raw);
    const base = fieldSchema(param.type);
    shape[field] = param.optional ? base.optional() : base;
  }
  return z.object(shape).strict();
}

type ArgumentSchema = ReturnType<typeof buildArgumentSchema>;

function buildInputSchema(parameters: ToolParameters): ToolInputSchema {
  const properties: ToolInputSchema['properties'] = {};
  const required: string[] = [];
  for (const [field, raw] of Object.entries(parameters)) {
    const param = normalizeParameter(raw);
    properties[field] = param.description
      ? { type: param.type, description: param.description }
      : { type: param.type };
    if (!param.optional) required.push(field);
  }
  return { type: 'object', properties, required, additionalProperties: false };
}

export type ArgumentCheck =
  | { ok: true; args: ToolArguments }
  | { ok: false; message: string };

interface RegisteredTool {
  tool: Tool;
  descriptor: ToolDescriptor;
  argumentSchema: ArgumentSchema;
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  /** @throws ConfigurationError on an invalid definition or duplicate name */
  constructor(tools: readonly Tool[]) {
    const issues: string[] = [];

    tools.forEach((tool, index) => {
      const parsed = toolDefinitionSchema.safeParse(tool);
      if (!parsed.success) {
        const label = typeof tool?.name === 'string' && tool.name ? tool.name : `#${index}`;
        for (const line of formatIssues(parsed.error.issues)) {
          issues.push(`tool ${label}: ${line}`);
        }
        return;
      }
      if (this.tools.has(tool.name)) {
        issues.push(`duplicate tool name "${tool.name}"`);
        return;
      }
      this.tools.set(tool.name, {
        tool,
        descriptor: {
          name: tool.name,
          description: tool.description,
          parameters: buildInputSchema(tool.parameters),
        },
        argumentSchema: buildArgumentSchema(tool.parameters),
      });
    });

    if (issues.length > 0) {
      throw new ConfigurationError('Invalid tool configuration', issues);
    }
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name)?.tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): Tool[] {
    return [...this.tools.values()].map(entry => entry.tool);
  }

  get size(): number {
    return this.tools.size;
  }

  /** Name, description and JSON Schema, as offered to the model. */
  describe(name: string): ToolDescriptor | undefined {
    return this.tools.get(name)?.descriptor;
  }

  /**
   * Check model-supplied arguments against the tool's parameters.
   * Unknown fields and wrong primitive types are rejected.
   */
  checkArguments(name: string, args: Record<string, unknown>): ArgumentCheck {
    const entry = this.tools.get(name);
    if (!entry) {
      return { ok: false, message: `Unknown tool: ${name}` };
    }
    const parsed = entry.argumentSchema.safeParse(args);
    if (!parsed.success) {
      return {
        ok: false,
        message: `Invalid arguments for ${name}: ${formatIssues(parsed.error.issues).join('; ')}`,
      };
    }
    const clean: Record<string, string | number | boolean> = {};
    for (const [field, value] of Object.entries(parsed.data)) {
      if (value !== undefined) clean[field] = value;
    }
    return { ok: true, args: clean };
  }
}

/**
 * Declare a tool. Returns a frozen definition so it can be shared by every
 * agent and run that references it.
 */
export function defineTool(definition: Tool): Tool {
  return Object.freeze({
    name: definition.name,
    description: definition.description,
    parameters: Object.freeze({ ...definition.parameters }),
    invoke: definition.invoke,
  });
}
