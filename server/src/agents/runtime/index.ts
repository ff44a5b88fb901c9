/**
 * Agent Runtime — Public API
 */

export { Runner, type RunnerConfig, type RunOptions, DEFAULT_MAX_STEPS } from './runner.js';
export { TurnExecutor, type ToolErrorMode, type ExecutorStatus } from './turn-executor.js';
export { AgentGraph, buildAgentGraph, describeAgent, handoffToolName, type AgentGraphConfig } from './agent-registry.js';
export { ToolRegistry, defineTool, type ArgumentCheck } from './tool-registry.js';
export { LlmGateway, renderHistory, type RenderOptions, type LlmGatewayConfig } from './llm-gateway.js';
export {
  ConfigurationError,
  ExecutionError,
  GatewayError,
  RunCancelledError,
  ToolError,
  type CancelReason,
  type ExecutionErrorKind,
} from './errors.js';
export type {
  Agent,
  AgentDescriptor,
  AgentSpec,
  Decision,
  DecisionRequest,
  ModelGateway,
  ParameterType,
  RunEvent,
  RunEventListener,
  RunResult,
  Tool,
  ToolArguments,
  ToolContext,
  ToolDescriptor,
  ToolInputSchema,
  ToolParameter,
  ToolParameters,
  TurnEntry,
  TurnRole,
} from './agent-protocol.js';
