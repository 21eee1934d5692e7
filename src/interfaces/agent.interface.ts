/**
 * ReAct control loop interfaces
 */

import type { NormalizedRecord } from './mapping.interface';
import type { PlanResult } from './query.interface';
import type { QueryFilters, ToolInvocationResult, ToolOperation } from './tool.interface';

export enum LoopState {
  REASONING = 'reasoning',
  ACTING = 'acting',
  OBSERVING = 'observing',
  DONE = 'done',
  FAILED = 'failed',
}

/**
 * Action requested by the reasoning model
 */
export type AgentAction =
  | { type: 'plan'; query?: string }
  | { type: 'tool'; tool: string; operation: ToolOperation; filters: QueryFilters };

interface ToolCallMeta {
  callId: string;
  /** Function the model called */
  functionName: string;
  /** Arguments exactly as the model sent them */
  rawArguments: string;
  thought?: string;
}

export type AgentDecision =
  | (ToolCallMeta & { type: 'action'; action: AgentAction })
  | (ToolCallMeta & { type: 'invalid_action'; reason: string })
  | { type: 'final'; answer: string };

export interface Observation {
  /** Tool call id the observation answers */
  callId: string;
  /** Name of the function the model called */
  functionName: string;
  /** JSON arguments the model sent */
  arguments: string;
  thought?: string;
  results: ToolInvocationResult<NormalizedRecord>[];
  /** Set when the action could not be executed at all */
  error?: string;
}

export interface ReasoningRequest {
  query: string;
  plan: PlanResult;
  contextSummary: string;
  observations: Observation[];
  /** Registered tools with aliases and supported operations */
  toolCatalog: ToolCatalogEntry[];
}

export interface ToolCatalogEntry {
  name: string;
  aliases: readonly string[];
  operations: ToolOperation[];
}

/**
 * Anything that can take a reasoning step. LlmClientService is the production
 * implementation; tests supply scripted fakes.
 */
export interface ReasoningProvider {
  reason(request: ReasoningRequest): Promise<AgentDecision>;
}

export type FailureKind =
  | 'ReasoningExhausted'
  | 'PlanningAmbiguous'
  | 'LlmError'
  | 'EmptyAnswer'
  | 'NotFound'
  | 'Unauthorized'
  | 'Timeout'
  | 'BackendError';

export interface LoopTransition {
  from: LoopState;
  to: LoopState;
  iteration: number;
}

interface RunMeta {
  iterations: number;
  observations: Observation[];
  transitions: LoopTransition[];
  durationMs: number;
}

export type AgentRunResult =
  | (RunMeta & { state: LoopState.DONE; answer: string; caveats: string[] })
  | (RunMeta & { state: LoopState.FAILED; error: { kind: FailureKind; message: string } });
