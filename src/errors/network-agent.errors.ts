/**
 * Error hierarchy for the network query agent.
 *
 * Configuration and registry misuse errors propagate to callers as hard failures.
 * Adapter errors are caught at the tool manager boundary and turned into failed
 * invocation results; loop outcomes (exhaustion, ambiguity) surface through
 * processQuery as the matching error.
 */

export type AdapterErrorKind = 'NotFound' | 'Unauthorized' | 'Timeout' | 'BackendError';

export class NetworkAgentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'NetworkAgentError';
  }
}

export class ConfigurationError extends NetworkAgentError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

export class UnknownToolError extends NetworkAgentError {
  constructor(
    public readonly identifier: string,
    available: string[] = [],
  ) {
    super(
      available.length > 0
        ? `Unknown tool "${identifier}". Available tools and aliases: ${available.join(', ')}`
        : `Unknown tool "${identifier}"`,
      'UNKNOWN_TOOL',
    );
    this.name = 'UnknownToolError';
  }
}

export class DuplicateToolError extends NetworkAgentError {
  constructor(public readonly identifier: string) {
    super(`Tool name or alias "${identifier}" is already registered`, 'DUPLICATE_TOOL');
    this.name = 'DuplicateToolError';
  }
}

export class AdapterError extends NetworkAgentError {
  constructor(
    public readonly kind: AdapterErrorKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, 'ADAPTER_ERROR', cause);
    this.name = 'AdapterError';
  }
}

export class ReasoningExhaustedError extends NetworkAgentError {
  constructor(public readonly iterations: number) {
    super(
      `No final answer after ${iterations} reasoning steps`,
      'REASONING_EXHAUSTED',
    );
    this.name = 'ReasoningExhaustedError';
  }
}

export class PlanningAmbiguousError extends NetworkAgentError {
  constructor(
    query: string,
    public readonly suggestedAliases: string[],
  ) {
    const hint = suggestedAliases.length > 0
      ? ` Prefix the query with a tool alias, e.g. "@${suggestedAliases[0]} ${query}" (available: ${suggestedAliases.map((a) => `@${a}`).join(', ')}).`
      : ' Prefix the query with a tool alias, e.g. "@<alias> <query>".';
    super(`Could not determine which tool can answer "${query}".${hint}`, 'PLANNING_AMBIGUOUS');
    this.name = 'PlanningAmbiguousError';
  }
}

export class LlmError extends NetworkAgentError {
  constructor(message: string, cause?: unknown) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class EmptyAnswerError extends NetworkAgentError {
  constructor() {
    super('The reasoning model returned an empty answer', 'EMPTY_ANSWER');
    this.name = 'EmptyAnswerError';
  }
}

/**
 * Coerce anything thrown by an adapter into an AdapterError.
 */
export function toAdapterError(error: unknown): AdapterError {
  if (error instanceof AdapterError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new AdapterError('BackendError', message, error);
}
