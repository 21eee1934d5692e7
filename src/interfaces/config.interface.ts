/**
 * Agent configuration
 *
 * Built once by loadAgentConfig() and passed by reference (AGENT_CONFIG token)
 * into the tool manager, planner, context manager, LLM client and loop.
 */

import type { LogLevel } from '@nestjs/common';
import type { AdapterKind } from './tool.interface';
import type { ToolMappings } from './mapping.interface';
import type { QueryPattern } from './query.interface';

export interface ToolApiConfig {
  url: string;
  token: string;
  timeoutSeconds?: number;
}

export interface ToolConfig {
  adapter: AdapterKind;
  enabled: boolean;
  aliases: string[];
  api: ToolApiConfig;
  /** Adapter-specific settings, e.g. alert_severity_mapping for LibreNMS */
  settings: Record<string, unknown>;
  mappings: ToolMappings;
}

export interface LlmConfig {
  baseUrl?: string;
  apiKey?: string;
  model: string;
  temperature: number;
  timeoutSeconds: number;
}

export interface AgentSettings {
  /** Query every enabled tool when no specific tool is named */
  queryAllEnabled: boolean;
  concurrentQueries: boolean;
  timeoutSeconds: number;
  cacheDurationMinutes: number;
  /** Seconds before a conversation context entry expires */
  contextTimeout: number;
  maxHistory: number;
  /** Retries for LLM calls */
  maxRetries: number;
  maxIterations: number;
  /** Run every matching pattern's primary endpoint instead of only the first */
  aggregateMatches: boolean;
  includeToolSource: boolean;
  standardizeOutput: boolean;
  maxObservationChars: number;
}

export interface AgentConfig {
  tools: Record<string, ToolConfig>;
  llm: LlmConfig;
  settings: AgentSettings;
  patterns: QueryPattern[];
  logging: { level: LogLevel };
}
