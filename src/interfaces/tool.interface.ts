/**
 * Tool adapter contract and invocation types
 */

import type { AdapterErrorKind } from '../errors/network-agent.errors';
import type { ToolConfig } from './config.interface';
import type { ToolMappings } from './mapping.interface';

/**
 * Supported backend variants. Each variant has exactly one adapter class.
 */
export type AdapterKind = 'netbox' | 'librenms';

export const TOOL_OPERATIONS = [
  'get_devices',
  'get_interfaces',
  'get_alerts',
  'get_topology',
  'get_device_config',
  'get_performance_metrics',
  'search',
] as const;

export type ToolOperation = (typeof TOOL_OPERATIONS)[number];

export type FilterValue = string | number | boolean | string[];

export type QueryFilters = Record<string, FilterValue>;

/** One backend-native response item */
export type RawRecord = Record<string, unknown>;

export interface InvocationOptions {
  /** Aborted when the per-target timeout fires */
  signal?: AbortSignal;
}

export interface NetworkToolAdapter {
  readonly kind: AdapterKind;
  readonly name: string;
  readonly capabilities: ReadonlySet<ToolOperation>;

  /**
   * Lightweight reachability/auth check. Resolves false on network or auth
   * failure; throws ConfigurationError when url or token is missing.
   */
  validateConnection(): Promise<boolean>;

  invoke(
    operation: ToolOperation,
    filters?: QueryFilters,
    options?: InvocationOptions,
  ): Promise<RawRecord[]>;
}

export type AdapterClass = new (name: string, config: ToolConfig) => NetworkToolAdapter;

export interface ToolSpec {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly enabled: boolean;
  readonly config: ToolConfig;
  readonly mappings: ToolMappings;
  readonly adapter: NetworkToolAdapter;
}

export interface ToolInvocationError {
  kind: AdapterErrorKind;
  message: string;
}

interface InvocationMeta {
  tool: string;
  operation: ToolOperation;
  filters: QueryFilters;
  durationMs: number;
}

export type ToolInvocationResult<T = RawRecord> =
  | (InvocationMeta & { ok: true; records: T[]; cached?: boolean })
  | (InvocationMeta & { ok: false; error: ToolInvocationError });
