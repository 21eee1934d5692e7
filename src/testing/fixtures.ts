/**
 * Shared builders for specs. Not part of the published build.
 */

import { loadAgentConfig } from '../config/config.loader';
import {
  AdapterClass,
  AdapterKind,
  AgentConfig,
  AgentSettings,
  InvocationOptions,
  NetworkToolAdapter,
  QueryFilters,
  QueryPattern,
  RawRecord,
  TOOL_OPERATIONS,
  ToolConfig,
  ToolOperation,
} from '../interfaces';

export const TEST_ENV = {
  NETBOX_URL: 'http://netbox.test',
  NETBOX_TOKEN: 'test-netbox-token',
  LIBRENMS_URL: 'http://librenms.test',
  LIBRENMS_TOKEN: 'test-librenms-token',
  OPENAI_API_KEY: 'test-openai-key',
};

export function makeSettings(overrides: Partial<AgentSettings> = {}): AgentSettings {
  return {
    queryAllEnabled: true,
    concurrentQueries: true,
    timeoutSeconds: 30,
    cacheDurationMinutes: 0,
    contextTimeout: 300,
    maxHistory: 10,
    maxRetries: 0,
    maxIterations: 8,
    aggregateMatches: false,
    includeToolSource: true,
    standardizeOutput: true,
    maxObservationChars: 20_000,
    ...overrides,
  };
}

export function makeToolConfig(adapter: AdapterKind, overrides: Partial<ToolConfig> = {}): ToolConfig {
  return {
    adapter,
    enabled: true,
    aliases: [],
    api: { url: `http://${adapter}.test`, token: 'test-token' },
    settings: {},
    mappings: {},
    ...overrides,
  };
}

export function makeConfig(
  overrides: { tools?: Record<string, ToolConfig>; settings?: Partial<AgentSettings>; patterns?: QueryPattern[] } = {},
): AgentConfig {
  return {
    tools: overrides.tools ?? {},
    llm: { model: 'test-model', temperature: 0, timeoutSeconds: 5, apiKey: 'test-openai-key' },
    settings: makeSettings(overrides.settings),
    patterns: overrides.patterns ?? [],
    logging: { level: 'error' },
  };
}

/**
 * The bundled config/ directory (mappings and query patterns) with test
 * credentials and the cache disabled.
 */
export function bundledConfig(env: Record<string, string> = {}): AgentConfig {
  return loadAgentConfig({
    env: { ...TEST_ENV, CACHE_DURATION_MINUTES: '0', LOG_LEVEL: 'error', ...env },
    envFile: false,
  });
}

export type FakeHandler = (
  operation: ToolOperation,
  filters: QueryFilters,
  options: InvocationOptions,
) => Promise<RawRecord[]>;

/**
 * Adapter class whose invoke() delegates to handler. Each constructed
 * instance is pushed to `instances`.
 */
export function fakeAdapterClass(
  kind: AdapterKind,
  handler: FakeHandler,
  capabilities: readonly ToolOperation[] = TOOL_OPERATIONS,
): AdapterClass & { instances: NetworkToolAdapter[] } {
  const instances: NetworkToolAdapter[] = [];

  class FakeAdapter implements NetworkToolAdapter {
    readonly kind = kind;
    readonly capabilities: ReadonlySet<ToolOperation> = new Set(capabilities);

    constructor(readonly name: string, readonly config: ToolConfig) {
      instances.push(this);
    }

    validateConnection(): Promise<boolean> {
      return Promise.resolve(true);
    }

    invoke(operation: ToolOperation, filters: QueryFilters = {}, options: InvocationOptions = {}): Promise<RawRecord[]> {
      return handler(operation, filters, options);
    }
  }

  return Object.assign(FakeAdapter, { instances });
}

/** Never settles on its own; rejects when the signal aborts */
export function hangUntilAborted(options: InvocationOptions): Promise<RawRecord[]> {
  return new Promise((_, reject) => {
    options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

/**
 * The parts of a fetch Response the network client reads
 */
export function jsonResponse(body: unknown, status = 200, statusText = '') {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    json: () => Promise.resolve(body),
    text: () => Promise.resolve(typeof body === 'string' ? body : JSON.stringify(body)),
  };
}
