import { Inject, Injectable, Logger } from '@nestjs/common';
import { ADAPTER_CLASSES } from '../adapters';
import { AGENT_CONFIG } from '../config/constants';
import {
  AdapterError,
  DuplicateToolError,
  toAdapterError,
  UnknownToolError,
} from '../errors/network-agent.errors';
import {
  AdapterClass,
  AgentConfig,
  QueryFilters,
  RawRecord,
  TOOL_OPERATIONS,
  ToolCatalogEntry,
  ToolConfig,
  ToolInvocationResult,
  ToolOperation,
  ToolSpec,
} from '../interfaces';
import { buildCacheKey, ResultCache } from './result-cache';

export type DispatchTargets = 'all' | ToolSpec[];

/**
 * ToolManagerService - registry of tool adapters and the fan-out point for calls
 *
 * Names and aliases share one namespace. Every dispatch returns exactly one
 * result per target, in target order; adapter failures and timeouts become
 * failed results and never reject.
 */
@Injectable()
export class ToolManagerService {
  private readonly logger = new Logger(ToolManagerService.name);
  private readonly tools = new Map<string, ToolSpec>();
  /** alias -> canonical name */
  private readonly aliases = new Map<string, string>();
  private readonly cache: ResultCache;

  constructor(@Inject(AGENT_CONFIG) private readonly config: AgentConfig) {
    this.cache = new ResultCache(config.settings.cacheDurationMinutes * 60_000);
  }

  /**
   * Register every enabled tool from configuration
   */
  initialize(): void {
    for (const [name, toolConfig] of Object.entries(this.config.tools)) {
      if (!toolConfig.enabled) {
        this.logger.debug(`Skipping disabled tool ${name}`);
        continue;
      }
      this.registerTool(name, ADAPTER_CLASSES[toolConfig.adapter], toolConfig, toolConfig.aliases);
    }
    this.logger.log(`Registered tools: ${this.getEnabledTools().map((t) => t.name).join(', ') || '(none)'}`);
  }

  registerTool(
    name: string,
    adapterClass: AdapterClass,
    config: ToolConfig,
    aliases: string[] = config.aliases,
  ): ToolSpec {
    const seen = new Set<string>();
    for (const identifier of [name, ...aliases]) {
      if (seen.has(identifier) || this.isRegistered(identifier)) {
        throw new DuplicateToolError(identifier);
      }
      seen.add(identifier);
    }

    const spec: ToolSpec = {
      name,
      aliases: [...aliases],
      enabled: config.enabled,
      config,
      mappings: config.mappings,
      adapter: new adapterClass(name, config),
    };

    this.tools.set(name, spec);
    for (const alias of aliases) {
      this.aliases.set(alias, name);
    }

    this.logger.debug(`Registered ${name} (${spec.adapter.kind}) aliases=[${aliases.join(', ')}]`);
    return spec;
  }

  deregisterTool(name: string): void {
    const spec = this.tools.get(name);
    if (!spec) {
      throw new UnknownToolError(name, this.identifiers());
    }

    this.tools.delete(name);
    for (const alias of spec.aliases) {
      this.aliases.delete(alias);
    }
    this.cache.invalidateTool(name);
    this.logger.debug(`Deregistered ${name}`);
  }

  isRegistered(identifier: string): boolean {
    return this.tools.has(identifier) || this.aliases.has(identifier);
  }

  /**
   * Exact, case-sensitive lookup by canonical name, then alias
   */
  resolve(identifier: string): ToolSpec {
    const spec = this.tools.get(identifier) ?? this.tools.get(this.aliases.get(identifier) ?? '');
    if (!spec) {
      throw new UnknownToolError(identifier, this.identifiers());
    }
    return spec;
  }

  getTools(): ToolSpec[] {
    return Array.from(this.tools.values());
  }

  getEnabledTools(): ToolSpec[] {
    return this.getTools().filter((spec) => spec.enabled);
  }

  getCatalog(): ToolCatalogEntry[] {
    return this.getEnabledTools().map((spec) => ({
      name: spec.name,
      aliases: spec.aliases,
      operations: TOOL_OPERATIONS.filter((operation) => spec.adapter.capabilities.has(operation)),
    }));
  }

  /**
   * Every alias of every enabled tool, for hints in error messages
   */
  getAliases(): string[] {
    return this.getEnabledTools().flatMap((spec) => [...spec.aliases]);
  }

  async validateConnections(): Promise<Record<string, boolean>> {
    const status: Record<string, boolean> = {};
    for (const spec of this.getEnabledTools()) {
      status[spec.name] = await spec.adapter.validateConnection();
      if (!status[spec.name]) {
        this.logger.warn(`Tool ${spec.name} is unreachable or rejected its credentials`);
      }
    }
    return status;
  }

  async dispatch(
    targets: DispatchTargets,
    operation: ToolOperation,
    filters: QueryFilters = {},
  ): Promise<ToolInvocationResult[]> {
    const specs = targets === 'all' ? this.getEnabledTools() : targets;

    if (this.config.settings.concurrentQueries) {
      return Promise.all(specs.map((spec) => this.invokeTool(spec, operation, filters)));
    }

    const results: ToolInvocationResult[] = [];
    for (const spec of specs) {
      results.push(await this.invokeTool(spec, operation, filters));
    }
    return results;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async invokeTool(
    spec: ToolSpec,
    operation: ToolOperation,
    filters: QueryFilters,
  ): Promise<ToolInvocationResult> {
    const started = Date.now();
    const meta = { tool: spec.name, operation, filters: { ...filters } };

    if (!spec.adapter.capabilities.has(operation)) {
      return {
        ...meta,
        ok: false,
        error: { kind: 'BackendError', message: `${spec.name} does not support ${operation}` },
        durationMs: 0,
      };
    }

    const key = buildCacheKey(spec.name, operation, filters);
    const cached = this.cache.get(key);
    if (cached) {
      this.logger.debug(`${spec.name}.${operation} served from cache`);
      return { ...meta, ok: true, records: cached, cached: true, durationMs: 0 };
    }

    const timeoutSeconds = spec.config.api.timeoutSeconds ?? this.config.settings.timeoutSeconds;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Settle as Timeout before the aborted call can reject with its own error
        reject(new AdapterError('Timeout', `${spec.name} did not answer ${operation} within ${timeoutSeconds}s`));
        controller.abort();
      }, timeoutSeconds * 1000);
    });

    try {
      const records: RawRecord[] = await Promise.race([
        spec.adapter.invoke(operation, filters, { signal: controller.signal }),
        timeout,
      ]);
      this.cache.set(key, records);

      const durationMs = Date.now() - started;
      this.logger.debug(`${spec.name}.${operation} returned ${records.length} records in ${durationMs}ms`);
      return { ...meta, ok: true, records, durationMs };
    } catch (error) {
      const adapterError = toAdapterError(error);
      this.logger.warn(`${spec.name}.${operation} failed (${adapterError.kind}): ${adapterError.message}`);
      return {
        ...meta,
        ok: false,
        error: { kind: adapterError.kind, message: adapterError.message },
        durationMs: Date.now() - started,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private identifiers(): string[] {
    return [...this.tools.keys(), ...this.aliases.keys()];
  }
}
