/**
 * Base class for tool adapters.
 *
 * Each backend variant declares its capabilities and overrides the operation
 * methods it supports; invoke() is the single dispatch point over the fixed
 * operation set.
 */

import { Logger } from '@nestjs/common';
import { AdapterError, ConfigurationError } from '../errors/network-agent.errors';
import {
  AdapterKind,
  InvocationOptions,
  NetworkToolAdapter,
  QueryFilters,
  RawRecord,
  ToolConfig,
  ToolOperation,
} from '../interfaces';
import { NetworkClient } from './network-client';

const DEFAULT_TIMEOUT_SECONDS = 30;

export abstract class BaseToolAdapter implements NetworkToolAdapter {
  abstract readonly kind: AdapterKind;
  abstract readonly capabilities: ReadonlySet<ToolOperation>;

  /** Cheap authenticated endpoint used by validateConnection() */
  protected abstract readonly statusPath: string;

  protected readonly logger: Logger;
  protected readonly client: NetworkClient;

  constructor(
    readonly name: string,
    protected readonly config: ToolConfig,
  ) {
    this.logger = new Logger(`${new.target.name}:${name}`);
    this.client = new NetworkClient({
      baseUrl: config.api.url,
      headers: this.authHeaders(config.api.token),
      timeoutMs: (config.api.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS) * 1000,
    });
  }

  protected abstract authHeaders(token: string): Record<string, string>;

  async validateConnection(): Promise<boolean> {
    if (!this.config.api.url || !this.config.api.token) {
      throw new ConfigurationError(`Tool "${this.name}" needs api.url and api.token to connect`);
    }

    try {
      await this.client.get(this.statusPath);
      return true;
    } catch (error) {
      this.logger.warn(
        `Connection check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  async invoke(
    operation: ToolOperation,
    filters: QueryFilters = {},
    options: InvocationOptions = {},
  ): Promise<RawRecord[]> {
    if (!this.capabilities.has(operation)) {
      throw new AdapterError('BackendError', `${this.name} (${this.kind}) does not support ${operation}`);
    }

    const { signal } = options;
    switch (operation) {
      case 'get_devices':
        return this.getDevices(filters, signal);
      case 'get_interfaces':
        return this.getInterfaces(filters, signal);
      case 'get_alerts':
        return this.getAlerts(filters, signal);
      case 'get_topology':
        return this.getTopology(filters, signal);
      case 'get_device_config':
        return this.getDeviceConfig(filters, signal);
      case 'get_performance_metrics':
        return this.getPerformanceMetrics(filters, signal);
      case 'search':
        return this.search(filters, signal);
    }
  }

  protected getDevices(_filters: QueryFilters, _signal?: AbortSignal): Promise<RawRecord[]> {
    return this.unsupported('get_devices');
  }

  protected getInterfaces(_filters: QueryFilters, _signal?: AbortSignal): Promise<RawRecord[]> {
    return this.unsupported('get_interfaces');
  }

  protected getAlerts(_filters: QueryFilters, _signal?: AbortSignal): Promise<RawRecord[]> {
    return this.unsupported('get_alerts');
  }

  protected getTopology(_filters: QueryFilters, _signal?: AbortSignal): Promise<RawRecord[]> {
    return this.unsupported('get_topology');
  }

  protected getDeviceConfig(_filters: QueryFilters, _signal?: AbortSignal): Promise<RawRecord[]> {
    return this.unsupported('get_device_config');
  }

  protected getPerformanceMetrics(_filters: QueryFilters, _signal?: AbortSignal): Promise<RawRecord[]> {
    return this.unsupported('get_performance_metrics');
  }

  protected search(_filters: QueryFilters, _signal?: AbortSignal): Promise<RawRecord[]> {
    return this.unsupported('search');
  }

  private unsupported(operation: ToolOperation): Promise<RawRecord[]> {
    return Promise.reject(
      new AdapterError('BackendError', `${this.name} (${this.kind}) does not implement ${operation}`),
    );
  }

  /**
   * Device identifiers named by the filters, from `device` or `device_id`.
   */
  protected deviceList(filters: QueryFilters): string[] {
    const value = filters.device ?? filters.device_id;
    if (value === undefined) return [];
    return Array.isArray(value) ? value : [String(value)];
  }

  /**
   * Copy filters, renaming keys the backend spells differently.
   */
  protected renameFilters(filters: QueryFilters, renames: Record<string, string>): QueryFilters {
    const result: QueryFilters = {};
    for (const [key, value] of Object.entries(filters)) {
      result[renames[key] ?? key] = value;
    }
    return result;
  }
}
