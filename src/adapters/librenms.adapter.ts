/**
 * LibreNMS adapter: live monitoring state (alerts, port status, health, links)
 * and Oxidized configuration backups.
 */

import { AdapterError, toAdapterError } from '../errors/network-agent.errors';
import { FilterValue, QueryFilters, RawRecord, ToolOperation } from '../interfaces';
import { isRecord, recordsOf } from '../utils/records';
import { BaseToolAdapter } from './network-tool.adapter';

const PORT_COLUMNS =
  'port_id,device_id,ifName,ifType,ifAdminStatus,ifOperStatus,ifMtu,ifPhysAddress,ifAlias,ifSpeed';

const PORT_RATE_COLUMNS = 'ifName,ifInOctets_rate,ifOutOctets_rate,ifInErrors_rate,ifOutErrors_rate';

/** Device list filter key -> LibreNMS `type` parameter */
const DEVICE_LOOKUP_TYPES: ReadonlyArray<[string, string]> = [
  ['site', 'location'],
  ['ip', 'ipv4'],
  ['status', 'status'],
];

export class LibrenmsAdapter extends BaseToolAdapter {
  readonly kind = 'librenms' as const;
  readonly capabilities: ReadonlySet<ToolOperation> = new Set<ToolOperation>([
    'get_devices',
    'get_interfaces',
    'get_alerts',
    'get_topology',
    'get_device_config',
    'get_performance_metrics',
    'search',
  ]);

  protected readonly statusPath = 'api/v0/system';

  protected authHeaders(token: string): Record<string, string> {
    return { 'X-Auth-Token': token };
  }

  protected async getDevices(filters: QueryFilters, signal?: AbortSignal): Promise<RawRecord[]> {
    const hosts = this.deviceList(filters);
    if (hosts.length > 0) {
      return this.perHost(hosts, async (host) => {
        const body = await this.client.get(`api/v0/devices/${encodeURIComponent(host)}`, undefined, signal);
        return recordsOf(body.devices);
      });
    }

    for (const [key, type] of DEVICE_LOOKUP_TYPES) {
      const value = filters[key];
      if (value !== undefined) {
        const body = await this.client.get('api/v0/devices', { type, query: firstValue(value) }, signal);
        return recordsOf(body.devices);
      }
    }

    const body = await this.client.get('api/v0/devices', undefined, signal);
    return recordsOf(body.devices);
  }

  protected async getInterfaces(filters: QueryFilters, signal?: AbortSignal): Promise<RawRecord[]> {
    const hosts = this.deviceList(filters);
    if (hosts.length === 0) {
      const body = await this.client.get('api/v0/ports', { columns: PORT_COLUMNS }, signal);
      return recordsOf(body.ports);
    }

    return this.perHost(hosts, async (host) => {
      const body = await this.client.get(
        `api/v0/devices/${encodeURIComponent(host)}/ports`,
        { columns: PORT_COLUMNS },
        signal,
      );
      return recordsOf(body.ports).map((port) => ({ ...port, hostname: host }));
    });
  }

  protected async getAlerts(filters: QueryFilters, signal?: AbortSignal): Promise<RawRecord[]> {
    const params: QueryFilters = {};
    if (typeof filters.severity === 'string') {
      params.severity = this.mapSeverity(filters.severity);
    }
    if (filters.state !== undefined) {
      params.state = filters.state;
    }

    const body = await this.client.get('api/v0/alerts', params, signal);
    const alerts = recordsOf(body.alerts);

    const hosts = this.deviceList(filters);
    if (hosts.length === 0) {
      return alerts;
    }
    return alerts.filter((alert) => typeof alert.hostname === 'string' && hosts.includes(alert.hostname));
  }

  protected async getTopology(filters: QueryFilters, signal?: AbortSignal): Promise<RawRecord[]> {
    const hosts = this.deviceList(filters);
    if (hosts.length === 0) {
      const body = await this.client.get('api/v0/resources/links', undefined, signal);
      return recordsOf(body.links);
    }

    return this.perHost(hosts, async (host) => {
      const body = await this.client.get(`api/v0/devices/${encodeURIComponent(host)}/links`, undefined, signal);
      return recordsOf(body.links);
    });
  }

  protected async getDeviceConfig(filters: QueryFilters, signal?: AbortSignal): Promise<RawRecord[]> {
    const hosts = this.requireHosts(filters, 'get_device_config');
    return this.perHost(hosts, async (host) => {
      const body = await this.client.get(`api/v0/oxidized/config/${encodeURIComponent(host)}`, undefined, signal);
      return [{ hostname: host, config: body.config ?? null }];
    });
  }

  protected async getPerformanceMetrics(filters: QueryFilters, signal?: AbortSignal): Promise<RawRecord[]> {
    const hosts = this.requireHosts(filters, 'get_performance_metrics');
    const metricType = typeof filters.metric_type === 'string' ? filters.metric_type : undefined;
    const wantHealth = metricType === undefined || metricType !== 'interface';
    const wantPorts = metricType === undefined || metricType === 'interface';

    return this.perHost(hosts, async (host) => {
      const encoded = encodeURIComponent(host);
      const records: RawRecord[] = [];

      if (wantHealth) {
        const body = await this.client.get(`api/v0/devices/${encoded}/health`, undefined, signal);
        const graphs: RawRecord[] = recordsOf(body.graphs).map((graph) => ({ ...graph, type: 'health', hostname: host }));
        records.push(
          ...(metricType === undefined ? graphs : graphs.filter((graph) => String(graph.name).includes(metricType))),
        );
      }

      if (wantPorts) {
        const body = await this.client.get(
          `api/v0/devices/${encoded}/ports`,
          { columns: PORT_RATE_COLUMNS },
          signal,
        );
        records.push(...recordsOf(body.ports).map((port) => ({ ...port, type: 'interface', hostname: host })));
      }

      return records;
    });
  }

  protected async search(filters: QueryFilters, signal?: AbortSignal): Promise<RawRecord[]> {
    const q = filters.q ?? filters.query;
    const params: QueryFilters = q === undefined ? {} : { type: 'hostname', query: firstValue(q) };
    const body = await this.client.get('api/v0/devices', params, signal);
    return recordsOf(body.devices);
  }

  private mapSeverity(severity: string): string {
    const mapping = this.config.settings.alert_severity_mapping;
    if (isRecord(mapping)) {
      const mapped = mapping[severity.toLowerCase()];
      if (typeof mapped === 'string') return mapped;
    }
    return severity.toLowerCase();
  }

  private requireHosts(filters: QueryFilters, operation: ToolOperation): string[] {
    const hosts = this.deviceList(filters);
    if (hosts.length === 0) {
      throw new AdapterError('NotFound', `${operation} on ${this.name} needs a device filter`);
    }
    return hosts;
  }

  /**
   * Hosts that fail are skipped with a warning; the call rejects with the
   * first failure only when no host answered.
   */
  private async perHost(hosts: string[], fetchHost: (host: string) => Promise<RawRecord[]>): Promise<RawRecord[]> {
    const settled = await Promise.allSettled(hosts.map(fetchHost));
    const records: RawRecord[] = [];
    const failures: AdapterError[] = [];

    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        records.push(...outcome.value);
        return;
      }
      const error = toAdapterError(outcome.reason);
      this.logger.warn(`Skipping ${hosts[index]} (${error.kind}): ${error.message}`);
      failures.push(error);
    });

    if (failures.length === hosts.length && failures.length > 0) {
      throw failures[0];
    }
    return records;
  }
}

function firstValue(value: FilterValue): string {
  return Array.isArray(value) ? value[0] ?? '' : String(value);
}
