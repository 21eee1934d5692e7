/**
 * NetBox adapter: source-of-truth inventory (devices, interfaces, cabling).
 *
 * NetBox has no alerting of its own; journal entries stand in for alerts, with
 * the severity filter translated to the journal entry kind.
 */

import { QueryFilters, RawRecord, ToolOperation } from '../interfaces';
import { recordsOf } from '../utils/records';
import { BaseToolAdapter } from './network-tool.adapter';

const SEVERITY_TO_JOURNAL_KIND: Record<string, string> = {
  critical: 'danger',
  high: 'danger',
  warning: 'warning',
  medium: 'warning',
  info: 'info',
  ok: 'success',
  low: 'success',
};

export class NetboxAdapter extends BaseToolAdapter {
  readonly kind = 'netbox' as const;
  readonly capabilities: ReadonlySet<ToolOperation> = new Set<ToolOperation>([
    'get_devices',
    'get_interfaces',
    'get_alerts',
    'get_topology',
    'search',
  ]);

  protected readonly statusPath = 'api/status/';

  protected authHeaders(token: string): Record<string, string> {
    return { Authorization: `Token ${token}` };
  }

  protected async getDevices(filters: QueryFilters, signal?: AbortSignal): Promise<RawRecord[]> {
    const params = this.renameFilters(filters, { device: 'name', ip: 'q' });
    const body = await this.client.get('api/dcim/devices/', params, signal);
    return recordsOf(body.results);
  }

  protected async getInterfaces(filters: QueryFilters, signal?: AbortSignal): Promise<RawRecord[]> {
    const body = await this.client.get('api/dcim/interfaces/', filters, signal);
    return recordsOf(body.results);
  }

  protected async getAlerts(filters: QueryFilters, signal?: AbortSignal): Promise<RawRecord[]> {
    const { severity, ...rest } = filters;
    const params: QueryFilters = { ...rest };
    if (typeof severity === 'string') {
      params.kind = SEVERITY_TO_JOURNAL_KIND[severity.toLowerCase()] ?? severity;
    }
    // Journal entries are filtered by object id, not device name
    delete params.device;

    const body = await this.client.get('api/extras/journal-entries/', params, signal);
    return recordsOf(body.results);
  }

  protected async getTopology(filters: QueryFilters, signal?: AbortSignal): Promise<RawRecord[]> {
    const body = await this.client.get('api/dcim/cables/', filters, signal);
    return recordsOf(body.results);
  }

  protected async search(filters: QueryFilters, signal?: AbortSignal): Promise<RawRecord[]> {
    const q = filters.q ?? filters.query;
    const body = await this.client.get('api/dcim/devices/', q === undefined ? {} : { q }, signal);
    return recordsOf(body.results);
  }
}
