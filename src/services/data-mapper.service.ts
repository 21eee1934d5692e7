import { Inject, Injectable } from '@nestjs/common';
import { AGENT_CONFIG } from '../config/constants';
import {
  AgentConfig,
  MappingRules,
  NormalizedRecord,
  RawRecord,
  RecordKind,
  ToolInvocationResult,
  ToolMappings,
  ToolOperation,
} from '../interfaces';
import { isRecord } from '../utils/records';

/**
 * Record kind produced by each operation
 */
export const OPERATION_RECORD_KINDS: Readonly<Record<ToolOperation, RecordKind>> = {
  get_devices: 'device',
  search: 'device',
  get_interfaces: 'interface',
  get_alerts: 'alert',
  get_performance_metrics: 'metric',
  get_topology: 'topology',
  get_device_config: 'config',
};

/**
 * Resolve a dotted path against a value. Numeric segments index arrays.
 * Returns null when any segment is missing.
 */
export function resolvePath(value: unknown, path: string): unknown {
  let current: unknown = value;
  for (const segment of path.split('.')) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
    } else if (isRecord(current) && segment in current) {
      current = current[segment];
    } else {
      return null;
    }
    if (current === undefined) return null;
  }
  return current;
}

/**
 * DataMapperService - translates backend-native records into the standard field set
 *
 * Pure: no state beyond the standardize_output switch.
 */
@Injectable()
export class DataMapperService {
  constructor(@Inject(AGENT_CONFIG) private readonly config: AgentConfig) {}

  normalize(tool: string, kind: RecordKind, raw: RawRecord, rules?: MappingRules): NormalizedRecord {
    if (!rules || !this.config.settings.standardizeOutput) {
      return { tool, kind, fields: { ...raw } };
    }

    const fields: Record<string, unknown> = {};
    for (const [field, path] of Object.entries(rules)) {
      fields[field] = resolvePath(raw, path);
    }
    return { tool, kind, fields };
  }

  normalizeResult(
    result: ToolInvocationResult,
    mappings: ToolMappings,
  ): ToolInvocationResult<NormalizedRecord> {
    if (!result.ok) {
      return result;
    }

    const kind = OPERATION_RECORD_KINDS[result.operation];
    const rules = mappings[kind];
    return {
      ...result,
      records: result.records.map((raw) => this.normalize(result.tool, kind, raw, rules)),
    };
  }
}
