/**
 * Data mapping interfaces
 *
 * Mapping rules translate backend-native fields into a standardized field set.
 */

export type RecordKind = 'device' | 'interface' | 'alert' | 'metric' | 'topology' | 'config';

/** Standard field name -> dotted path into the raw record */
export type MappingRules = Record<string, string>;

export type ToolMappings = Partial<Record<RecordKind, MappingRules>>;

export interface NormalizedRecord {
  /** Originating tool name (provenance) */
  tool: string;
  kind: RecordKind;
  fields: Record<string, unknown>;
}
