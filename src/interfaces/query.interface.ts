/**
 * Semantic query planning interfaces
 */

import type { QueryFilters, ToolOperation } from './tool.interface';

export interface EndpointDescriptor {
  /** Canonical tool name the endpoint belongs to */
  tool: string;
  /** Backend endpoint identifier, e.g. "dcim/devices" */
  endpoint: string;
  operation: ToolOperation;
  filters: QueryFilters;
  /** Why this endpoint answers the pattern */
  justification: string;
}

export interface QueryPattern {
  name: string;
  description: string;
  /** Lower-case substrings; any one of them triggers the pattern */
  keywords: string[];
  /** Ordered candidates; the first is the pattern's primary endpoint */
  primary: EndpointDescriptor[];
  /** Follow-up lookups run after a primary succeeds */
  secondary: EndpointDescriptor[];
}

export interface PlannedOperation {
  tool: string;
  operation: ToolOperation;
  filters: QueryFilters;
  justification: string;
  /** Pattern that contributed the operation, absent for directive/fallback plans */
  pattern?: string;
}

export interface PlanResult {
  query: string;
  /** Set when the query carried an @alias directive */
  directive?: { alias: string; tool: string; remainder: string };
  operations: PlannedOperation[];
  /** Gated on success of the primary operations */
  followUps: PlannedOperation[];
  matchedPatterns: string[];
  /** True when the query named a rack, site, device or address itself */
  explicitSubject: boolean;
  /** True when no pattern matched and every enabled tool gets a search */
  fallback: boolean;
}
