/**
 * Conversation context interfaces
 */

import type { QueryFilters } from './tool.interface';

export interface ContextEntry {
  query: string;
  tools: string[];
  /** Entity filters resolved for the query, e.g. { device: ['sw-01'] } */
  entities: QueryFilters;
  /** Epoch milliseconds */
  timestamp: number;
}

export interface ConversationContext {
  entries: ContextEntry[];
  lastUpdated: number | null;
}
