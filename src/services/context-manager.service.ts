import { Inject, Injectable, Logger } from '@nestjs/common';
import { AGENT_CONFIG } from '../config/constants';
import {
  AgentConfig,
  ContextEntry,
  ConversationContext,
  NormalizedRecord,
  QueryFilters,
} from '../interfaces';
import { EntityExtractorService } from './entity-extractor.service';

/**
 * ContextManagerService - short-lived memory for follow-up questions
 *
 * One instance per conversation. Entries expire after context_timeout seconds
 * and are pruned lazily whenever the context is read or written.
 */
@Injectable()
export class ContextManagerService {
  private readonly logger = new Logger(ContextManagerService.name);
  private context: ConversationContext = { entries: [], lastUpdated: null };

  constructor(
    @Inject(AGENT_CONFIG) private readonly config: AgentConfig,
    private readonly entityExtractor: EntityExtractorService,
  ) {}

  update(query: string, tools: string[], entities: QueryFilters): void {
    this.prune();

    const timestamp = Date.now();
    this.context.entries.push({ query, tools: [...tools], entities: { ...entities }, timestamp });

    const overflow = this.context.entries.length - this.config.settings.maxHistory;
    if (overflow > 0) {
      this.context.entries.splice(0, overflow);
    }
    this.context.lastUpdated = timestamp;
  }

  /**
   * Filters carried over from earlier turns. Empty when the query names its
   * own subject or nothing recent has entities.
   */
  resolveImplicit(query: string): QueryFilters {
    const extracted = this.entityExtractor.extract(query);
    if (this.entityExtractor.hasExplicitSubject(extracted)) {
      return {};
    }

    const entries = this.getEntries();
    for (let i = entries.length - 1; i >= 0; i--) {
      if (Object.keys(entries[i].entities).length > 0) {
        this.logger.debug(`Carrying over ${JSON.stringify(entries[i].entities)} from "${entries[i].query}"`);
        return { ...entries[i].entities };
      }
    }
    return {};
  }

  entitiesFromRecords(records: NormalizedRecord[]): QueryFilters {
    const names = new Set<string>();
    for (const record of records) {
      if (record.kind !== 'device') continue;
      const name = deviceName(record.fields);
      if (name) names.add(name);
    }
    return names.size > 0 ? { device: Array.from(names) } : {};
  }

  getEntries(): ContextEntry[] {
    this.prune();
    return [...this.context.entries];
  }

  getContext(): ConversationContext {
    return { entries: this.getEntries(), lastUpdated: this.context.lastUpdated };
  }

  lastTools(): string[] {
    const entries = this.getEntries();
    return entries.length > 0 ? [...entries[entries.length - 1].tools] : [];
  }

  summarize(): string {
    const entries = this.getEntries();
    if (entries.length === 0) {
      return 'No earlier queries in this conversation.';
    }

    const lines = entries.map((entry) => {
      const tools = entry.tools.length > 0 ? entry.tools.join(', ') : 'no tools';
      const entities = Object.keys(entry.entities).length > 0 ? ` -> ${JSON.stringify(entry.entities)}` : '';
      return `- "${entry.query}" (${tools})${entities}`;
    });
    return `Earlier in this conversation:\n${lines.join('\n')}`;
  }

  clear(): void {
    this.context = { entries: [], lastUpdated: null };
  }

  private prune(): void {
    const now = Date.now();
    const maxAgeMs = this.config.settings.contextTimeout * 1000;
    const live = this.context.entries.filter((entry) => now - entry.timestamp <= maxAgeMs);
    if (live.length !== this.context.entries.length) {
      this.logger.debug(`Expired ${this.context.entries.length - live.length} context entries`);
      this.context.entries = live;
    }
  }
}

function deviceName(fields: Record<string, unknown>): string | undefined {
  for (const key of ['name', 'hostname', 'id']) {
    const value = fields[key];
    if (typeof value === 'string' && value) return value;
    if (typeof value === 'number') return String(value);
  }
  return undefined;
}
