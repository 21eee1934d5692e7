import { Injectable } from '@nestjs/common';
import { QueryFilters } from '../interfaces';

/** Entity keys that name what the query is about */
export const SUBJECT_KEYS: readonly string[] = ['rack', 'site', 'device', 'ip'];

const STOPWORDS = new Set([
  'a', 'an', 'all', 'and', 'are', 'at', 'by', 'called', 'for', 'from', 'has', 'have', 'in',
  'is', 'named', 'of', 'on', 'or', 'that', 'the', 'their', 'these', 'those', 'to', 'where',
  'which', 'with', 'without',
  // nouns that follow "switch"/"device" without naming one
  'alerts', 'config', 'configuration', 'configs', 'health', 'interfaces', 'inventory', 'metrics',
  'ports', 'status', 'statuses', 'topology', 'uplinks',
]);

const RACK_PATTERN = /\brack\s+([A-Za-z0-9][\w.-]*)/gi;
const SITE_PATTERN = /\bsite\s+([A-Za-z0-9][\w.-]*)/gi;
const DEVICE_PATTERN = /\b(?:device|switch|router|host|firewall)s?\s+([A-Za-z0-9][\w.:-]*)/gi;
const NAMED_PATTERN = /\b(?:named|called|hostname)\s+([A-Za-z0-9][\w.:-]*)/gi;
const QUOTED_PATTERN = /(?<!\w)["']([^"']+)["'](?!\w)/g;
const IPV4_PATTERN = /\b((?:25[0-5]|2[0-4]\d|1?\d?\d)(?:\.(?:25[0-5]|2[0-4]\d|1?\d?\d)){3})(?:\/\d{1,2})?\b/g;
const SEVERITY_PATTERN = /\b(critical|warning)\b/i;

/** Query word -> health sensor class */
const METRIC_TYPES: Record<string, string> = {
  cpu: 'processor',
  processor: 'processor',
  memory: 'mempool',
  temperature: 'temperature',
  bandwidth: 'interface',
  traffic: 'interface',
};

/**
 * EntityExtractorService - pulls filter values out of free-form query text
 *
 * Only recognizes the handful of entity shapes the planner routes on.
 * Anything it misses is left for the reasoning model.
 */
@Injectable()
export class EntityExtractorService {
  extract(query: string): QueryFilters {
    const filters: QueryFilters = {};

    const rack = this.firstCapture(RACK_PATTERN, query);
    if (rack) filters.rack = rack;

    const site = this.firstCapture(SITE_PATTERN, query);
    if (site) filters.site = site;

    const devices = this.unique([
      ...this.captures(QUOTED_PATTERN, query),
      ...this.captures(NAMED_PATTERN, query),
      ...this.captures(DEVICE_PATTERN, query),
    ]);
    if (devices.length === 1) {
      filters.device = devices[0];
    } else if (devices.length > 1) {
      filters.device = devices;
    }

    const ip = this.firstCapture(IPV4_PATTERN, query, false);
    if (ip) filters.ip = ip;

    const severity = SEVERITY_PATTERN.exec(query);
    if (severity) filters.severity = severity[1].toLowerCase();

    const lowered = query.toLowerCase();
    for (const [word, metricType] of Object.entries(METRIC_TYPES)) {
      if (new RegExp(`\\b${word}\\b`).test(lowered)) {
        filters.metric_type = metricType;
        break;
      }
    }

    return filters;
  }

  hasExplicitSubject(filters: QueryFilters): boolean {
    return SUBJECT_KEYS.some((key) => filters[key] !== undefined);
  }

  private firstCapture(pattern: RegExp, text: string, skipStopwords = true): string | undefined {
    return this.captures(pattern, text, skipStopwords)[0];
  }

  private captures(pattern: RegExp, text: string, skipStopwords = true): string[] {
    const values: string[] = [];
    for (const match of text.matchAll(pattern)) {
      const value = match[1].replace(/[.,;:?!]+$/, '');
      if (!value || (skipStopwords && STOPWORDS.has(value.toLowerCase()))) continue;
      values.push(value);
    }
    return values;
  }

  private unique(values: string[]): string[] {
    return Array.from(new Set(values));
  }
}
