import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { AGENT_CONFIG, PATTERN_MATCHER } from '../config/constants';
import { PlanningAmbiguousError } from '../errors/network-agent.errors';
import {
  AgentConfig,
  EndpointDescriptor,
  PlannedOperation,
  PlanResult,
  QueryFilters,
  QueryPattern,
  ToolOperation,
  ToolSpec,
} from '../interfaces';
import { EntityExtractorService } from './entity-extractor.service';
import { KeywordPatternMatcher, PatternMatcher } from './pattern-matcher';
import { ToolManagerService } from './tool-manager.service';

/**
 * Filter keys each operation accepts from extracted or implicit entities
 */
export const OPERATION_FILTER_KEYS: Readonly<Record<ToolOperation, readonly string[]>> = {
  get_devices: ['rack', 'site', 'device', 'ip', 'status'],
  get_interfaces: ['device', 'site'],
  get_alerts: ['severity', 'device'],
  get_topology: ['device', 'site'],
  get_device_config: ['device'],
  get_performance_metrics: ['device', 'metric_type'],
  search: ['q'],
};

/** Operations that cannot run without a device to scope them */
export const DEVICE_SCOPED_OPERATIONS: ReadonlySet<ToolOperation> = new Set<ToolOperation>([
  'get_device_config',
  'get_performance_metrics',
]);

const DIRECTIVE_PATTERN = /^\s*@(\S+)(?:\s+([\s\S]*))?$/;

interface Candidate {
  descriptor: EndpointDescriptor;
  pattern: QueryPattern;
}

/**
 * QueryPlannerService - decides which tools and operations answer a query
 *
 * Routing order:
 * 1. "@alias rest" targets exactly that tool: its own primaries, then other
 *    tools' primary operations it also supports, then its secondaries.
 *    Device-scoped operations are passed over without a device filter.
 * 2. Keyword patterns: the first match's primary endpoint, widened by
 *    aggregate_matches and query_all_enabled
 * 3. No match: search on every enabled tool, or PlanningAmbiguousError
 *
 * Secondary endpoints become follow-ups gated on the primaries succeeding.
 */
@Injectable()
export class QueryPlannerService {
  private readonly logger = new Logger(QueryPlannerService.name);
  private readonly matcher: PatternMatcher;

  constructor(
    @Inject(AGENT_CONFIG) private readonly config: AgentConfig,
    private readonly toolManager: ToolManagerService,
    private readonly entityExtractor: EntityExtractorService,
    @Optional() @Inject(PATTERN_MATCHER) matcher?: PatternMatcher,
  ) {
    this.matcher = matcher ?? new KeywordPatternMatcher();
  }

  plan(query: string, implicitFilters: QueryFilters = {}): PlanResult {
    const directive = DIRECTIVE_PATTERN.exec(query);
    const result = directive
      ? this.planDirective(query, directive[1], (directive[2] ?? '').trim(), implicitFilters)
      : this.planByKeywords(query, implicitFilters);

    this.logger.debug(
      `Plan for "${query}": now=[${result.operations.map(describe).join(', ')}] ` +
        `followUps=[${result.followUps.map(describe).join(', ')}] patterns=[${result.matchedPatterns.join(', ')}]`,
    );
    return result;
  }

  private planDirective(
    query: string,
    alias: string,
    remainder: string,
    implicit: QueryFilters,
  ): PlanResult {
    const spec = this.toolManager.resolve(alias);
    const text = remainder || query;
    const extracted = this.entityExtractor.extract(text);
    const matches = this.matcher.match(text, this.config.patterns);

    const supported = (descriptor: EndpointDescriptor) =>
      descriptor.tool === spec.name && spec.adapter.capabilities.has(descriptor.operation);

    const candidates: Candidate[] = [
      ...matches.flatMap((pattern) =>
        pattern.primary.filter(supported).map((descriptor) => ({ descriptor, pattern })),
      ),
      ...matches.flatMap((pattern) =>
        pattern.primary
          .filter((descriptor) => descriptor.tool !== spec.name && spec.adapter.capabilities.has(descriptor.operation))
          .map((descriptor) => ({ descriptor: retarget(descriptor, spec.name), pattern })),
      ),
      ...matches.flatMap((pattern) =>
        pattern.secondary.filter(supported).map((descriptor) => ({ descriptor, pattern })),
      ),
    ];

    const chosen = candidates
      .map((candidate) => this.toOperation(candidate, extracted, implicit))
      .find((operation) => !DEVICE_SCOPED_OPERATIONS.has(operation.operation) || operation.filters.device !== undefined);

    const operations: PlannedOperation[] = chosen
      ? [chosen]
      : [
          this.buildOperation(
            spec.name,
            'search',
            { q: text },
            candidates.length === 0
              ? `No query pattern matched; searching ${spec.name}`
              : `No device to scope ${candidates[0].descriptor.operation}; searching ${spec.name}`,
            undefined,
            extracted,
            implicit,
          ),
        ];

    const followUps = this.collectFollowUps(
      matches,
      (descriptor) => supported(descriptor),
      operations,
      extracted,
      implicit,
    );

    return {
      query,
      directive: { alias, tool: spec.name, remainder },
      operations,
      followUps,
      matchedPatterns: matches.map((pattern) => pattern.name),
      explicitSubject: this.entityExtractor.hasExplicitSubject(extracted),
      fallback: chosen === undefined,
    };
  }

  private planByKeywords(query: string, implicit: QueryFilters): PlanResult {
    const settings = this.config.settings;
    const enabled = this.toolManager.getEnabledTools();
    const extracted = this.entityExtractor.extract(query);
    const matches = this.matcher.match(query, this.config.patterns);
    const usable = (descriptor: EndpointDescriptor) => this.isUsable(descriptor, enabled);

    const candidates: Candidate[] = matches.flatMap((pattern) =>
      pattern.primary.filter(usable).map((descriptor) => ({ descriptor, pattern })),
    );
    const explicitSubject = this.entityExtractor.hasExplicitSubject(extracted);

    if (candidates.length === 0) {
      if (!settings.queryAllEnabled || enabled.length === 0) {
        throw new PlanningAmbiguousError(query, this.toolManager.getAliases());
      }
      const operations = enabled
        .filter((spec) => spec.adapter.capabilities.has('search'))
        .map((spec) =>
          this.buildOperation(
            spec.name,
            'search',
            { q: query },
            `No query pattern matched; searching ${spec.name}`,
            undefined,
            extracted,
            implicit,
          ),
        );
      return {
        query,
        operations,
        followUps: [],
        matchedPatterns: matches.map((pattern) => pattern.name),
        explicitSubject,
        fallback: true,
      };
    }

    const selected: Candidate[] = settings.aggregateMatches ? [...candidates] : [candidates[0]];
    if (settings.queryAllEnabled) {
      for (const spec of enabled) {
        if (selected.some((candidate) => candidate.descriptor.tool === spec.name)) continue;
        const first = candidates.find((candidate) => candidate.descriptor.tool === spec.name);
        if (first) selected.push(first);
      }
    }

    const operations = dedupe(selected.map((candidate) => this.toOperation(candidate, extracted, implicit)));
    const followUps = this.collectFollowUps(matches, usable, operations, extracted, implicit);

    return {
      query,
      operations,
      followUps,
      matchedPatterns: matches.map((pattern) => pattern.name),
      explicitSubject,
      fallback: false,
    };
  }

  private isUsable(descriptor: EndpointDescriptor, enabled: ToolSpec[]): boolean {
    const spec = enabled.find((candidate) => candidate.name === descriptor.tool);
    if (!spec) {
      this.logger.warn(`Skipping ${descriptor.operation} on ${descriptor.tool}: tool is not registered or enabled`);
      return false;
    }
    if (!spec.adapter.capabilities.has(descriptor.operation)) {
      this.logger.warn(`Skipping ${descriptor.operation} on ${descriptor.tool}: operation not supported`);
      return false;
    }
    return true;
  }

  private collectFollowUps(
    matches: QueryPattern[],
    accept: (descriptor: EndpointDescriptor) => boolean,
    now: PlannedOperation[],
    extracted: QueryFilters,
    implicit: QueryFilters,
  ): PlannedOperation[] {
    const scheduled = new Set(now.map(operationKey));
    const followUps = matches.flatMap((pattern) =>
      pattern.secondary
        .filter(accept)
        .map((descriptor) => this.toOperation({ descriptor, pattern }, extracted, implicit)),
    );
    return dedupe(followUps).filter((operation) => !scheduled.has(operationKey(operation)));
  }

  private toOperation(candidate: Candidate, extracted: QueryFilters, implicit: QueryFilters): PlannedOperation {
    const { descriptor, pattern } = candidate;
    return this.buildOperation(
      descriptor.tool,
      descriptor.operation,
      descriptor.filters,
      descriptor.justification,
      pattern.name,
      extracted,
      implicit,
    );
  }

  /**
   * Descriptor filters first; extracted entities override; implicit context
   * only fills keys still unset. Only keys the operation accepts are merged.
   */
  private buildOperation(
    tool: string,
    operation: ToolOperation,
    baseFilters: QueryFilters,
    justification: string,
    pattern: string | undefined,
    extracted: QueryFilters,
    implicit: QueryFilters,
  ): PlannedOperation {
    const filters: QueryFilters = { ...baseFilters };
    const accepted = OPERATION_FILTER_KEYS[operation];

    for (const key of accepted) {
      const value = extracted[key];
      if (value !== undefined) filters[key] = value;
    }
    for (const key of accepted) {
      const value = implicit[key];
      if (filters[key] === undefined && value !== undefined) filters[key] = value;
    }

    return pattern === undefined
      ? { tool, operation, filters, justification }
      : { tool, operation, filters, justification, pattern };
  }
}

/** A pattern's primary operation served by the directive's tool instead */
function retarget(descriptor: EndpointDescriptor, tool: string): EndpointDescriptor {
  return {
    ...descriptor,
    tool,
    justification: `${descriptor.operation} answered by ${tool} as directed (pattern default: ${descriptor.tool})`,
  };
}

function operationKey(operation: PlannedOperation): string {
  return `${operation.tool}|${operation.operation}`;
}

function dedupe(operations: PlannedOperation[]): PlannedOperation[] {
  const seen = new Set<string>();
  return operations.filter((operation) => {
    const key = operationKey(operation);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function describe(operation: PlannedOperation): string {
  return `${operation.tool}.${operation.operation}(${JSON.stringify(operation.filters)})`;
}
