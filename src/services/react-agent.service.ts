import { Inject, Injectable, Logger } from '@nestjs/common';
import { AGENT_CONFIG, REASONING_PROVIDER } from '../config/constants';
import {
  ConfigurationError,
  EmptyAnswerError,
  PlanningAmbiguousError,
  ReasoningExhaustedError,
  UnknownToolError,
} from '../errors/network-agent.errors';
import {
  AgentConfig,
  AgentDecision,
  AgentRunResult,
  FailureKind,
  LoopState,
  LoopTransition,
  NormalizedRecord,
  Observation,
  PlannedOperation,
  PlanResult,
  QueryFilters,
  ReasoningProvider,
  ToolInvocationResult,
  ToolOperation,
  ToolSpec,
} from '../interfaces';
import { ContextManagerService } from './context-manager.service';
import { DataMapperService } from './data-mapper.service';
import { DEVICE_SCOPED_OPERATIONS, OPERATION_FILTER_KEYS, QueryPlannerService } from './query-planner.service';
import { ToolManagerService } from './tool-manager.service';

type NormalizedResult = ToolInvocationResult<NormalizedRecord>;

interface RunState {
  state: LoopState;
  iterations: number;
  observations: Observation[];
  transitions: LoopTransition[];
  consecutiveFailures: number;
  startedAt: number;
}

interface OperationGroup {
  operation: ToolOperation;
  filters: QueryFilters;
  specs: ToolSpec[];
  indices: number[];
}

/**
 * ReactAgentService - the Reasoning -> Acting -> Observing loop
 *
 * One run per user query. The query is planned once up front; the reasoning
 * provider then decides whether to execute that plan, call a tool directly or
 * answer. Every observation is normalized and written to the conversation
 * context before the next reasoning step.
 *
 * Stops on: a non-empty final answer, max_iterations reasoning steps, two
 * consecutive actions whose calls all failed, or a reasoning provider error.
 */
@Injectable()
export class ReactAgentService {
  private readonly logger = new Logger(ReactAgentService.name);

  constructor(
    @Inject(AGENT_CONFIG) private readonly config: AgentConfig,
    private readonly toolManager: ToolManagerService,
    private readonly planner: QueryPlannerService,
    private readonly contextManager: ContextManagerService,
    private readonly dataMapper: DataMapperService,
    @Inject(REASONING_PROVIDER) private readonly reasoning: ReasoningProvider,
  ) {}

  async run(query: string): Promise<AgentRunResult> {
    const run: RunState = {
      state: LoopState.REASONING,
      iterations: 0,
      observations: [],
      transitions: [],
      consecutiveFailures: 0,
      startedAt: Date.now(),
    };

    let plan: PlanResult;
    try {
      plan = this.planner.plan(query, this.contextManager.resolveImplicit(query));
    } catch (error) {
      if (error instanceof PlanningAmbiguousError) {
        return this.fail(run, 'PlanningAmbiguous', error.message);
      }
      throw error;
    }

    const maxIterations = this.config.settings.maxIterations;

    for (;;) {
      if (run.iterations >= maxIterations) {
        return this.fail(run, 'ReasoningExhausted', new ReasoningExhaustedError(run.iterations).message);
      }
      run.iterations++;

      let decision: AgentDecision;
      try {
        decision = await this.reasoning.reason({
          query,
          plan,
          contextSummary: this.contextManager.summarize(),
          observations: [...run.observations],
          toolCatalog: this.toolManager.getCatalog(),
        });
      } catch (error) {
        if (error instanceof ConfigurationError) {
          throw error;
        }
        return this.fail(run, 'LlmError', error instanceof Error ? error.message : String(error));
      }

      if (decision.type === 'final') {
        if (!decision.answer.trim()) {
          return this.fail(run, 'EmptyAnswer', new EmptyAnswerError().message);
        }
        this.transition(run, LoopState.DONE);
        return {
          state: LoopState.DONE,
          answer: decision.answer.trim(),
          caveats: collectCaveats(run.observations),
          ...this.meta(run),
        };
      }

      this.transition(run, LoopState.ACTING);
      const observation = await this.act(decision, query, plan);

      this.transition(run, LoopState.OBSERVING);
      run.observations.push(observation);
      this.remember(query, observation);

      const fullyFailed = observation.results.length > 0 && observation.results.every((result) => !result.ok);
      if (fullyFailed) {
        run.consecutiveFailures++;
        if (run.consecutiveFailures >= 2) {
          const last = lastFailure(observation.results);
          return this.fail(
            run,
            last?.kind ?? 'BackendError',
            `Every tool call failed on two consecutive attempts: ${last?.message ?? 'unknown error'}`,
          );
        }
        this.logger.warn(`All calls for ${observation.functionName} failed; allowing one retry`);
      } else if (observation.results.some((result) => result.ok)) {
        run.consecutiveFailures = 0;
      }

      this.transition(run, LoopState.REASONING);
    }
  }

  private async act(decision: Exclude<AgentDecision, { type: 'final' }>, query: string, plan: PlanResult): Promise<Observation> {
    const observation: Observation = {
      callId: decision.callId,
      functionName: decision.functionName,
      arguments: decision.rawArguments,
      thought: decision.thought,
      results: [],
    };

    if (decision.type === 'invalid_action') {
      return { ...observation, error: `Invalid action: ${decision.reason}` };
    }

    const { action } = decision;
    try {
      if (action.type === 'plan') {
        const subPlan = action.query && action.query !== query
          ? this.planner.plan(action.query, this.contextManager.resolveImplicit(action.query))
          : plan;
        return { ...observation, results: await this.executePlan(subPlan) };
      }

      const targets = action.tool === 'all' ? 'all' : [this.toolManager.resolve(action.tool)];
      const results = await this.toolManager.dispatch(targets, action.operation, action.filters);
      return { ...observation, results: results.map((result) => this.normalize(result)) };
    } catch (error) {
      // Mistakes in the model's arguments are reported back to it
      if (error instanceof UnknownToolError || error instanceof PlanningAmbiguousError) {
        return { ...observation, error: error.message };
      }
      throw error;
    }
  }

  /**
   * Primary operations first, then follow-ups whose pattern produced at least
   * one successful primary. Follow-ups are scoped to the devices the primaries
   * returned.
   */
  async executePlan(plan: PlanResult): Promise<NormalizedResult[]> {
    const primaries = await this.runOperations(plan.operations);

    const succeeded = primaries.filter((result) => result.ok);
    if (succeeded.length === 0 || plan.followUps.length === 0) {
      return primaries;
    }

    const succeededPatterns = new Set(
      plan.operations
        .filter((_, index) => primaries[index].ok)
        .map((operation) => operation.pattern),
    );
    const entities = this.contextManager.entitiesFromRecords(
      succeeded.flatMap((result) => (result.ok ? result.records : [])),
    );

    const followUps: PlannedOperation[] = [];
    for (const followUp of plan.followUps) {
      if (followUp.pattern !== undefined && !succeededPatterns.has(followUp.pattern)) {
        continue;
      }

      const filters: QueryFilters = { ...followUp.filters };
      if (entities.device !== undefined && OPERATION_FILTER_KEYS[followUp.operation].includes('device')) {
        filters.device = entities.device;
      }
      if (DEVICE_SCOPED_OPERATIONS.has(followUp.operation) && filters.device === undefined) {
        this.logger.debug(`Skipping follow-up ${followUp.tool}.${followUp.operation}: no devices to scope it`);
        continue;
      }
      followUps.push({ ...followUp, filters });
    }

    return [...primaries, ...(await this.runOperations(followUps))];
  }

  /**
   * Operations sharing an operation and filters go out as one dispatch;
   * results come back in the order the operations were given.
   */
  private async runOperations(operations: PlannedOperation[]): Promise<NormalizedResult[]> {
    const groups = new Map<string, OperationGroup>();
    operations.forEach((planned, index) => {
      const key = `${planned.operation}|${JSON.stringify(planned.filters)}`;
      const group = groups.get(key) ?? { operation: planned.operation, filters: planned.filters, specs: [], indices: [] };
      group.specs.push(this.toolManager.resolve(planned.tool));
      group.indices.push(index);
      groups.set(key, group);
    });

    const ordered: NormalizedResult[] = new Array(operations.length);
    const runGroup = async (group: OperationGroup) => {
      const results = await this.toolManager.dispatch(group.specs, group.operation, group.filters);
      results.forEach((result, i) => {
        ordered[group.indices[i]] = this.normalize(result);
      });
    };

    if (this.config.settings.concurrentQueries) {
      await Promise.all(Array.from(groups.values()).map(runGroup));
    } else {
      for (const group of groups.values()) {
        await runGroup(group);
      }
    }
    return ordered;
  }

  private normalize(result: ToolInvocationResult): NormalizedResult {
    const mappings = this.toolManager.isRegistered(result.tool) ? this.toolManager.resolve(result.tool).mappings : {};
    return this.dataMapper.normalizeResult(result, mappings);
  }

  private remember(query: string, observation: Observation): void {
    const tools = Array.from(new Set(observation.results.map((result) => result.tool)));
    const records = observation.results.flatMap((result) => (result.ok ? result.records : []));
    this.contextManager.update(query, tools, this.contextManager.entitiesFromRecords(records));
  }

  private transition(run: RunState, to: LoopState): void {
    run.transitions.push({ from: run.state, to, iteration: run.iterations });
    this.logger.debug(`[${run.iterations}] ${run.state} -> ${to}`);
    run.state = to;
  }

  private fail(run: RunState, kind: FailureKind, message: string): AgentRunResult {
    this.transition(run, LoopState.FAILED);
    this.logger.error(`Query failed (${kind}): ${message}`);
    return { state: LoopState.FAILED, error: { kind, message }, ...this.meta(run) };
  }

  private meta(run: RunState) {
    return {
      iterations: run.iterations,
      observations: run.observations,
      transitions: run.transitions,
      durationMs: Date.now() - run.startedAt,
    };
  }
}

function lastFailure(results: NormalizedResult[]): { kind: FailureKind; message: string } | undefined {
  for (let i = results.length - 1; i >= 0; i--) {
    const result = results[i];
    if (!result.ok) return result.error;
  }
  return undefined;
}

/**
 * One line per failed (tool, operation), first failure wins
 */
export function collectCaveats(observations: Observation[]): string[] {
  const caveats = new Map<string, string>();
  for (const observation of observations) {
    for (const result of observation.results) {
      if (result.ok) continue;
      const key = `${result.tool}|${result.operation}`;
      if (!caveats.has(key)) {
        caveats.set(key, `${result.tool}: ${result.operation} failed (${result.error.kind}): ${result.error.message}`);
      }
    }
  }
  return Array.from(caveats.values());
}
