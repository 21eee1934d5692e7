/**
 * NetworkAgent - public entry point
 *
 * Wires the services by hand (no Nest application context) and turns loop
 * outcomes into either an answer string or a thrown NetworkAgentError.
 *
 * Usage:
 *   const agent = NetworkAgent.fromEnv();
 *   const answer = await agent.processQuery('@nx show me all devices in rack A1');
 */

import * as fs from 'fs';
import * as path from 'path';
import { Logger, LogLevel } from '@nestjs/common';
import { loadAgentConfig, LoadConfigOptions } from './config/config.loader';
import {
  AdapterError,
  EmptyAnswerError,
  LlmError,
  NetworkAgentError,
  PlanningAmbiguousError,
  ReasoningExhaustedError,
} from './errors/network-agent.errors';
import { AgentConfig, AgentRunResult, FailureKind, LoopState, ReasoningProvider } from './interfaces';
import { ContextManagerService } from './services/context-manager.service';
import { DataMapperService } from './services/data-mapper.service';
import { EntityExtractorService } from './services/entity-extractor.service';
import { ChatCompletionClient, LlmClientService } from './services/llm-client.service';
import { PatternMatcher } from './services/pattern-matcher';
import { QueryPlannerService } from './services/query-planner.service';
import { ReactAgentService } from './services/react-agent.service';
import { ToolManagerService } from './services/tool-manager.service';

export interface NetworkAgentOptions {
  /** Replaces the LLM-backed reasoning step entirely */
  reasoningProvider?: ReasoningProvider;
  /** OpenAI-compatible client for the default reasoning step */
  chatClient?: ChatCompletionClient;
  patternMatcher?: PatternMatcher;
}

const LOG_LEVEL_ORDER: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

export class NetworkAgent {
  private readonly logger = new Logger(NetworkAgent.name);

  private constructor(
    readonly config: AgentConfig,
    readonly toolManager: ToolManagerService,
    private readonly contextManager: ContextManagerService,
    private readonly loop: ReactAgentService,
  ) {}

  static fromConfig(config: AgentConfig, options: NetworkAgentOptions = {}): NetworkAgent {
    Logger.overrideLogger(LOG_LEVEL_ORDER.slice(0, LOG_LEVEL_ORDER.indexOf(config.logging.level) + 1));

    const toolManager = new ToolManagerService(config);
    toolManager.initialize();

    const entityExtractor = new EntityExtractorService();
    const planner = new QueryPlannerService(config, toolManager, entityExtractor, options.patternMatcher);
    const contextManager = new ContextManagerService(config, entityExtractor);
    const dataMapper = new DataMapperService(config);
    const reasoning = options.reasoningProvider ?? new LlmClientService(config, options.chatClient);
    const loop = new ReactAgentService(config, toolManager, planner, contextManager, dataMapper, reasoning);

    return new NetworkAgent(config, toolManager, contextManager, loop);
  }

  /**
   * Configure from the environment (and .env) over the bundled defaults
   */
  static fromEnv(
    options: NetworkAgentOptions & Pick<LoadConfigOptions, 'env' | 'envFile'> = {},
  ): NetworkAgent {
    return NetworkAgent.fromConfig(loadAgentConfig({ env: options.env, envFile: options.envFile }), options);
  }

  /**
   * @param configPath main YAML file, or a directory holding main.yaml
   */
  static fromConfigFile(
    configPath: string,
    options: NetworkAgentOptions & Pick<LoadConfigOptions, 'env' | 'envFile'> = {},
  ): NetworkAgent {
    const resolved = path.resolve(configPath);
    const isDirectory = fs.existsSync(resolved) && fs.statSync(resolved).isDirectory();
    const config = loadAgentConfig({
      configDir: isDirectory ? resolved : path.dirname(resolved),
      mainFile: isDirectory ? undefined : path.basename(resolved),
      env: options.env,
      envFile: options.envFile,
    });
    return NetworkAgent.fromConfig(config, options);
  }

  /**
   * Answer a question. Partial data is reported in a trailing "Caveats:"
   * section; a failed run throws the matching NetworkAgentError.
   */
  async processQuery(text: string): Promise<string> {
    const query = text.trim();
    const result = await this.run(query);

    if (result.state === LoopState.FAILED) {
      throw this.toError(query, result.error.kind, result.error.message, result.iterations);
    }

    if (result.caveats.length === 0) {
      return result.answer;
    }
    return `${result.answer}\n\nCaveats:\n${result.caveats.map((caveat) => `- ${caveat}`).join('\n')}`;
  }

  /**
   * Full loop outcome, including observations and state transitions
   */
  async run(text: string): Promise<AgentRunResult> {
    const query = text.trim();
    if (!query) {
      throw new NetworkAgentError('Query is empty', 'EMPTY_QUERY');
    }

    this.logger.log(`Query: ${query}`);
    const result = await this.loop.run(query);
    this.logger.debug(`Finished in ${result.durationMs}ms after ${result.iterations} reasoning steps (${result.state})`);
    return result;
  }

  validateConnections(): Promise<Record<string, boolean>> {
    return this.toolManager.validateConnections();
  }

  resetConversation(): void {
    this.contextManager.clear();
    this.logger.debug('Conversation context cleared');
  }

  private toError(query: string, kind: FailureKind, message: string, iterations: number): NetworkAgentError {
    switch (kind) {
      case 'ReasoningExhausted':
        return new ReasoningExhaustedError(iterations);
      case 'PlanningAmbiguous':
        return new PlanningAmbiguousError(query, this.toolManager.getAliases());
      case 'LlmError':
        return new LlmError(message);
      case 'EmptyAnswer':
        return new EmptyAnswerError();
      case 'NotFound':
      case 'Unauthorized':
      case 'Timeout':
      case 'BackendError':
        return new AdapterError(kind, message);
    }
  }
}
