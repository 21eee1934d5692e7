// NetQuery - natural-language queries over network management tools
import 'reflect-metadata';

// Interfaces
export * from './interfaces';

// Errors
export * from './errors/network-agent.errors';

// Configuration
export { loadAgentConfig, LoadConfigOptions } from './config/config.loader';
export { AGENT_CONFIG, REASONING_PROVIDER, PATTERN_MATCHER, CHAT_COMPLETION_CLIENT } from './config/constants';

// Adapters
export { ADAPTER_CLASSES, BaseToolAdapter, NetboxAdapter, LibrenmsAdapter, NetworkClient } from './adapters';

// Services
export { ToolManagerService, DispatchTargets } from './services/tool-manager.service';
export { DataMapperService, OPERATION_RECORD_KINDS, resolvePath } from './services/data-mapper.service';
export { EntityExtractorService } from './services/entity-extractor.service';
export { PatternMatcher, KeywordPatternMatcher } from './services/pattern-matcher';
export { QueryPlannerService, OPERATION_FILTER_KEYS } from './services/query-planner.service';
export { ContextManagerService } from './services/context-manager.service';
export { LlmClientService, ChatCompletionClient, AGENT_TOOLS } from './services/llm-client.service';
export { ReactAgentService } from './services/react-agent.service';

// Facade
export { NetworkAgent, NetworkAgentOptions } from './network-agent';
