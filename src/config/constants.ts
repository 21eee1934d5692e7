import * as path from 'path';

/** Injection token for the AgentConfig object */
export const AGENT_CONFIG = 'AGENT_CONFIG';

/** Injection token for the ReasoningProvider used by the loop */
export const REASONING_PROVIDER = 'REASONING_PROVIDER';

/** Injection token for a PatternMatcher replacing the keyword matcher */
export const PATTERN_MATCHER = 'PATTERN_MATCHER';

/** Injection token for an OpenAI-compatible chat client */
export const CHAT_COMPLETION_CLIENT = 'CHAT_COMPLETION_CLIENT';

/** config/ directory shipped with the package (mapping rules, semantic patterns) */
export const BUNDLED_CONFIG_DIR = path.resolve(__dirname, '..', '..', 'config');

export const MAIN_CONFIG_FILE = 'main.yaml';
