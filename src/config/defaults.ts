import type { RawRecord } from '../interfaces';

/**
 * Lowest configuration layer. Tool credentials never have defaults; they come
 * from tool config files, the dotenv file or the environment.
 */
export function defaultRawConfig(): RawRecord {
  return {
    tools: {
      netbox: {
        enabled: true,
        adapter: 'netbox',
        aliases: ['nx', 'nbox'],
        mappings_file: 'mappings/netbox_mappings.yaml',
      },
      librenms: {
        enabled: true,
        adapter: 'librenms',
        aliases: ['libre', 'lnms'],
        mappings_file: 'mappings/librenms_mappings.yaml',
        settings: {
          alert_severity_mapping: {
            critical: 'critical',
            high: 'critical',
            warning: 'warning',
            medium: 'warning',
            ok: 'ok',
            low: 'ok',
          },
        },
      },
    },
    semantic_mappings_file: 'semantic_mappings.yaml',
  };
}

/**
 * Environment variable -> dotted path in the raw configuration document.
 */
export const ENV_MAPPINGS: Readonly<Record<string, string>> = {
  NETBOX_URL: 'tools.netbox.api.url',
  NETBOX_TOKEN: 'tools.netbox.api.token',
  NETBOX_TIMEOUT: 'tools.netbox.api.timeout',
  NETBOX_ENABLED: 'tools.netbox.enabled',
  LIBRENMS_URL: 'tools.librenms.api.url',
  LIBRENMS_TOKEN: 'tools.librenms.api.token',
  LIBRENMS_TIMEOUT: 'tools.librenms.api.timeout',
  LIBRENMS_ENABLED: 'tools.librenms.enabled',
  OPENAI_API_KEY: 'llm.api_key',
  OPENAI_API_BASE: 'llm.api_base',
  LLM_MODEL: 'llm.model',
  LLM_TEMPERATURE: 'llm.temperature',
  LLM_TIMEOUT: 'llm.timeout_seconds',
  QUERY_ALL_ENABLED: 'settings.default_behavior.query_all_enabled',
  CONCURRENT_QUERIES: 'settings.default_behavior.concurrent_queries',
  TOOL_TIMEOUT: 'settings.default_behavior.timeout_seconds',
  CACHE_DURATION_MINUTES: 'settings.default_behavior.cache_duration_minutes',
  CONTEXT_TIMEOUT: 'settings.default_behavior.context_timeout',
  MAX_ITERATIONS: 'settings.default_behavior.max_iterations',
  MAX_RETRIES: 'settings.default_behavior.max_retries',
  LOG_LEVEL: 'logging.level',
};
