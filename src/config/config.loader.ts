/**
 * Layered configuration loader
 *
 * Precedence, highest first: process environment > dotenv file > YAML files > defaults.
 * main.yaml names per-tool config files and mapping files; tool config files may
 * reference ${VAR} placeholders, resolved against the same merged environment.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { Logger, LogLevel } from '@nestjs/common';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError } from '../errors/network-agent.errors';
import {
  AgentConfig,
  EndpointDescriptor,
  MappingRules,
  QueryPattern,
  RawRecord,
  RecordKind,
  ToolConfig,
  ToolMappings,
} from '../interfaces';
import { deepMerge, isRecord, setPath } from '../utils/records';
import { BUNDLED_CONFIG_DIR, MAIN_CONFIG_FILE } from './constants';
import { defaultRawConfig, ENV_MAPPINGS } from './defaults';
import { EnvSource, findMissingEnvVars, substituteEnvVars } from './env-substitution';
import { parseBoolish, RawAgentConfig, RawAgentConfigSchema } from './config.schema';

export interface LoadConfigOptions {
  /** Directory holding main.yaml. Omit to configure from the environment alone. */
  configDir?: string;
  /** Main file name inside configDir, main.yaml by default */
  mainFile?: string;
  /** Defaults to process.env */
  env?: EnvSource;
  /** dotenv file; defaults to .env in the working directory when present, false skips it */
  envFile?: string | false;
}

const logger = new Logger('ConfigLoader');

const LOG_LEVELS: Record<RawAgentConfig['logging']['level'], LogLevel> = {
  error: 'error',
  warn: 'warn',
  info: 'log',
  debug: 'debug',
  verbose: 'verbose',
};

const RECORD_KINDS: RecordKind[] = ['device', 'interface', 'alert', 'metric', 'topology', 'config'];

export function loadAgentConfig(options: LoadConfigOptions = {}): AgentConfig {
  const env = resolveEnvironment(options);
  const raw = defaultRawConfig();

  if (options.configDir) {
    deepMerge(raw, readYamlFile(path.join(options.configDir, options.mainFile ?? MAIN_CONFIG_FILE)));
  }

  // Applied before tool files so env-disabled tools are skipped, and again
  // afterwards so the environment wins over file values.
  applyEnvironment(raw, env);
  loadToolFiles(raw, options.configDir, env);
  loadSemanticMappings(raw, options.configDir);
  applyEnvironment(raw, env);

  const config = toAgentConfig(parseRaw(raw));
  assertToolCredentials(config);

  logger.debug(
    `Loaded configuration: ${Object.keys(config.tools).length} tools, ${config.patterns.length} query patterns`,
  );
  return config;
}

function resolveEnvironment(options: LoadConfigOptions): EnvSource {
  const base = options.env ?? process.env;
  if (options.envFile === false) {
    return { ...base };
  }

  const envFile = options.envFile ?? path.resolve(process.cwd(), '.env');
  if (!fs.existsSync(envFile)) {
    if (options.envFile !== undefined) {
      throw new ConfigurationError(`dotenv file not found: ${envFile}`);
    }
    return { ...base };
  }

  const fileValues = dotenv.parse(fs.readFileSync(envFile));
  return { ...fileValues, ...base };
}

function applyEnvironment(raw: RawRecord, env: EnvSource): void {
  for (const [name, configPath] of Object.entries(ENV_MAPPINGS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      setPath(raw, configPath, value);
    }
  }
}

function loadToolFiles(raw: RawRecord, configDir: string | undefined, env: EnvSource): void {
  const tools = raw.tools;
  if (!isRecord(tools)) return;

  const security = raw.security;
  const enableEnvVars = isRecord(security) ? parseBoolish(security.enable_env_vars) ?? true : true;

  for (const [name, tool] of Object.entries(tools)) {
    if (!isRecord(tool) || parseBoolish(tool.enabled) !== true) {
      continue;
    }

    if (typeof tool.config_file === 'string') {
      let toolFile = readYamlFile(resolveConfigPath(tool.config_file, configDir));
      if (enableEnvVars) {
        const missing = findMissingEnvVars(toolFile, env);
        if (missing.length > 0) {
          throw new ConfigurationError(
            `Missing environment variables for tool "${name}": ${missing.join(', ')}`,
          );
        }
        toolFile = substituteEnvVars(toolFile, env);
      }
      deepMerge(tool, toolFile);
    }

    if (typeof tool.mappings_file === 'string') {
      tool.mappings = readYamlFile(resolveConfigPath(tool.mappings_file, configDir));
    }
  }
}

function loadSemanticMappings(raw: RawRecord, configDir: string | undefined): void {
  if (typeof raw.semantic_mappings_file === 'string') {
    raw.semantic_mappings = readYamlFile(resolveConfigPath(raw.semantic_mappings_file, configDir));
  }
}

/**
 * Relative paths resolve against configDir, falling back to the bundled config/
 * directory for files the user did not provide.
 */
function resolveConfigPath(file: string, configDir: string | undefined): string {
  if (path.isAbsolute(file)) {
    return file;
  }
  if (configDir) {
    const candidate = path.join(configDir, file);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return path.join(BUNDLED_CONFIG_DIR, file);
}

export function readYamlFile(file: string): RawRecord {
  if (!fs.existsSync(file)) {
    throw new ConfigurationError(`Configuration file not found: ${file}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Error parsing ${file}: ${error instanceof Error ? error.message : String(error)}`,
      error,
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Expected a mapping at the top of ${file}`);
  }
  return parsed;
}

function parseRaw(raw: RawRecord): RawAgentConfig {
  const result = RawAgentConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, result.error);
  }
  return result.data;
}

function toAgentConfig(raw: RawAgentConfig): AgentConfig {
  const tools: Record<string, ToolConfig> = {};
  for (const [name, tool] of Object.entries(raw.tools)) {
    tools[name] = {
      adapter: tool.adapter,
      enabled: tool.enabled,
      aliases: tool.aliases,
      api: {
        url: tool.api.url,
        token: tool.api.token,
        timeoutSeconds: tool.api.timeout,
      },
      settings: tool.settings,
      mappings: toToolMappings(tool.mappings),
    };
  }

  const behavior = raw.settings.default_behavior;
  const format = raw.settings.response_format;

  return {
    tools,
    llm: {
      baseUrl: raw.llm.api_base,
      apiKey: raw.llm.api_key,
      model: raw.llm.model,
      temperature: raw.llm.temperature,
      timeoutSeconds: raw.llm.timeout_seconds,
    },
    settings: {
      queryAllEnabled: behavior.query_all_enabled,
      concurrentQueries: behavior.concurrent_queries,
      timeoutSeconds: behavior.timeout_seconds,
      cacheDurationMinutes: behavior.cache_duration_minutes,
      contextTimeout: behavior.context_timeout,
      maxHistory: behavior.max_history,
      maxRetries: behavior.max_retries,
      maxIterations: behavior.max_iterations,
      aggregateMatches: behavior.aggregate_matches,
      includeToolSource: format.include_tool_source,
      standardizeOutput: format.standardize_output,
      maxObservationChars: format.max_observation_chars,
    },
    patterns: toQueryPatterns(raw.semantic_mappings),
    logging: { level: LOG_LEVELS[raw.logging.level] },
  };
}

function toToolMappings(raw: RawAgentConfig['tools'][string]['mappings']): ToolMappings {
  const mappings: ToolMappings = {};
  for (const kind of RECORD_KINDS) {
    const rules: MappingRules | undefined = raw[kind]?.standard_fields;
    if (rules) {
      mappings[kind] = rules;
    }
  }
  return mappings;
}

function toQueryPatterns(raw: RawAgentConfig['semantic_mappings']): QueryPattern[] {
  return Object.entries(raw.query_patterns).map(([name, pattern]) => {
    const primary = Array.isArray(pattern.optimal_endpoints.primary)
      ? pattern.optimal_endpoints.primary
      : [pattern.optimal_endpoints.primary];

    const toDescriptor = (endpoint: (typeof primary)[number]): EndpointDescriptor => ({
      tool: endpoint.system,
      endpoint: endpoint.endpoint,
      operation: endpoint.operation,
      filters: endpoint.filters,
      justification: endpoint.purpose || `${endpoint.operation} on ${endpoint.system}`,
    });

    return {
      name,
      description: pattern.description,
      keywords: pattern.keywords.map((keyword) => keyword.toLowerCase()),
      primary: primary.map(toDescriptor),
      secondary: pattern.optimal_endpoints.secondary.map(toDescriptor),
    };
  });
}

function assertToolCredentials(config: AgentConfig): void {
  for (const [name, tool] of Object.entries(config.tools)) {
    if (!tool.enabled) continue;

    const missing = [
      tool.api.url ? null : 'api.url',
      tool.api.token ? null : 'api.token',
    ].filter((field): field is string => field !== null);

    if (missing.length > 0) {
      const prefix = name.toUpperCase();
      throw new ConfigurationError(
        `Tool "${name}" is enabled but ${missing.join(' and ')} ${missing.length > 1 ? 'are' : 'is'} not set ` +
          `(set ${prefix}_URL/${prefix}_TOKEN, or ${prefix}_ENABLED=false to disable it)`,
      );
    }
  }
}
