import { z } from 'zod';
import { TOOL_OPERATIONS } from '../interfaces';

/**
 * Environment variables arrive as strings; YAML gives real booleans.
 */
export function parseBoolish(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
  return undefined;
}

const Boolish = z.preprocess((value) => parseBoolish(value) ?? value, z.boolean());

const FilterValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

const FiltersSchema = z.record(FilterValueSchema);

const StandardFieldsSchema = z.object({
  standard_fields: z.record(z.string()),
});

const ToolMappingsSchema = z
  .object({
    device: StandardFieldsSchema.optional(),
    interface: StandardFieldsSchema.optional(),
    alert: StandardFieldsSchema.optional(),
    metric: StandardFieldsSchema.optional(),
    topology: StandardFieldsSchema.optional(),
    config: StandardFieldsSchema.optional(),
  })
  .default({});

const ToolSchema = z.object({
  enabled: Boolish.default(false),
  adapter: z.enum(['netbox', 'librenms']),
  aliases: z.array(z.string().min(1)).default([]),
  config_file: z.string().optional(),
  mappings_file: z.string().optional(),
  api: z
    .object({
      url: z.string().default(''),
      token: z.string().default(''),
      timeout: z.coerce.number().positive().optional(),
    })
    .default({}),
  settings: z.record(z.unknown()).default({}),
  mappings: ToolMappingsSchema,
});

const EndpointSchema = z.object({
  system: z.string().min(1),
  endpoint: z.string().min(1),
  operation: z.enum(TOOL_OPERATIONS),
  filters: FiltersSchema.default({}),
  purpose: z.string().default(''),
});

const QueryPatternSchema = z.object({
  description: z.string().default(''),
  keywords: z.array(z.string().min(1)).min(1),
  optimal_endpoints: z.object({
    primary: z.union([EndpointSchema, z.array(EndpointSchema).min(1)]),
    secondary: z.array(EndpointSchema).default([]),
  }),
});

const SemanticMappingsSchema = z.object({
  query_patterns: z.record(QueryPatternSchema).default({}),
});

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'verbose']);

export const RawAgentConfigSchema = z.object({
  tools: z.record(ToolSchema).default({}),
  llm: z
    .object({
      model: z.string().min(1).default('gpt-4'),
      temperature: z.coerce.number().min(0).max(2).default(0),
      api_base: z.string().optional(),
      api_key: z.string().optional(),
      timeout_seconds: z.coerce.number().positive().default(60),
    })
    .default({}),
  semantic_mappings_file: z.string().optional(),
  semantic_mappings: SemanticMappingsSchema.default({}),
  settings: z
    .object({
      default_behavior: z
        .object({
          query_all_enabled: Boolish.default(true),
          concurrent_queries: Boolish.default(true),
          timeout_seconds: z.coerce.number().positive().default(30),
          cache_duration_minutes: z.coerce.number().min(0).default(5),
          context_timeout: z.coerce.number().positive().default(300),
          max_history: z.coerce.number().int().positive().default(10),
          max_retries: z.coerce.number().int().min(0).default(3),
          max_iterations: z.coerce.number().int().positive().default(8),
          aggregate_matches: Boolish.default(false),
        })
        .default({}),
      response_format: z
        .object({
          include_tool_source: Boolish.default(true),
          standardize_output: Boolish.default(true),
          max_observation_chars: z.coerce.number().int().positive().default(20_000),
        })
        .default({}),
    })
    .default({}),
  logging: z
    .object({
      level: LogLevelSchema.default('info'),
    })
    .default({}),
  security: z
    .object({
      enable_env_vars: Boolish.default(true),
    })
    .default({}),
});

export type RawAgentConfig = z.infer<typeof RawAgentConfigSchema>;
