import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { z } from 'zod';
import { AGENT_CONFIG, CHAT_COMPLETION_CLIENT } from '../config/constants';
import { ConfigurationError, LlmError } from '../errors/network-agent.errors';
import {
  AgentConfig,
  AgentDecision,
  Observation,
  PlannedOperation,
  PlanResult,
  ReasoningProvider,
  ReasoningRequest,
  TOOL_OPERATIONS,
} from '../interfaces';

/**
 * The one chat completions call the agent makes. OpenAI's client satisfies it;
 * tests pass a jest.fn().
 */
export interface ChatCompletionClient {
  create(params: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

export const EXECUTE_QUERY_PLAN = 'execute_query_plan';
export const QUERY_NETWORK_TOOL = 'query_network_tool';

const SYSTEM_PROMPT = `You are a network operations assistant answering questions about network infrastructure.
You cannot see the network directly. Gather data with the functions provided, then answer.

- Call ${EXECUTE_QUERY_PLAN} to run the operations already planned for the question.
- Call ${QUERY_NETWORK_TOOL} to call one tool directly when the plan is not enough.
  Use tool "all" to ask every enabled tool.
- Answer only from the data you gathered. Say so when a tool failed or returned nothing.
- When you have enough information, reply with the final answer as plain text and no function call.`;

const FILTERS_JSON_SCHEMA = {
  type: 'object',
  description: 'Filters such as device, site, rack, ip, severity, metric_type or q',
  additionalProperties: {
    anyOf: [
      { type: 'string' },
      { type: 'number' },
      { type: 'boolean' },
      { type: 'array', items: { type: 'string' } },
    ],
  },
};

export const AGENT_TOOLS: ChatCompletionTool[] = [
  {
    type: 'function',
    function: {
      name: EXECUTE_QUERY_PLAN,
      description: 'Run the planned operations for the question, or plan and run a narrower sub-query.',
      parameters: {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'Optional sub-query to plan instead of the original question' },
        },
      },
    },
  },
  {
    type: 'function',
    function: {
      name: QUERY_NETWORK_TOOL,
      description: 'Call one operation on a network tool by name or alias, or on "all" enabled tools.',
      parameters: {
        type: 'object',
        properties: {
          tool: { type: 'string' },
          operation: { type: 'string', enum: [...TOOL_OPERATIONS] },
          filters: FILTERS_JSON_SCHEMA,
        },
        required: ['tool', 'operation'],
      },
    },
  },
];

const PlanArgsSchema = z.object({
  query: z.string().min(1).optional(),
});

const ToolArgsSchema = z.object({
  tool: z.string().min(1),
  operation: z.enum(TOOL_OPERATIONS),
  filters: z.record(z.union([z.string(), z.number(), z.boolean(), z.array(z.string())])).default({}),
});

/**
 * LlmClientService - reasoning step backed by an OpenAI-compatible chat API
 *
 * Every step replays the whole exchange: the question and plan, then one
 * assistant tool call plus its tool message per observation so far.
 */
@Injectable()
export class LlmClientService implements ReasoningProvider {
  private readonly logger = new Logger(LlmClientService.name);
  private readonly client: ChatCompletionClient;

  constructor(
    @Inject(AGENT_CONFIG) private readonly config: AgentConfig,
    @Optional() @Inject(CHAT_COMPLETION_CLIENT) client?: ChatCompletionClient,
  ) {
    this.client = client ?? this.createOpenAiClient();
  }

  async reason(request: ReasoningRequest): Promise<AgentDecision> {
    const messages = this.buildMessages(request);
    this.logger.debug(`Reasoning step ${request.observations.length + 1} (${messages.length} messages)`);

    let completion: ChatCompletion;
    try {
      completion = await this.client.create({
        model: this.config.llm.model,
        temperature: this.config.llm.temperature,
        messages,
        tools: AGENT_TOOLS,
        tool_choice: 'auto',
      });
    } catch (error) {
      throw new LlmError(
        `Chat completion failed: ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    }

    const message = completion.choices[0]?.message;
    if (!message) {
      throw new LlmError('Chat completion returned no choices');
    }

    const toolCall = message.tool_calls?.[0];
    if (toolCall) {
      return this.parseToolCall(toolCall, message.content?.trim() || undefined);
    }
    return { type: 'final', answer: (message.content ?? '').trim() };
  }

  buildMessages(request: ReasoningRequest): ChatCompletionMessageParam[] {
    const catalog = request.toolCatalog
      .map((entry) => {
        const aliases = entry.aliases.length > 0 ? ` (aliases: ${entry.aliases.join(', ')})` : '';
        return `- ${entry.name}${aliases}: ${entry.operations.join(', ')}`;
      })
      .join('\n');

    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: `${SYSTEM_PROMPT}\n\nAvailable tools:\n${catalog || '(none)'}` },
      {
        role: 'user',
        content: [
          `Question: ${request.query}`,
          renderPlan(request.plan),
          request.contextSummary,
        ].join('\n\n'),
      },
    ];

    for (const observation of request.observations) {
      messages.push({
        role: 'assistant',
        content: observation.thought ?? null,
        tool_calls: [
          {
            id: observation.callId,
            type: 'function',
            function: { name: observation.functionName, arguments: observation.arguments },
          },
        ],
      });
      messages.push({
        role: 'tool',
        tool_call_id: observation.callId,
        content: this.renderObservation(observation),
      });
    }

    return messages;
  }

  renderObservation(observation: Observation): string {
    const { includeToolSource, maxObservationChars } = this.config.settings;
    const payload = {
      ...(observation.error ? { error: observation.error } : {}),
      results: observation.results.map((result) =>
        result.ok
          ? {
              tool: result.tool,
              operation: result.operation,
              ok: true,
              count: result.records.length,
              records: result.records.map((record) =>
                includeToolSource ? { ...record.fields, source: record.tool } : record.fields,
              ),
            }
          : { tool: result.tool, operation: result.operation, ok: false, error: result.error },
      ),
    };

    const text = JSON.stringify(payload);
    if (text.length <= maxObservationChars) {
      return text;
    }
    return `${text.slice(0, maxObservationChars)}\n...[truncated ${text.length - maxObservationChars} characters]`;
  }

  private parseToolCall(call: ChatCompletionMessageToolCall, thought: string | undefined): AgentDecision {
    const functionName = call.function.name;
    const rawArguments = call.function.arguments;
    const meta = { callId: call.id, functionName, rawArguments, thought };

    let args: unknown;
    try {
      args = rawArguments.trim() ? JSON.parse(rawArguments) : {};
    } catch (error) {
      return {
        ...meta,
        type: 'invalid_action',
        reason: `Arguments are not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      };
    }

    if (functionName === EXECUTE_QUERY_PLAN) {
      const parsed = PlanArgsSchema.safeParse(args);
      if (!parsed.success) {
        return { ...meta, type: 'invalid_action', reason: formatIssues(parsed.error) };
      }
      return { ...meta, type: 'action', action: { type: 'plan', query: parsed.data.query } };
    }

    if (functionName === QUERY_NETWORK_TOOL) {
      const parsed = ToolArgsSchema.safeParse(args);
      if (!parsed.success) {
        return { ...meta, type: 'invalid_action', reason: formatIssues(parsed.error) };
      }
      return { ...meta, type: 'action', action: { type: 'tool', ...parsed.data } };
    }

    return { ...meta, type: 'invalid_action', reason: `Unknown function "${functionName}"` };
  }

  private createOpenAiClient(): ChatCompletionClient {
    const { apiKey, baseUrl, timeoutSeconds } = this.config.llm;
    if (!apiKey && !baseUrl) {
      throw new ConfigurationError('OPENAI_API_KEY is not set (or set OPENAI_API_BASE for a local endpoint)');
    }

    const openai = new OpenAI({
      // Local OpenAI-compatible servers accept any key
      apiKey: apiKey || 'unused',
      baseURL: baseUrl,
      timeout: timeoutSeconds * 1000,
      maxRetries: this.config.settings.maxRetries,
    });
    return { create: (params) => openai.chat.completions.create(params) };
  }
}

function renderPlan(plan: PlanResult): string {
  const line = (operation: PlannedOperation) =>
    `- ${operation.tool}.${operation.operation} ${JSON.stringify(operation.filters)}: ${operation.justification}`;

  const sections = [`Planned operations:\n${plan.operations.map(line).join('\n') || '(none)'}`];
  if (plan.followUps.length > 0) {
    sections.push(`Follow-ups once those succeed:\n${plan.followUps.map(line).join('\n')}`);
  }
  if (plan.fallback) {
    sections.push('No query pattern matched; the plan falls back to a search.');
  }
  return sections.join('\n');
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; ');
}
