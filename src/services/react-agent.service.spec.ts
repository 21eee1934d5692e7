import { Test, TestingModule } from '@nestjs/testing';
import { AGENT_CONFIG, REASONING_PROVIDER } from '../config/constants';
import { AdapterError, ConfigurationError, LlmError } from '../errors/network-agent.errors';
import { AgentConfig, AgentDecision, LoopState, RawRecord, ReasoningRequest, ToolOperation } from '../interfaces';
import { bundledConfig, fakeAdapterClass, FakeHandler, hangUntilAborted } from '../testing/fixtures';
import { ContextManagerService } from './context-manager.service';
import { DataMapperService } from './data-mapper.service';
import { EntityExtractorService } from './entity-extractor.service';
import { QueryPlannerService } from './query-planner.service';
import { collectCaveats, ReactAgentService } from './react-agent.service';
import { ToolManagerService } from './tool-manager.service';

type Backend = Partial<Record<ToolOperation, RawRecord[] | Error | 'hang'>>;

const NETBOX_OPERATIONS: ToolOperation[] = ['get_devices', 'get_interfaces', 'get_alerts', 'get_topology', 'search'];

const planCall = (query?: string): AgentDecision => ({
  type: 'action',
  callId: 'call_plan',
  functionName: 'execute_query_plan',
  rawArguments: query ? JSON.stringify({ query }) : '{}',
  action: { type: 'plan', query },
});

const final = (answer: string): AgentDecision => ({ type: 'final', answer });

describe('ReactAgentService', () => {
  let agent: ReactAgentService;
  let reasoning: { reason: jest.Mock<Promise<AgentDecision>, [ReasoningRequest]> };
  let netbox: Backend;
  let librenms: Backend;
  let calls: Array<[string, ToolOperation, unknown]>;

  const backend = (name: string, data: () => Backend): FakeHandler => (operation, filters, options) => {
    calls.push([name, operation, filters]);
    const answer = data()[operation];
    if (answer === 'hang') return hangUntilAborted(options);
    if (answer instanceof Error) return Promise.reject(answer);
    return Promise.resolve(answer ?? []);
  };

  const build = async (configure: (config: AgentConfig) => void = () => undefined) => {
    const config = bundledConfig();
    configure(config);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReactAgentService,
        ToolManagerService,
        QueryPlannerService,
        ContextManagerService,
        DataMapperService,
        EntityExtractorService,
        { provide: AGENT_CONFIG, useValue: config },
        { provide: REASONING_PROVIDER, useValue: reasoning },
      ],
    }).compile();

    const tools = module.get<ToolManagerService>(ToolManagerService);
    tools.registerTool(
      'netbox',
      fakeAdapterClass('netbox', backend('netbox', () => netbox), NETBOX_OPERATIONS),
      config.tools.netbox,
    );
    tools.registerTool('librenms', fakeAdapterClass('librenms', backend('librenms', () => librenms)), config.tools.librenms);

    return module.get<ReactAgentService>(ReactAgentService);
  };

  beforeEach(async () => {
    reasoning = { reason: jest.fn() };
    netbox = {};
    librenms = {};
    calls = [];
    agent = await build();
  });

  describe('run', () => {
    it('executes the plan with its follow-ups and answers', async () => {
      netbox.get_devices = [{ id: 1, name: 'sw-01', status: { value: 'active' } }];
      librenms.get_alerts = [{ id: 9, hostname: 'sw-01', severity: 'critical' }];
      reasoning.reason.mockResolvedValueOnce(planCall()).mockResolvedValueOnce(final(' sw-01 has a critical alert. '));

      const result = await agent.run('Show me all devices with critical alerts');

      expect(result).toMatchObject({ state: LoopState.DONE, answer: 'sw-01 has a critical alert.', caveats: [], iterations: 2 });
      expect(calls).toEqual([
        ['netbox', 'get_devices', {}],
        ['librenms', 'get_alerts', { severity: 'critical' }],
        ['librenms', 'get_performance_metrics', { device: ['sw-01'] }],
      ]);
      expect(result.transitions.map((t) => t.to)).toEqual([
        LoopState.ACTING,
        LoopState.OBSERVING,
        LoopState.REASONING,
        LoopState.DONE,
      ]);
    });

    it('hands the model the observation from the previous step', async () => {
      netbox.get_devices = [{ id: 1, name: 'sw-01' }];
      reasoning.reason.mockResolvedValueOnce(planCall()).mockResolvedValueOnce(final('done'));

      await agent.run('@nx show me all devices in rack A1');

      const second = reasoning.reason.mock.calls[1][0];
      expect(second.observations).toHaveLength(1);
      expect(second.observations[0].results[0]).toMatchObject({
        ok: true,
        tool: 'netbox',
        records: [{ tool: 'netbox', kind: 'device', fields: expect.objectContaining({ id: 1, name: 'sw-01' }) }],
      });
      expect(second.toolCatalog.map((entry) => entry.name)).toEqual(['netbox', 'librenms']);
    });

    it('answers with a caveat when monitoring times out', async () => {
      agent = await build((config) => {
        config.tools.librenms.api.timeoutSeconds = 0.02;
      });
      netbox.get_devices = [{ id: 1, name: 'sw-01' }];
      librenms.get_alerts = 'hang';
      reasoning.reason.mockResolvedValueOnce(planCall()).mockResolvedValueOnce(final('sw-01 exists; alerts unavailable.'));

      const result = await agent.run('Show me all devices with critical alerts');

      expect(result.state).toBe(LoopState.DONE);
      expect(result.state === LoopState.DONE && result.caveats).toEqual([
        'librenms: get_alerts failed (Timeout): librenms did not answer get_alerts within 0.02s',
      ]);
    });

    it('lists devices on the aliased tool before fetching their health', async () => {
      librenms.get_devices = [{ device_id: 1, hostname: 'sw-01' }];
      reasoning.reason.mockResolvedValueOnce(planCall()).mockResolvedValueOnce(final('sw-01 is healthy.'));

      const result = await agent.run('@libre show me all devices');

      expect(result).toMatchObject({ state: LoopState.DONE, caveats: [] });
      expect(calls).toEqual([
        ['librenms', 'get_devices', {}],
        ['librenms', 'get_performance_metrics', { device: ['sw-01'] }],
      ]);
    });

    it('skips health for the aliased tool when it lists no devices', async () => {
      reasoning.reason.mockResolvedValueOnce(planCall()).mockResolvedValueOnce(final('No devices.'));

      const result = await agent.run('@libre show me all devices');

      expect(result).toMatchObject({ state: LoopState.DONE, caveats: [] });
      expect(calls).toEqual([['librenms', 'get_devices', {}]]);
    });

    it('runs a sub-query the model asks for', async () => {
      librenms.get_alerts = [];
      reasoning.reason.mockResolvedValueOnce(planCall('critical alerts')).mockResolvedValueOnce(final('No alerts.'));

      await agent.run('@nx show me all devices in rack A1');

      expect(calls).toEqual([['librenms', 'get_alerts', { severity: 'critical' }]]);
    });

    it('calls one tool directly by alias', async () => {
      reasoning.reason
        .mockResolvedValueOnce({
          type: 'action',
          callId: 'call_tool',
          functionName: 'query_network_tool',
          rawArguments: '{"tool":"lnms","operation":"get_device_config","filters":{"device":"sw-01"}}',
          action: { type: 'tool', tool: 'lnms', operation: 'get_device_config', filters: { device: 'sw-01' } },
        })
        .mockResolvedValueOnce(final('Config retrieved.'));

      await agent.run('@nx show me all devices in rack A1');

      expect(calls).toEqual([['librenms', 'get_device_config', { device: 'sw-01' }]]);
    });

    it('reports an unknown tool back to the model', async () => {
      reasoning.reason
        .mockResolvedValueOnce({
          type: 'action',
          callId: 'call_tool',
          functionName: 'query_network_tool',
          rawArguments: '{"tool":"zabbix","operation":"get_alerts"}',
          action: { type: 'tool', tool: 'zabbix', operation: 'get_alerts', filters: {} },
        })
        .mockResolvedValueOnce(final('Zabbix is not configured.'));

      const result = await agent.run('Show me all devices with critical alerts');

      expect(result.state).toBe(LoopState.DONE);
      expect(result.observations[0].error).toMatch(/^Unknown tool "zabbix"/);
    });

    it('does not count invalid actions as failed tool calls', async () => {
      const invalid: AgentDecision = {
        type: 'invalid_action',
        callId: 'call_bad',
        functionName: 'query_network_tool',
        rawArguments: '{',
        reason: 'Arguments are not valid JSON',
      };
      reasoning.reason.mockResolvedValueOnce(invalid).mockResolvedValueOnce(invalid).mockResolvedValueOnce(final('ok'));

      const result = await agent.run('Show me all devices with critical alerts');

      expect(result.state).toBe(LoopState.DONE);
      expect(result.observations[0].error).toBe('Invalid action: Arguments are not valid JSON');
    });

    it('stops after max_iterations reasoning steps', async () => {
      agent = await build((config) => {
        config.settings.maxIterations = 2;
      });
      reasoning.reason.mockResolvedValue(planCall());

      const result = await agent.run('Show me all devices with critical alerts');

      expect(result).toMatchObject({
        state: LoopState.FAILED,
        iterations: 2,
        error: { kind: 'ReasoningExhausted', message: 'No final answer after 2 reasoning steps' },
      });
      expect(reasoning.reason).toHaveBeenCalledTimes(2);
    });

    it('fails on an empty final answer', async () => {
      reasoning.reason.mockResolvedValueOnce(final('   '));

      const result = await agent.run('Show me all devices with critical alerts');

      expect(result).toMatchObject({ state: LoopState.FAILED, error: { kind: 'EmptyAnswer' } });
    });

    it('fails when the reasoning model errors', async () => {
      reasoning.reason.mockRejectedValueOnce(new LlmError('Chat completion failed: rate limited'));

      const result = await agent.run('Show me all devices with critical alerts');

      expect(result).toMatchObject({
        state: LoopState.FAILED,
        error: { kind: 'LlmError', message: 'Chat completion failed: rate limited' },
      });
    });

    it('propagates configuration errors', async () => {
      reasoning.reason.mockRejectedValueOnce(new ConfigurationError('OPENAI_API_KEY is not set'));

      await expect(agent.run('Show me all devices with critical alerts')).rejects.toThrow(ConfigurationError);
    });

    it('gives up after two consecutive actions where every call failed', async () => {
      const unauthorized = new AdapterError('Unauthorized', 'HTTP 403 Forbidden');
      netbox.get_devices = unauthorized;
      librenms.get_devices = unauthorized;
      reasoning.reason.mockResolvedValue({
        type: 'action',
        callId: 'call_all',
        functionName: 'query_network_tool',
        rawArguments: '{"tool":"all","operation":"get_devices"}',
        action: { type: 'tool', tool: 'all', operation: 'get_devices', filters: {} },
      });

      const result = await agent.run('Show me all devices with critical alerts');

      expect(result).toMatchObject({
        state: LoopState.FAILED,
        iterations: 2,
        error: {
          kind: 'Unauthorized',
          message: 'Every tool call failed on two consecutive attempts: HTTP 403 Forbidden',
        },
      });
    });

    it('fails planning without asking the model when no tool fits', async () => {
      agent = await build((config) => {
        config.settings.queryAllEnabled = false;
      });

      const result = await agent.run('what is going on');

      expect(result).toMatchObject({ state: LoopState.FAILED, error: { kind: 'PlanningAmbiguous' } });
      expect(reasoning.reason).not.toHaveBeenCalled();
    });

    it('scopes a follow-up question to the devices found before', async () => {
      netbox.get_devices = [
        { id: 1, name: 'sw-01' },
        { id: 2, name: 'sw-02' },
      ];
      reasoning.reason.mockResolvedValueOnce(planCall()).mockResolvedValueOnce(final('Two switches.'));
      await agent.run('Show me all devices in rack A1');

      calls = [];
      reasoning.reason.mockResolvedValueOnce(planCall()).mockResolvedValueOnce(final('All up.'));
      await agent.run('What are their interface statuses?');

      expect(calls).toEqual([
        ['netbox', 'get_interfaces', { device: ['sw-01', 'sw-02'] }],
        ['librenms', 'get_interfaces', { device: ['sw-01', 'sw-02'] }],
      ]);
    });
  });

  describe('executePlan', () => {
    it('skips device-scoped follow-ups when the primaries found no devices', async () => {
      const results = await agent.executePlan({
        query: 'devices in rack Z9',
        operations: [{ tool: 'netbox', operation: 'get_devices', filters: { rack: 'Z9' }, justification: 'x', pattern: 'device_inventory' }],
        followUps: [
          { tool: 'librenms', operation: 'get_performance_metrics', filters: {}, justification: 'y', pattern: 'device_inventory' },
        ],
        matchedPatterns: ['device_inventory'],
        explicitSubject: true,
        fallback: false,
      });

      expect(results).toHaveLength(1);
      expect(calls).toEqual([['netbox', 'get_devices', { rack: 'Z9' }]]);
    });

    it('runs follow-ups only for patterns whose primary succeeded', async () => {
      netbox.get_devices = new Error('connect ECONNREFUSED');
      librenms.get_alerts = [{ id: 9, hostname: 'sw-01' }];

      const results = await agent.executePlan({
        query: 'devices with critical alerts',
        operations: [
          { tool: 'netbox', operation: 'get_devices', filters: {}, justification: 'x', pattern: 'device_inventory' },
          { tool: 'librenms', operation: 'get_alerts', filters: {}, justification: 'y', pattern: 'alerts' },
        ],
        followUps: [
          { tool: 'librenms', operation: 'get_topology', filters: {}, justification: 'z', pattern: 'device_inventory' },
        ],
        matchedPatterns: ['device_inventory', 'alerts'],
        explicitSubject: false,
        fallback: false,
      });

      expect(results.map((r) => [r.tool, r.operation, r.ok])).toEqual([
        ['netbox', 'get_devices', false],
        ['librenms', 'get_alerts', true],
      ]);
    });
  });

  describe('collectCaveats', () => {
    it('lists each failed tool operation once', () => {
      const failure = {
        ok: false as const,
        tool: 'librenms',
        operation: 'get_alerts' as const,
        filters: {},
        durationMs: 1,
        error: { kind: 'Timeout' as const, message: 'slow' },
      };

      expect(
        collectCaveats([
          { callId: 'a', functionName: 'f', arguments: '{}', results: [failure] },
          { callId: 'b', functionName: 'f', arguments: '{}', results: [failure] },
        ]),
      ).toEqual(['librenms: get_alerts failed (Timeout): slow']);
    });
  });
});
