import { jsonResponse, makeToolConfig } from '../testing/fixtures';
import { LibrenmsAdapter } from './librenms.adapter';

describe('LibrenmsAdapter', () => {
  const originalFetch = global.fetch;
  let fetchMock: jest.Mock;
  let adapter: LibrenmsAdapter;

  /** Answer by path prefix; anything unrouted is a 404 */
  const route = (routes: Record<string, unknown>) => {
    fetchMock.mockImplementation((url: string) => {
      const path = url.replace('http://librenms.test/', '').split('?')[0];
      return Promise.resolve(path in routes ? jsonResponse(routes[path]) : jsonResponse({ status: 'error' }, 404));
    });
  };

  const requestedUrls = (): string[] => fetchMock.mock.calls.map((call) => call[0]);

  beforeEach(() => {
    fetchMock = jest.fn().mockResolvedValue(jsonResponse({ status: 'ok' }));
    global.fetch = fetchMock;
    adapter = new LibrenmsAdapter(
      'librenms',
      makeToolConfig('librenms', {
        settings: { alert_severity_mapping: { high: 'critical', medium: 'warning' } },
      }),
    );
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('supports every operation and authenticates with X-Auth-Token', async () => {
    await adapter.validateConnection();

    expect(adapter.capabilities.size).toBe(7);
    expect(requestedUrls()).toEqual(['http://librenms.test/api/v0/system']);
    expect(fetchMock.mock.calls[0][1].headers).toMatchObject({ 'X-Auth-Token': 'test-token' });
  });

  describe('get_devices', () => {
    it('fetches each named device', async () => {
      route({
        'api/v0/devices/sw-01': { devices: [{ device_id: 1, hostname: 'sw-01' }] },
        'api/v0/devices/sw-02': { devices: [{ device_id: 2, hostname: 'sw-02' }] },
      });

      const records = await adapter.invoke('get_devices', { device: ['sw-01', 'sw-02'] });

      expect(records).toEqual([
        { device_id: 1, hostname: 'sw-01' },
        { device_id: 2, hostname: 'sw-02' },
      ]);
    });

    it('looks devices up by location', async () => {
      route({ 'api/v0/devices': { devices: [] } });

      await adapter.invoke('get_devices', { site: 'DC1' });

      expect(requestedUrls()).toEqual(['http://librenms.test/api/v0/devices?type=location&query=DC1']);
    });

    it('lists all devices without filters', async () => {
      route({ 'api/v0/devices': { devices: [{ hostname: 'sw-01' }] } });

      await expect(adapter.invoke('get_devices')).resolves.toEqual([{ hostname: 'sw-01' }]);
    });
  });

  it('annotates per-device ports with the hostname', async () => {
    route({ 'api/v0/devices/sw-01/ports': { ports: [{ ifName: 'Gi0/1', ifOperStatus: 'up' }] } });

    const records = await adapter.invoke('get_interfaces', { device: 'sw-01' });

    expect(records).toEqual([{ ifName: 'Gi0/1', ifOperStatus: 'up', hostname: 'sw-01' }]);
  });

  describe('get_alerts', () => {
    it('maps severity through the configured mapping', async () => {
      route({ 'api/v0/alerts': { alerts: [] } });

      await adapter.invoke('get_alerts', { severity: 'high' });

      expect(requestedUrls()).toEqual(['http://librenms.test/api/v0/alerts?severity=critical']);
    });

    it('keeps only alerts for the requested devices', async () => {
      route({
        'api/v0/alerts': {
          alerts: [
            { id: 1, hostname: 'sw-01' },
            { id: 2, hostname: 'sw-02' },
          ],
        },
      });

      await expect(adapter.invoke('get_alerts', { device: 'sw-02' })).resolves.toEqual([{ id: 2, hostname: 'sw-02' }]);
    });
  });

  it('reads links for all devices or for one', async () => {
    route({
      'api/v0/resources/links': { links: [{ id: 1 }, { id: 2 }] },
      'api/v0/devices/sw-01/links': { links: [{ id: 1 }] },
    });

    await expect(adapter.invoke('get_topology')).resolves.toHaveLength(2);
    await expect(adapter.invoke('get_topology', { device: 'sw-01' })).resolves.toEqual([{ id: 1 }]);
  });

  describe('get_device_config', () => {
    it('returns one record per device', async () => {
      route({ 'api/v0/oxidized/config/sw-01': { status: 'ok', config: 'hostname sw-01' } });

      await expect(adapter.invoke('get_device_config', { device: 'sw-01' })).resolves.toEqual([
        { hostname: 'sw-01', config: 'hostname sw-01' },
      ]);
    });

    it('needs a device', async () => {
      await expect(adapter.invoke('get_device_config')).rejects.toMatchObject({ kind: 'NotFound' });
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('get_performance_metrics', () => {
    beforeEach(() => {
      route({
        'api/v0/devices/sw-01/health': {
          graphs: [
            { name: 'device_processor', desc: 'Processors' },
            { name: 'device_mempool', desc: 'Memory Pools' },
          ],
        },
        'api/v0/devices/sw-01/ports': { ports: [{ ifName: 'Gi0/1', ifInOctets_rate: 1200 }] },
      });
    });

    it('combines health graphs and port rates', async () => {
      const records = await adapter.invoke('get_performance_metrics', { device: 'sw-01' });

      expect(records).toEqual([
        { name: 'device_processor', desc: 'Processors', type: 'health', hostname: 'sw-01' },
        { name: 'device_mempool', desc: 'Memory Pools', type: 'health', hostname: 'sw-01' },
        { ifName: 'Gi0/1', ifInOctets_rate: 1200, type: 'interface', hostname: 'sw-01' },
      ]);
    });

    it('narrows health graphs by metric type', async () => {
      const records = await adapter.invoke('get_performance_metrics', { device: 'sw-01', metric_type: 'processor' });

      expect(records).toEqual([{ name: 'device_processor', desc: 'Processors', type: 'health', hostname: 'sw-01' }]);
      expect(requestedUrls()).toEqual(['http://librenms.test/api/v0/devices/sw-01/health']);
    });

    it('keeps the devices that answered when another is unknown', async () => {
      const records = await adapter.invoke('get_performance_metrics', {
        device: ['sw-01', 'sw-02'],
        metric_type: 'processor',
      });

      expect(records).toEqual([{ name: 'device_processor', desc: 'Processors', type: 'health', hostname: 'sw-01' }]);
      expect(requestedUrls()).toEqual([
        'http://librenms.test/api/v0/devices/sw-01/health',
        'http://librenms.test/api/v0/devices/sw-02/health',
      ]);
    });

    it('fails when no device answered', async () => {
      await expect(
        adapter.invoke('get_performance_metrics', { device: ['sw-08', 'sw-09'], metric_type: 'processor' }),
      ).rejects.toMatchObject({ kind: 'NotFound' });
    });
  });

  it('searches by hostname', async () => {
    route({ 'api/v0/devices': { devices: [] } });

    await adapter.invoke('search', { q: 'core' });

    expect(requestedUrls()).toEqual(['http://librenms.test/api/v0/devices?type=hostname&query=core']);
  });

  it('surfaces a missing device as NotFound', async () => {
    route({});

    await expect(adapter.invoke('get_devices', { device: 'ghost' })).rejects.toMatchObject({ kind: 'NotFound' });
  });
});
