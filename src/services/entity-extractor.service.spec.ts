import { EntityExtractorService } from './entity-extractor.service';

describe('EntityExtractorService', () => {
  const service = new EntityExtractorService();

  it.each([
    ['show me all devices in rack A1', { rack: 'A1' }],
    ['Show me all devices with critical alerts', { severity: 'critical' }],
    ['what is connected to switch core-sw-01?', { device: 'core-sw-01' }],
    ['interfaces on router edge-1 and router edge-2', { device: ['edge-1', 'edge-2'] }],
    ['config for "dist sw 3"', { device: 'dist sw 3' }],
    ['which device has 10.20.0.5', { ip: '10.20.0.5' }],
    ['devices at site AMS-1', { site: 'AMS-1' }],
    ['cpu usage of host web-01', { device: 'web-01', metric_type: 'processor' }],
    ['What are their interface statuses?', {}],
    ['show switch ports that are down', {}],
  ])('extracts entities from "%s"', (query, expected) => {
    expect(service.extract(query)).toEqual(expected);
  });

  it('ignores apostrophes inside words', () => {
    expect(service.extract("what's the switch's uplink")).toEqual({});
  });

  it('treats rack, site, device and ip as explicit subjects', () => {
    expect(service.hasExplicitSubject({ rack: 'A1' })).toBe(true);
    expect(service.hasExplicitSubject({ ip: '10.0.0.1' })).toBe(true);
    expect(service.hasExplicitSubject({ severity: 'critical', metric_type: 'processor' })).toBe(false);
  });
});
