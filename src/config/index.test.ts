import { loadConfig } from './index';
import { ConfigError } from '../middleware/errorHandler';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      nodeEnv: 'development',
      port: 5000,
      apiVersion: 'v1',
      logLevel: 'info',
      corsOrigin: 'http://localhost:3050',
      rateLimitWindowMs: 900000,
      rateLimitMaxRequests: 100,
      uploadLimit: '10mb',
      roster: {
        groupSeparator: '/',
        reservedMarkers: ['Rank'],
        dutyCodesPath: undefined
      }
    });
    expect(Object.isFrozen(config.roster)).toBe(true);
  });

  it('reads roster settings from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'test',
      PORT: '8080',
      ROSTER_GROUP_SEPARATOR: '|',
      ROSTER_RESERVED_MARKERS: 'Rank, Legend ,',
      ROSTER_DUTY_CODES_PATH: '/etc/roster/codes.json'
    });

    expect(config.port).toBe(8080);
    expect(config.roster).toEqual({
      groupSeparator: '|',
      reservedMarkers: ['Rank', 'Legend'],
      dutyCodesPath: '/etc/roster/codes.json'
    });
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigError);
    expect(() => loadConfig({ ROSTER_GROUP_SEPARATOR: '' })).toThrow(/ROSTER_GROUP_SEPARATOR/);
  });
});
