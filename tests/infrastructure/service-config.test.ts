import { describe, it, expect } from 'vitest';
import { loadServiceConfig } from '../../src/infrastructure/config/service-config.js';

describe('loadServiceConfig', () => {
  it('should return defaults for an empty environment', () => {
    expect(loadServiceConfig({})).toEqual({
      eventDefinitionsFile: 'event_definitions.yaml',
      allowDroppingOfNotifications: false,
      storeEvents: true,
      redisUrl: 'redis://localhost:6379',
      streams: {
        notifications: 'notifications_stream',
        events: 'events_stream',
        deadLetter: 'notifications_dlq',
      },
      workerId: 'worker-1',
      logLevel: 'info',
      host: '0.0.0.0',
      port: 3000,
    });
  });

  it('should read every variable', () => {
    const config = loadServiceConfig({
      EVENT_DEFINITIONS_FILE: '/etc/converter/defs.yaml',
      ALLOW_DROPPING_OF_NOTIFICATIONS: 'true',
      STORE_EVENTS: 'no',
      REDIS_URL: 'redis://cache:6380',
      NOTIFICATION_STREAM: 'in',
      EVENT_STREAM: 'out',
      DEAD_LETTER_STREAM: 'dlq',
      WORKER_ID: 'worker-7',
      LOG_LEVEL: 'debug',
      HOST: '127.0.0.1',
      PORT: '8080',
    });

    expect(config.eventDefinitionsFile).toBe('/etc/converter/defs.yaml');
    expect(config.allowDroppingOfNotifications).toBe(true);
    expect(config.storeEvents).toBe(false);
    expect(config.redisUrl).toBe('redis://cache:6380');
    expect(config.streams).toEqual({ notifications: 'in', events: 'out', deadLetter: 'dlq' });
    expect(config.workerId).toBe('worker-7');
    expect(config.logLevel).toBe('debug');
    expect(config.host).toBe('127.0.0.1');
    expect(config.port).toBe(8080);
  });

  it.each([
    { raw: '1', expected: true },
    { raw: 'YES', expected: true },
    { raw: ' on ', expected: true },
    { raw: '0', expected: false },
    { raw: 'off', expected: false },
    { raw: '', expected: false },
  ])('should parse ALLOW_DROPPING_OF_NOTIFICATIONS=$raw as $expected', ({ raw, expected }) => {
    expect(loadServiceConfig({ ALLOW_DROPPING_OF_NOTIFICATIONS: raw }).allowDroppingOfNotifications).toBe(expected);
  });

  it('should fall back to the default for a blank value', () => {
    expect(loadServiceConfig({ REDIS_URL: '   ' }).redisUrl).toBe('redis://localhost:6379');
  });

  it('should reject a flag that is not a boolean', () => {
    expect(() => loadServiceConfig({ STORE_EVENTS: 'maybe' })).toThrow(
      "Invalid service configuration: Invalid STORE_EVENTS: Expected a boolean, received 'maybe'",
    );
  });

  it('should reject an unknown log level', () => {
    expect(() => loadServiceConfig({ LOG_LEVEL: 'verbose' })).toThrow(/Invalid LOG_LEVEL/);
  });

  it('should reject a port out of range', () => {
    expect(() => loadServiceConfig({ PORT: '70000' })).toThrow(/Invalid PORT/);
  });
});
