import { describe, it, expect } from 'vitest';
import { parseEnv } from '../env.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const env = parseEnv({});

    expect(env.PORT).toBe(8001);
    expect(env.ALERT_POLL_INTERVAL_MS).toBe(60_000);
    expect(env.ALERT_ERROR_BACKOFF_MS).toBe(30_000);
    expect(env.SMS_ENABLED).toBe(false);
    expect(env.WS_ENABLED).toBe(true);
    expect(env.PATTERN_BUFFER_SIZE).toBe(50);
  });

  it('coerces numbers and flags', () => {
    const env = parseEnv({ PORT: '9000', SMS_ENABLED: '1', ALERT_ENGINE_ENABLED: 'false' });

    expect(env.PORT).toBe(9000);
    expect(env.SMS_ENABLED).toBe(true);
    expect(env.ALERT_ENGINE_ENABLED).toBe(false);
  });

  it('fails on invalid values', () => {
    expect(() => parseEnv({ PORT: 'abc' })).toThrow(/\[Config\] Invalid environment: PORT/);
    expect(() => parseEnv({ SMS_ENABLED: 'yes' })).toThrow(/SMS_ENABLED/);
  });
});
