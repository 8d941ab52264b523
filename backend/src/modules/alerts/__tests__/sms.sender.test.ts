import { describe, it, expect, vi } from 'vitest';
import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import type { Logger } from '../../../common/logger.js';
import { SmsSender, type SmsSenderConfig } from '../services/sms.sender.js';

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

function sender(adapter: AxiosAdapter, overrides: Partial<SmsSenderConfig> = {}) {
  return new SmsSender(
    {
      enabled: true,
      accountSid: 'AC-test',
      authToken: 'test-secret',
      fromNumber: '+15550002222',
      timeoutMs: 1_000,
      adapter,
      ...overrides,
    },
    mockLogger,
  );
}

describe('SmsSender', () => {
  it('posts a form-encoded message with basic auth', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const sms = sender((config) => {
      seen.push(config);
      return Promise.resolve({
        data: { sid: 'SM-123', status: 'queued' },
        status: 201,
        statusText: 'Created',
        headers: {},
        config,
      });
    });

    const result = await sms.sendSms('+15550001111', 'Goal!');

    expect(result).toEqual({ success: true, id: 'SM-123' });
    expect(seen[0]?.method).toBe('post');
    expect(seen[0]?.url).toBe('/Accounts/AC-test/Messages.json');
    expect(seen[0]?.auth).toEqual({ username: 'AC-test', password: 'test-secret' });

    const form = new URLSearchParams(String(seen[0]?.data));
    expect(form.get('To')).toBe('+15550001111');
    expect(form.get('From')).toBe('+15550002222');
    expect(form.get('Body')).toBe('Goal!');
  });

  it('returns the provider message on rejection', async () => {
    const sms = sender((config) =>
      Promise.reject(
        new AxiosError('Request failed with status code 400', 'ERR_BAD_REQUEST', config, null, {
          data: { code: 21211, message: "The 'To' number is not valid" },
          status: 400,
          statusText: 'Bad Request',
          headers: {},
          config,
        }),
      ),
    );

    await expect(sms.sendSms('12', 'Goal!')).resolves.toEqual({
      success: false,
      error: "The 'To' number is not valid",
    });
  });

  it('does not call out when disabled or missing credentials', async () => {
    const adapter = vi.fn<AxiosAdapter>();

    const disabled = sender(adapter, { enabled: false });
    const noToken = sender(adapter, { authToken: '' });

    expect(disabled.isConfigured()).toBe(false);
    expect(noToken.isConfigured()).toBe(false);
    await expect(disabled.sendSms('+15550001111', 'x')).resolves.toEqual({
      success: false,
      error: 'SMS channel not configured',
    });
    expect(adapter).not.toHaveBeenCalled();
  });
});
