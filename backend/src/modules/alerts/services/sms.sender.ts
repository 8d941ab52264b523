/**
 * SMS SENDER
 * ==========
 *
 * Twilio Messages API over axios (form-encoded, basic auth). Sends are
 * serialized through the TWILIO limiter. Never throws: failures come back
 * as { success: false, error }.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type Bottleneck from 'bottleneck';
import { defaultLogger, type Logger } from '../../../common/logger.js';
import { createRateLimiter, RATE_LIMITS } from '../../../common/rate-limiter.js';
import type { SmsChannel, SmsResult } from '../contracts/alert.types.js';

const TWILIO_API = 'https://api.twilio.com/2010-04-01';

export interface SmsSenderConfig {
  enabled: boolean;
  accountSid: string;
  authToken: string;
  fromNumber: string;
  timeoutMs: number;
  adapter?: AxiosAdapter;
}

interface TwilioMessageResponse {
  sid?: string;
  status?: string;
}

function describeError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    const data: unknown = err.response?.data;
    if (typeof data === 'object' && data !== null && 'message' in data && typeof data.message === 'string') {
      return data.message;
    }
    return err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

export class SmsSender implements SmsChannel {
  private readonly client: AxiosInstance;
  private readonly limiter: Bottleneck;

  constructor(
    private readonly config: SmsSenderConfig,
    private readonly logger: Logger = defaultLogger,
  ) {
    this.client = axios.create({
      baseURL: TWILIO_API,
      timeout: config.timeoutMs,
      auth: { username: config.accountSid, password: config.authToken },
      adapter: config.adapter,
    });
    this.limiter = createRateLimiter('TWILIO', RATE_LIMITS.TWILIO, logger);
  }

  isConfigured(): boolean {
    return (
      this.config.enabled &&
      this.config.accountSid.length > 0 &&
      this.config.authToken.length > 0 &&
      this.config.fromNumber.length > 0
    );
  }

  async sendSms(phone: string, message: string): Promise<SmsResult> {
    if (!this.isConfigured()) {
      return { success: false, error: 'SMS channel not configured' };
    }

    const body = new URLSearchParams({ To: phone, From: this.config.fromNumber, Body: message });

    try {
      const response = await this.limiter.schedule(() =>
        this.client.post<TwilioMessageResponse>(
          `/Accounts/${encodeURIComponent(this.config.accountSid)}/Messages.json`,
          body.toString(),
          { headers: { 'Content-Type': 'application/x-www-form-urlencoded' } },
        ),
      );

      this.logger.info({ sid: response.data.sid, status: response.data.status }, '[SMS] Sent');
      return { success: true, id: response.data.sid };
    } catch (err) {
      const error = describeError(err);
      this.logger.error({ error }, '[SMS] Send failed');
      return { success: false, error };
    }
  }
}
