/**
 * Africa's Talking SMS client.
 *
 * POSTs form-encoded messages to /version1/messaging. A recipient status
 * code of 100-102 (processed, sent, queued) counts as delivered to the
 * network; anything else is reported as a failure.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { SendResult } from '../../../shared/types';
import { env } from '../../config/env';
import { moduleLogger } from '../../utils/logger';
import { describeSendError, MessageGateway, normalizePhoneNumber } from './gateway';

const log = moduleLogger('sms');

const API_TIMEOUT_MS = 30000;

export interface AfricasTalkingConfig {
  username?: string;
  apiKey?: string;
  senderId?: string;
  baseUrl: string;
  /** Preconfigured client; one is built from baseUrl otherwise */
  client?: AxiosInstance;
}

const messagingResponseSchema = z.object({
  SMSMessageData: z.object({
    Message: z.string().optional(),
    Recipients: z.array(
      z.object({
        statusCode: z.number(),
        number: z.string(),
        status: z.string(),
      })
    ),
  }),
});

export class AfricasTalkingSmsGateway implements MessageGateway {
  readonly channel = 'sms' as const;
  private readonly username: string | null;
  private readonly apiKey: string | null;
  private readonly senderId: string | null;
  private readonly client: AxiosInstance;

  constructor(config: AfricasTalkingConfig) {
    this.username = config.username || null;
    this.apiKey = config.apiKey || null;
    this.senderId = config.senderId || null;
    this.client =
      config.client ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: API_TIMEOUT_MS,
      });
  }

  get isConfigured(): boolean {
    return this.username !== null && this.apiKey !== null;
  }

  async send(phone: string, message: string): Promise<SendResult> {
    if (this.username === null || this.apiKey === null) {
      return { success: false, error: 'SMS service not configured properly' };
    }

    const recipient = normalizePhoneNumber(phone);
    const form = new URLSearchParams({ username: this.username, to: recipient, message });
    if (this.senderId) form.set('from', this.senderId);

    try {
      const response = await this.client.post('/version1/messaging', form.toString(), {
        headers: {
          apiKey: this.apiKey,
          Accept: 'application/json',
          'Content-Type': 'application/x-www-form-urlencoded',
        },
      });

      const parsed = messagingResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        log.error({ recipient, issues: parsed.error.issues }, 'Unexpected SMS API response');
        return { success: false, error: 'Unexpected response from SMS service', recipient };
      }

      const result = parsed.data.SMSMessageData.Recipients.find((r) => r.number === recipient)
        ?? parsed.data.SMSMessageData.Recipients[0];
      if (!result) {
        const reason = parsed.data.SMSMessageData.Message ?? 'No recipients accepted';
        log.warn({ recipient, reason }, 'SMS rejected');
        return { success: false, error: reason, recipient };
      }
      if (result.statusCode < 100 || result.statusCode > 102) {
        log.warn({ recipient, status: result.status, statusCode: result.statusCode }, 'SMS rejected');
        return { success: false, error: result.status, recipient };
      }

      log.info({ recipient, status: result.status }, 'SMS sent');
      return { success: true, recipient };
    } catch (err) {
      const error = describeSendError(err);
      log.error({ recipient, error }, 'Failed to send SMS');
      return { success: false, error, recipient };
    }
  }
}

export function createSmsGatewayFromEnv(): AfricasTalkingSmsGateway {
  return new AfricasTalkingSmsGateway({
    username: env.AFRICASTALKING_USERNAME,
    apiKey: env.AFRICASTALKING_API_KEY,
    senderId: env.AFRICASTALKING_SENDER_ID,
    baseUrl: env.AFRICASTALKING_BASE_URL,
  });
}
