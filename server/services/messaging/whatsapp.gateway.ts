import axios, { AxiosInstance } from 'axios';
import type { SendResult } from '../../../shared/types';
import { env } from '../../config/env';
import { moduleLogger } from '../../utils/logger';
import { describeSendError, MessageGateway, normalizePhoneNumber } from './gateway';

const log = moduleLogger('whatsapp');

const API_TIMEOUT_MS = 30000;

export const WHATSAPP_NOT_CONFIGURED =
  'WhatsApp is not configured. Set WHATSAPP_API_URL and WHATSAPP_API_TOKEN to send WhatsApp messages.';

export interface WhatsAppConfig {
  apiUrl?: string;
  token?: string;
  client?: AxiosInstance;
}

/**
 * WhatsApp Business text messages through an HTTP provider that takes
 * `{ to, type: 'text', text: { body } }` with a bearer token.
 */
export class WhatsAppGateway implements MessageGateway {
  readonly channel = 'whatsapp' as const;
  private readonly apiUrl: string | null;
  private readonly token: string | null;
  private readonly client: AxiosInstance;

  constructor(config: WhatsAppConfig) {
    this.apiUrl = config.apiUrl || null;
    this.token = config.token || null;
    this.client = config.client ?? axios.create({ timeout: API_TIMEOUT_MS });
  }

  async send(phone: string, message: string): Promise<SendResult> {
    if (this.apiUrl === null || this.token === null) {
      log.warn('WhatsApp send attempted without configuration');
      return { success: false, error: WHATSAPP_NOT_CONFIGURED };
    }

    const recipient = normalizePhoneNumber(phone);
    try {
      await this.client.post(
        this.apiUrl,
        { to: recipient, type: 'text', text: { body: message } },
        { headers: { Authorization: `Bearer ${this.token}`, 'Content-Type': 'application/json' } }
      );
      log.info({ recipient }, 'WhatsApp message sent');
      return { success: true, recipient };
    } catch (err) {
      const error = describeSendError(err);
      log.error({ recipient, error }, 'Failed to send WhatsApp message');
      return { success: false, error, recipient };
    }
  }
}

export function createWhatsAppGatewayFromEnv(): WhatsAppGateway {
  return new WhatsAppGateway({ apiUrl: env.WHATSAPP_API_URL, token: env.WHATSAPP_API_TOKEN });
}
