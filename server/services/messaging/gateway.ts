import axios from 'axios';
import type { SendResult } from '../../../shared/types';
import { env } from '../../config/env';

/** Sends one text message. Failures come back as a result, never as a throw. */
export interface MessageGateway {
  readonly channel: 'sms' | 'whatsapp';
  send(phone: string, message: string): Promise<SendResult>;
}

/**
 * International form of a phone number: "+…" is kept, a leading 0 becomes
 * the default country code, anything else gets a "+".
 */
export function normalizePhoneNumber(raw: string, countryCode: string = env.DEFAULT_COUNTRY_CODE): string {
  const phone = raw.replace(/[\s-]/g, '');
  if (phone.startsWith('+')) return phone;
  if (phone.startsWith('0')) return `+${countryCode}${phone.slice(1)}`;
  return `+${phone}`;
}

export function describeSendError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    return status ? `HTTP ${status}: ${err.message}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}
