// =============================================================
// File: server/services/notification.service.ts
// Description: Debt reminders over SMS or WhatsApp. Sending never
//              throws: gateway failures come back as results and
//              bulk runs count them.
// =============================================================

import { getDb } from '../database/connection';
import type { DebtRow } from '../database/rows';
import type { BulkSendResult, DebtWithRelations, MessageChannel, SendResult } from '../../shared/types';
import { BULK_ERROR_LIMIT } from '../../shared/constants';
import { debtService } from './debt.service';
import { MessageGateway, describeSendError } from './messaging/gateway';
import { createSmsGatewayFromEnv } from './messaging/africastalking.gateway';
import { createWhatsAppGatewayFromEnv } from './messaging/whatsapp.gateway';
import { formatCurrency, formatDisplayDate } from '../utils/formatters';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('notifications');

export type GatewayMap = Record<MessageChannel, MessageGateway>;

/** Reminder text for a debt; WhatsApp gets the formatted variant */
export function buildDebtReminder(debt: DebtWithRelations, channel: MessageChannel): string {
  const name = debt.customer.name;
  const dueDate = formatDisplayDate(debt.due_date);
  const amount = formatCurrency(debt.amount);
  const remaining = formatCurrency(debt.remaining_amount);

  if (channel === 'sms') {
    switch (debt.display_status) {
      case 'paid':
        return `Habari ${name}, deni lako la ${amount} limekwisha lipwa. Asante kwa kufanya biashara nasi.`;
      case 'overdue':
        return `Habari ${name}, deni lako la ${remaining} lilikwisha muda wake tarehe ${dueDate}. Tafadhali lipa haraka ili tusiwe na shida.`;
      default:
        return `Habari ${name}, una deni la ${remaining} linalotakiwa kulipwa kabla ya ${dueDate}. Tafadhali lipa kwa wakati.`;
    }
  }

  switch (debt.display_status) {
    case 'paid':
      return `🔔 *Habari ${name}*\n\n✅ Deni lako la *${amount}* limekwisha lipwa.\n\nAsante kwa kufanya biashara nasi! 🙏`;
    case 'overdue':
      return `🚨 *Habari ${name}*\n\n⚠️ Deni lako la *${remaining}* lilikwisha muda wake tarehe ${dueDate}.\n\nTafadhali lipa haraka ili tusiwe na shida. 🏦`;
    default:
      return `💰 *Habari ${name}*\n\nUna deni la *${remaining}* linalotakiwa kulipwa kabla ya ${dueDate}.\n\nTafadhali lipa kwa wakati. ⏰`;
  }
}

export class NotificationService {
  constructor(private readonly gateways: GatewayMap) {}

  private async deliver(debt: DebtWithRelations, channel: MessageChannel): Promise<SendResult> {
    const phone = debt.customer.phone?.trim();
    if (!phone) {
      return { success: false, error: 'Customer has no phone number' };
    }
    const result = await this.gateways[channel].send(phone, buildDebtReminder(debt, channel));
    log.info({ debtId: debt.id, channel, success: result.success, error: result.error }, 'Debt reminder sent');
    return result;
  }

  async sendDebtReminder(debtId: number, channel: MessageChannel): Promise<SendResult> {
    const debt = await debtService.getDebtWithPayments(debtId);
    return this.deliver(debt, channel);
  }

  /**
   * Remind every selected debt whose customer has a phone number. Returns
   * counts and the first few error messages.
   */
  async sendBulkReminders(debtIds: number[], channel: MessageChannel): Promise<BulkSendResult> {
    const result: BulkSendResult = { sent: 0, failed: 0, errors: [] };
    if (debtIds.length === 0) return result;

    const db = getDb();
    const rows: DebtRow[] = await db('debts')
      .join('customers', 'customers.id', 'debts.customer_id')
      .whereIn('debts.id', debtIds)
      .whereNotNull('customers.phone')
      .where('customers.phone', '<>', '')
      .select('debts.*')
      .orderBy('debts.id', 'asc');
    const debts = await debtService.getDebtsWithRelations(db, rows);

    for (const debt of debts) {
      let outcome: SendResult;
      try {
        outcome = await this.deliver(debt, channel);
      } catch (err) {
        outcome = { success: false, error: describeSendError(err) };
        log.error({ debtId: debt.id, channel, err }, 'Debt reminder failed');
      }

      if (outcome.success) {
        result.sent += 1;
      } else {
        result.failed += 1;
        result.errors.push(`${debt.customer.name}: ${outcome.error ?? 'Unknown error'}`);
      }
    }

    result.errors = result.errors.slice(0, BULK_ERROR_LIMIT);
    log.info({ channel, sent: result.sent, failed: result.failed }, 'Bulk debt reminders finished');
    return result;
  }

  /** Open debts whose customer can be reached, soonest due first */
  async listRemindableDebts(): Promise<DebtWithRelations[]> {
    const db = getDb();
    const rows: DebtRow[] = await db('debts')
      .join('customers', 'customers.id', 'debts.customer_id')
      .whereIn('debts.status', ['pending', 'partial'])
      .whereNotNull('customers.phone')
      .where('customers.phone', '<>', '')
      .select('debts.*')
      .orderBy('debts.due_date', 'asc')
      .orderBy('debts.id', 'asc');
    return debtService.getDebtsWithRelations(db, rows);
  }
}

export function createNotificationService(gateways?: Partial<GatewayMap>): NotificationService {
  return new NotificationService({
    sms: gateways?.sms ?? createSmsGatewayFromEnv(),
    whatsapp: gateways?.whatsapp ?? createWhatsAppGatewayFromEnv(),
  });
}

export const notificationService = createNotificationService();
