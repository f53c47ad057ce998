import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { NotificationService, notificationService } from '../services/notification.service';
import { bulkReminderSchema, channelParamsSchema, debtReminderParamsSchema } from '../validators/notification.schema';

export interface NotificationRouteOptions {
  /** Replaces the env-configured service, e.g. with stub gateways */
  service?: NotificationService;
}

export async function notificationRoutes(server: FastifyInstance, options: NotificationRouteOptions) {
  const service = options.service ?? notificationService;

  // Open debts that can be reminded
  server.get('/notifications/debts', { preHandler: [authenticate] }, async () => {
    return { success: true, data: await service.listRemindableDebts() };
  });

  server.post('/notifications/debts/bulk/:channel', { preHandler: [authenticate] }, async (request) => {
    const { channel } = channelParamsSchema.parse(request.params);
    const { debt_ids } = bulkReminderSchema.parse(request.body);
    const result = await service.sendBulkReminders(debt_ids, channel);
    return { success: true, data: result, message: `Sent ${result.sent}, failed ${result.failed}` };
  });

  server.post('/notifications/debts/:id/:channel', { preHandler: [authenticate] }, async (request, reply) => {
    const { id, channel } = debtReminderParamsSchema.parse(request.params);
    const result = await service.sendDebtReminder(id, channel);
    if (!result.success) {
      return reply.code(502).send({ success: false, error: result.error ?? 'Message not sent', data: result });
    }
    return { success: true, data: result };
  });
}
