import { z } from 'zod';
import { MESSAGE_CHANNELS } from '../../shared/constants';

export const channelParamsSchema = z.object({
  channel: z.enum(MESSAGE_CHANNELS),
});

export const debtReminderParamsSchema = channelParamsSchema.extend({
  id: z.coerce.number().int().positive(),
});

export const bulkReminderSchema = z.object({
  debt_ids: z.array(z.number().int().positive()).min(1, 'Select at least one debt'),
});
