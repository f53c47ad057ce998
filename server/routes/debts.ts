import { FastifyInstance } from 'fastify';
import { authenticate, actorOf } from '../plugins/auth.plugin';
import { debtService } from '../services/debt.service';
import { idParamSchema } from '../validators/common.schema';
import { debtCreateSchema, debtListQuerySchema, paymentCreateSchema } from '../validators/debt.schema';

export async function debtRoutes(server: FastifyInstance) {
  server.get('/debts', { preHandler: [authenticate] }, async (request) => {
    const query = debtListQuerySchema.parse(request.query);
    const result = await debtService.listDebts(query);
    return { success: true, ...result };
  });

  server.post('/debts', { preHandler: [authenticate] }, async (request, reply) => {
    const body = debtCreateSchema.parse(request.body);
    const debt = await debtService.createDebt(body, actorOf(request));
    return reply.code(201).send({ success: true, data: debt });
  });

  server.get('/debts/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    return { success: true, data: await debtService.getDebtWithPayments(id) };
  });

  // Record a payment; also writes the matching payment-record sale
  server.post('/debts/:id/payments', { preHandler: [authenticate] }, async (request, reply) => {
    const { id } = idParamSchema.parse(request.params);
    const body = paymentCreateSchema.parse(request.body);
    const result = await debtService.recordPayment(id, body, actorOf(request));
    return reply.code(201).send({ success: true, data: result });
  });
}
