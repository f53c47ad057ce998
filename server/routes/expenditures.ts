import { FastifyInstance } from 'fastify';
import { authenticate, actorOf } from '../plugins/auth.plugin';
import { expenditureService } from '../services/expenditure.service';
import { idParamSchema } from '../validators/common.schema';
import { expenditureCreateSchema, expenditureListQuerySchema } from '../validators/expenditure.schema';

export async function expenditureRoutes(server: FastifyInstance) {
  server.get('/expenditures', { preHandler: [authenticate] }, async (request) => {
    const query = expenditureListQuerySchema.parse(request.query);
    const result = await expenditureService.listExpenditures(query);
    return { success: true, ...result };
  });

  server.post('/expenditures', { preHandler: [authenticate] }, async (request, reply) => {
    const body = expenditureCreateSchema.parse(request.body);
    const expenditure = await expenditureService.createExpenditure(body, actorOf(request));
    return reply.code(201).send({ success: true, data: expenditure });
  });

  server.delete('/expenditures/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    await expenditureService.deleteExpenditure(id, actorOf(request));
    return { success: true, message: 'Expenditure deleted' };
  });
}
