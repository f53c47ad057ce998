import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { customerService } from '../services/customer.service';
import { idParamSchema, paginationSchema } from '../validators/common.schema';
import { customerCreateSchema, customerUpdateSchema } from '../validators/master.schema';

export async function customerRoutes(server: FastifyInstance) {
  server.get('/customers', { preHandler: [authenticate] }, async (request) => {
    const query = paginationSchema.parse(request.query);
    const result = await customerService.listCustomers(query);
    return { success: true, ...result };
  });

  // Customer with recent sales and debts
  server.get('/customers/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    const customer = await customerService.getCustomerWithHistory(id);
    return { success: true, data: customer };
  });

  server.post('/customers', { preHandler: [authenticate] }, async (request, reply) => {
    const customer = await customerService.createCustomer(customerCreateSchema.parse(request.body));
    return reply.code(201).send({ success: true, data: customer });
  });

  server.put('/customers/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    const updated = await customerService.updateCustomer(id, customerUpdateSchema.parse(request.body));
    return { success: true, data: updated };
  });
}
