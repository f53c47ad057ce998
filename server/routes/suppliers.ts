import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { supplierService } from '../services/supplier.service';
import { idParamSchema, paginationSchema } from '../validators/common.schema';
import { supplierCreateSchema, supplierUpdateSchema } from '../validators/master.schema';

export async function supplierRoutes(server: FastifyInstance) {
  server.get('/suppliers', { preHandler: [authenticate] }, async (request) => {
    const query = paginationSchema.parse(request.query);
    const result = await supplierService.listSuppliers(query);
    return { success: true, ...result };
  });

  server.get('/suppliers/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    return { success: true, data: await supplierService.getSupplier(id) };
  });

  server.post('/suppliers', { preHandler: [authenticate] }, async (request, reply) => {
    const supplier = await supplierService.createSupplier(supplierCreateSchema.parse(request.body));
    return reply.code(201).send({ success: true, data: supplier });
  });

  server.put('/suppliers/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    const updated = await supplierService.updateSupplier(id, supplierUpdateSchema.parse(request.body));
    return { success: true, data: updated };
  });
}
