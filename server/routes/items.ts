import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { itemService } from '../services/item.service';
import { idParamSchema } from '../validators/common.schema';
import { itemCreateSchema, itemListQuerySchema, itemUpdateSchema, restockSchema } from '../validators/inventory.schema';

export async function itemRoutes(server: FastifyInstance) {
  server.get('/items', { preHandler: [authenticate] }, async (request) => {
    const query = itemListQuerySchema.parse(request.query);
    const result = await itemService.listItems(query);
    return { success: true, ...result };
  });

  server.get('/items/low-stock', { preHandler: [authenticate] }, async () => {
    const data = await itemService.listLowStockItems();
    return { success: true, data };
  });

  server.get('/items/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    return { success: true, data: await itemService.getItem(id) };
  });

  server.post('/items', { preHandler: [authenticate] }, async (request, reply) => {
    const item = await itemService.createItem(itemCreateSchema.parse(request.body));
    return reply.code(201).send({ success: true, data: item });
  });

  server.put('/items/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    const updated = await itemService.updateItem(id, itemUpdateSchema.parse(request.body));
    return { success: true, data: updated };
  });

  server.post('/items/:id/restock', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    const { quantity } = restockSchema.parse(request.body);
    return { success: true, data: await itemService.restockItem(id, quantity) };
  });

  server.delete('/items/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    await itemService.deleteItem(id);
    return { success: true, message: 'Item deleted' };
  });
}
