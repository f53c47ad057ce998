import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { categoryService } from '../services/category.service';
import { categoryCreateSchema } from '../validators/master.schema';

export async function categoryRoutes(server: FastifyInstance) {
  server.get('/categories', { preHandler: [authenticate] }, async () => {
    const data = await categoryService.listCategories();
    return { success: true, data };
  });

  server.post('/categories', { preHandler: [authenticate] }, async (request, reply) => {
    const category = await categoryService.createCategory(categoryCreateSchema.parse(request.body));
    return reply.code(201).send({ success: true, data: category });
  });
}
