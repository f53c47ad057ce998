import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { productService } from '../services/product.service';
import { idParamSchema } from '../validators/common.schema';
import {
  productCreateSchema,
  productListQuerySchema,
  productUpdateSchema,
  restockCartonsSchema,
} from '../validators/inventory.schema';

export async function productRoutes(server: FastifyInstance) {
  server.get('/products', { preHandler: [authenticate] }, async (request) => {
    const query = productListQuerySchema.parse(request.query);
    const result = await productService.listProducts(query);
    return { success: true, ...result };
  });

  server.get('/products/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    return { success: true, data: await productService.getProduct(id) };
  });

  server.post('/products', { preHandler: [authenticate] }, async (request, reply) => {
    const product = await productService.createProduct(productCreateSchema.parse(request.body));
    return reply.code(201).send({ success: true, data: product });
  });

  server.put('/products/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    const updated = await productService.updateProduct(id, productUpdateSchema.parse(request.body));
    return { success: true, data: updated };
  });

  server.post('/products/:id/restock', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    const { cartons } = restockCartonsSchema.parse(request.body);
    return { success: true, data: await productService.restockCartons(id, cartons) };
  });

  // Create the mirrored retail item for an existing product
  server.post('/products/:id/linked-item', { preHandler: [authenticate] }, async (request, reply) => {
    const { id } = idParamSchema.parse(request.params);
    const product = await productService.createLinkedItem(id);
    return reply.code(201).send({ success: true, data: product });
  });
}
