import { FastifyInstance } from 'fastify';
import { authService } from '../services/auth.service';
import { authenticate, actorOf } from '../plugins/auth.plugin';
import { loginSchema, registerSchema } from '../validators/auth.schema';

export async function authRoutes(server: FastifyInstance) {
  // POST /api/auth/register
  server.post('/auth/register', async (request, reply) => {
    const body = registerSchema.parse(request.body);
    const user = await authService.register(body);
    return reply.code(201).send({ success: true, data: user });
  });

  // POST /api/auth/login
  server.post('/auth/login', async (request) => {
    const body = loginSchema.parse(request.body);
    const result = await authService.login(body);
    return { success: true, data: result };
  });

  // GET /api/auth/me
  server.get('/auth/me', { preHandler: [authenticate] }, async (request) => {
    const user = await authService.getUser(actorOf(request).userId);
    return { success: true, data: user };
  });
}
