// =============================================================
// File: server/app.ts
// Description: Fastify server bootstrap with all route
//              registrations. Listening and shutdown live in
//              index.ts so tests can build and inject.
// =============================================================

import Fastify from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import sensible from '@fastify/sensible';
import { initializeDb } from './database/connection';
import { buildLoggerOptions } from './utils/logger';
import { ValidationError } from './utils/errors';
import { registerErrorHandler } from './plugins/error-handler.plugin';
import type { NotificationService } from './services/notification.service';
import { healthRoutes } from './routes/health';
import { authRoutes } from './routes/auth';
import { categoryRoutes } from './routes/categories';
import { supplierRoutes } from './routes/suppliers';
import { customerRoutes } from './routes/customers';
import { itemRoutes } from './routes/items';
import { productRoutes } from './routes/products';
import { saleRoutes } from './routes/sales';
import { debtRoutes } from './routes/debts';
import { expenditureRoutes } from './routes/expenditures';
import { dashboardRoutes } from './routes/dashboard';
import { reportRoutes } from './routes/reports';
import { notificationRoutes } from './routes/notifications';

export interface BuildServerOptions {
  /** Apply pending migrations on start-up */
  migrate?: boolean;
  notificationService?: NotificationService;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const server = Fastify({ logger: buildLoggerOptions() });

  // Plugins
  await server.register(cors, {
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });
  await server.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });
  await server.register(sensible);

  // Accept POST/PUT with Content-Type: application/json and no body
  server.removeContentTypeParser('application/json');
  server.addContentTypeParser('application/json', { parseAs: 'string' }, (req, body, done) => {
    const text = String(body).trim();
    if (!text) {
      done(null, {});
      return;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      done(null, parsed);
    } catch (err) {
      req.log.debug({ err }, 'Malformed JSON body');
      done(new ValidationError('Request body is not valid JSON'), undefined);
    }
  });

  registerErrorHandler(server);

  await initializeDb({ migrate: options.migrate });

  // Register routes
  await server.register(healthRoutes, { prefix: '/api' });
  await server.register(authRoutes, { prefix: '/api' });
  await server.register(categoryRoutes, { prefix: '/api' });
  await server.register(supplierRoutes, { prefix: '/api' });
  await server.register(customerRoutes, { prefix: '/api' });
  await server.register(itemRoutes, { prefix: '/api' });
  await server.register(productRoutes, { prefix: '/api' });
  await server.register(saleRoutes, { prefix: '/api' });
  await server.register(debtRoutes, { prefix: '/api' });
  await server.register(expenditureRoutes, { prefix: '/api' });
  await server.register(dashboardRoutes, { prefix: '/api' });
  await server.register(reportRoutes, { prefix: '/api' });
  await server.register(notificationRoutes, { prefix: '/api', service: options.notificationService });

  return server;
}
