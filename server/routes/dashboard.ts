// =============================================================
// File: server/routes/dashboard.ts
//   GET    /api/dashboard             — Today, this month, stock and debt alerts
// =============================================================

import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { dashboardService } from '../services/dashboard.service';

export async function dashboardRoutes(server: FastifyInstance) {
  server.get('/dashboard', { preHandler: [authenticate] }, async () => {
    const data = await dashboardService.getSummary();
    return { success: true, data };
  });
}
