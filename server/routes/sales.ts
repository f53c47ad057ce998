// =============================================================
// File: server/routes/sales.ts
//
//   GET    /api/sales                      — Filtered list with daily summary
//   GET    /api/sales/chart                — Paid sales per day
//   POST   /api/sales                      — Create with line items
//   POST   /api/sales/bulk-delete          — Delete several, restoring stock
//   GET    /api/sales/:id                  — Sale with lines and profit
//   PATCH  /api/sales/:id                  — Customer, payment, notes
//   DELETE /api/sales/:id
//   POST   /api/sales/:id/items            — Add (or merge) a line
//   PATCH  /api/sales/:id/items/:lineId    — Change quantity or price
//   DELETE /api/sales/:id/items/:lineId
// =============================================================

import { FastifyInstance } from 'fastify';
import { authenticate, actorOf } from '../plugins/auth.plugin';
import { saleService } from '../services/sale.service';
import { getSalesChart, listSales } from '../services/sale-list.service';
import { idParamSchema } from '../validators/common.schema';
import {
  bulkDeleteSchema,
  lineItemPatchSchema,
  lineParamsSchema,
  saleCreateSchema,
  saleLineSchema,
  saleListQuerySchema,
  salesChartQuerySchema,
  saleUpdateSchema,
} from '../validators/sale.schema';

export async function saleRoutes(server: FastifyInstance) {
  server.get('/sales', { preHandler: [authenticate] }, async (request) => {
    const query = saleListQuerySchema.parse(request.query);
    const result = await listSales(query);
    return { success: true, ...result };
  });

  server.get('/sales/chart', { preHandler: [authenticate] }, async (request) => {
    const query = salesChartQuerySchema.parse(request.query);
    return { success: true, data: await getSalesChart(query) };
  });

  server.post('/sales', { preHandler: [authenticate] }, async (request, reply) => {
    const body = saleCreateSchema.parse(request.body);
    const sale = await saleService.createSale(body, actorOf(request));
    return reply.code(201).send({ success: true, data: sale });
  });

  server.post('/sales/bulk-delete', { preHandler: [authenticate] }, async (request) => {
    const { ids } = bulkDeleteSchema.parse(request.body);
    const result = await saleService.deleteSales(ids, actorOf(request));
    return { success: true, data: result, message: `${result.deleted} sale(s) deleted` };
  });

  server.get('/sales/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    return { success: true, data: await saleService.getSaleWithDetails(id) };
  });

  server.patch('/sales/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    const patch = saleUpdateSchema.parse(request.body);
    return { success: true, data: await saleService.updateSale(id, patch, actorOf(request)) };
  });

  server.delete('/sales/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    const result = await saleService.deleteSale(id, actorOf(request));
    return { success: true, data: result, message: 'Sale deleted' };
  });

  // ─── Line items ──────────────────────────────────────────────

  server.post('/sales/:id/items', { preHandler: [authenticate] }, async (request, reply) => {
    const { id } = idParamSchema.parse(request.params);
    const line = saleLineSchema.parse(request.body);
    const result = await saleService.addLineItem(id, line, actorOf(request));
    return reply.code(result.merged ? 200 : 201).send({ success: true, data: result });
  });

  server.patch('/sales/:id/items/:lineId', { preHandler: [authenticate] }, async (request) => {
    const { id, lineId } = lineParamsSchema.parse(request.params);
    const patch = lineItemPatchSchema.parse(request.body);
    return { success: true, data: await saleService.updateLineItem(id, lineId, patch, actorOf(request)) };
  });

  server.delete('/sales/:id/items/:lineId', { preHandler: [authenticate] }, async (request) => {
    const { id, lineId } = lineParamsSchema.parse(request.params);
    return { success: true, data: await saleService.removeLineItem(id, lineId, actorOf(request)) };
  });
}
