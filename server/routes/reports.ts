// =============================================================
// File: server/routes/reports.ts
//
//   GET /api/reports/sales.csv          — Sales export (same filters as the list)
//   GET /api/reports/sales.pdf
//   GET /api/reports/expenditures.csv   — Expenditure export
//   GET /api/reports/expenditures.pdf
// =============================================================

import { FastifyInstance, FastifyReply } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import {
  exportStamp,
  getExpenditureExportRows,
  getSalesExportRows,
  renderExpendituresCsv,
  renderExpendituresPdf,
  renderSalesCsv,
  renderSalesPdf,
} from '../services/report.service';
import { saleFilterQuerySchema } from '../validators/sale.schema';
import { expenditureFilterQuerySchema } from '../validators/expenditure.schema';

function sendFile(reply: FastifyReply, contentType: string, fileName: string, body: string | Buffer) {
  return reply
    .header('Content-Type', contentType)
    .header('Content-Disposition', `attachment; filename="${fileName}"`)
    .send(body);
}

export async function reportRoutes(server: FastifyInstance) {
  server.get('/reports/sales.csv', { preHandler: [authenticate] }, async (request, reply) => {
    const filters = saleFilterQuerySchema.parse(request.query);
    const csv = await renderSalesCsv(await getSalesExportRows(filters));
    return sendFile(reply, 'text/csv; charset=utf-8', `sales-${exportStamp()}.csv`, csv);
  });

  server.get('/reports/sales.pdf', { preHandler: [authenticate] }, async (request, reply) => {
    const filters = saleFilterQuerySchema.parse(request.query);
    const pdf = await renderSalesPdf(await getSalesExportRows(filters));
    return sendFile(reply, 'application/pdf', `sales-${exportStamp()}.pdf`, pdf);
  });

  server.get('/reports/expenditures.csv', { preHandler: [authenticate] }, async (request, reply) => {
    const filters = expenditureFilterQuerySchema.parse(request.query);
    const csv = await renderExpendituresCsv(await getExpenditureExportRows(filters));
    return sendFile(reply, 'text/csv; charset=utf-8', `expenditures-${exportStamp()}.csv`, csv);
  });

  server.get('/reports/expenditures.pdf', { preHandler: [authenticate] }, async (request, reply) => {
    const filters = expenditureFilterQuerySchema.parse(request.query);
    const pdf = await renderExpendituresPdf(await getExpenditureExportRows(filters));
    return sendFile(reply, 'application/pdf', `expenditures-${exportStamp()}.pdf`, pdf);
  });
}
