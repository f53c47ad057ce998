// =============================================================
// File: server/services/report.service.ts
// Description: Sales and expenditure exports. CSV through
//              fast-csv; PDF through pdfkit, which is loaded on
//              first use so a missing renderer only disables PDF.
// =============================================================

import { writeToString } from 'fast-csv';
import { getDb } from '../database/connection';
import type { CustomerRow, UserRow } from '../database/rows';
import type { Expenditure } from '../../shared/types';
import { EXPENDITURE_CATEGORY_LABELS, PAYMENT_METHOD_LABELS } from '../../shared/constants';
import { loadFilteredSales, SaleFilters } from './sale-list.service';
import { computeProfits } from './sale-profit.service';
import { creatorNames, describeProducts } from './sale-details';
import { expenditureService, ExpenditureFilters } from './expenditure.service';
import { ReportUnavailableError } from '../utils/errors';
import { formatAmount, formatLocalDateTime, toLocalDateString } from '../utils/formatters';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('reports');

export interface SalesExportRow {
  id: number;
  /** Local date-time, YYYY-MM-DD HH:mm */
  date: string;
  customer: string;
  amount: string;
  profit: string;
  payment_method: string;
  status: 'Paid' | 'Unpaid';
  created_by: string;
  products: string;
}

export interface ExpenditureExportRow {
  id: number;
  category: string;
  description: string;
  date: string;
  amount: string;
  created_by: string;
}

export const SALES_CSV_HEADERS = [
  'Sale ID',
  'Date',
  'Customer',
  'Amount',
  'Profit',
  'Payment Method',
  'Status',
  'Created By',
];

export const EXPENDITURE_CSV_HEADERS = ['ID', 'Category', 'Description', 'Date', 'Amount', 'Created By'];

/**
 * Every sale matching the filters, newest first. Exports default to all
 * payment states and have no day cap or paging.
 */
export async function getSalesExportRows(filters: SaleFilters): Promise<SalesExportRow[]> {
  const db = getDb();
  const sales = await loadFilteredSales(db, { ...filters, payment_status: filters.payment_status ?? 'all' });

  const profits = await computeProfits(db, sales);
  const products = await describeProducts(db, sales);
  const creators = await creatorNames(db, sales);

  const customerIds = [...new Set(sales.flatMap((s) => (s.customer_id === null ? [] : [s.customer_id])))];
  const customers: Pick<CustomerRow, 'id' | 'name'>[] = customerIds.length
    ? await db('customers').whereIn('id', customerIds).select('id', 'name')
    : [];
  const customerNames = new Map(customers.map((c) => [c.id, c.name]));

  return sales.map((sale) => ({
    id: sale.id,
    date: formatLocalDateTime(sale.sale_date),
    customer: (sale.customer_id === null ? undefined : customerNames.get(sale.customer_id)) ?? 'Walk-in',
    amount: formatAmount(sale.total_amount),
    profit: formatAmount(profits.get(sale.id) ?? 0),
    payment_method: PAYMENT_METHOD_LABELS[sale.payment_method],
    status: sale.is_paid ? 'Paid' : 'Unpaid',
    created_by: creators.get(sale.id) ?? '',
    products: products.get(sale.id) ?? '',
  }));
}

export async function getExpenditureExportRows(filters: ExpenditureFilters): Promise<ExpenditureExportRow[]> {
  const expenditures: Expenditure[] = await expenditureService.getAllExpenditures(filters);

  const userIds = [...new Set(expenditures.flatMap((e) => (e.created_by === null ? [] : [e.created_by])))];
  const users: Pick<UserRow, 'id' | 'username'>[] = userIds.length
    ? await getDb()('users').whereIn('id', userIds).select('id', 'username')
    : [];
  const usernames = new Map(users.map((u) => [u.id, u.username]));

  return expenditures.map((e) => ({
    id: e.id,
    category: EXPENDITURE_CATEGORY_LABELS[e.category],
    description: e.description,
    date: formatLocalDateTime(e.expense_date),
    amount: e.amount.toFixed(2),
    created_by: (e.created_by === null ? undefined : usernames.get(e.created_by)) ?? '',
  }));
}

// ─── CSV ────────────────────────────────────────────────────────

export function renderSalesCsv(rows: SalesExportRow[]): Promise<string> {
  return writeToString(
    rows.map((r) => [String(r.id), r.date, r.customer, r.amount, r.profit, r.payment_method, r.status, r.created_by]),
    { headers: SALES_CSV_HEADERS, alwaysWriteHeaders: true }
  );
}

export function renderExpendituresCsv(rows: ExpenditureExportRow[]): Promise<string> {
  return writeToString(
    rows.map((r) => [String(r.id), r.category, r.description, r.date, r.amount, r.created_by]),
    { headers: EXPENDITURE_CSV_HEADERS, alwaysWriteHeaders: true }
  );
}

// ─── PDF ────────────────────────────────────────────────────────

type PdfDocumentConstructor = new (options?: PDFKit.PDFDocumentOptions) => PDFKit.PDFDocument;

const MM = 72 / 25.4;

interface PdfColumn {
  header: string;
  /** Offset from the left margin, in mm */
  x: number;
  width: number;
  align?: 'left' | 'right';
}

async function loadPdfKit(): Promise<PdfDocumentConstructor> {
  try {
    const mod = await import('pdfkit');
    return mod.default;
  } catch (err) {
    log.warn({ err }, 'PDF renderer could not be loaded');
    throw new ReportUnavailableError('PDF export is unavailable because the PDF renderer could not be loaded');
  }
}

async function renderTablePdf(title: string, columns: PdfColumn[], rows: string[][]): Promise<Buffer> {
  const PDFDocument = await loadPdfKit();
  const margin = 15 * MM;
  const rowHeight = 6 * MM;
  const doc = new PDFDocument({ size: 'A4', margin });

  const chunks: Buffer[] = [];
  const finished = new Promise<Buffer>((resolve, reject) => {
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);
  });

  const bottom = doc.page.height - margin - 20 * MM;
  let y = margin;

  const drawRow = (cells: string[]): void => {
    columns.forEach((column, index) => {
      doc.text(cells[index] ?? '', margin + column.x * MM, y, {
        width: column.width * MM,
        align: column.align ?? 'left',
        lineBreak: false,
        ellipsis: true,
      });
    });
    y += rowHeight;
  };

  doc.font('Helvetica-Bold').fontSize(14).text(title, margin, y, { lineBreak: false });
  y += 10 * MM;
  doc.font('Helvetica-Bold').fontSize(10);
  drawRow(columns.map((c) => c.header));
  doc.font('Helvetica');

  for (const row of rows) {
    if (y > bottom) {
      doc.addPage();
      y = margin;
      doc.font('Helvetica').fontSize(10);
    }
    drawRow(row);
  }

  doc.end();
  return finished;
}

export function renderSalesPdf(rows: SalesExportRow[]): Promise<Buffer> {
  return renderTablePdf(
    'All Sales Report',
    [
      { header: 'Sale #', x: 0, width: 22 },
      { header: 'Date', x: 25, width: 38 },
      { header: 'Customer', x: 65, width: 52 },
      { header: 'Amount', x: 115, width: 30, align: 'right' },
      { header: 'Profit', x: 145, width: 30, align: 'right' },
    ],
    rows.map((r) => [`#${r.id}`, r.date.slice(0, 10), r.customer, r.amount, r.profit])
  );
}

export function renderExpendituresPdf(rows: ExpenditureExportRow[]): Promise<Buffer> {
  return renderTablePdf(
    'Expenditures Report',
    [
      { header: 'ID', x: 0, width: 18 },
      { header: 'Category', x: 20, width: 38 },
      { header: 'Date', x: 60, width: 38 },
      { header: 'Amount', x: 100, width: 28, align: 'right' },
      { header: 'Description', x: 132, width: 48 },
    ],
    rows.map((r) => [String(r.id), r.category, r.date, r.amount, r.description])
  );
}

/** Suffix for export file names, e.g. sales-2026-03-02.csv */
export function exportStamp(now: Date = new Date()): string {
  return toLocalDateString(now);
}
