import type { Knex } from 'knex';
import { logger } from '../utils/logger.js';
import {
  type Clock,
  type RangeQuery,
  resolveDateRange,
  systemClock,
  toDateKey,
  zonedNow,
} from '../utils/dates.js';
import { toNumber } from '../utils/sql.js';

const UTF8_BOM = '\uFEFF';

function header(currency: string): string[] {
  return [
    'Date',
    'Time',
    'Customer',
    'Phone',
    'Plate Number',
    'Service',
    'Payment Method',
    'Loyalty Reward',
    `Amount Paid (${currency})`,
    'Notes',
  ];
}

export interface CsvExportServiceDeps {
  db: Knex;
  timezone: string;
  currency: string;
  clock?: Clock;
}

export interface VisitExport {
  filename: string;
  csv: string;
  rowCount: number;
}

interface ExportRow {
  visit_date: string;
  visit_time: string;
  customer_name: string;
  phone: string;
  plate_number: string;
  service_name: string;
  payment_method: string;
  is_loyalty_reward: boolean;
  amount_paid: number | string;
  notes: string | null;
}

export function escapeCsvValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  const str = String(value);
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return '"' + str.replace(/"/g, '""') + '"';
  }
  return str;
}

function rowsToCsvString(rows: unknown[][]): string {
  return rows.map((row) => row.map(escapeCsvValue).join(',')).join('\r\n');
}

export function createCsvExportService(deps: CsvExportServiceDeps) {
  const { db, timezone, currency } = deps;
  const clock = deps.clock ?? systemClock;

  async function exportVisits(query: RangeQuery = {}): Promise<VisitExport> {
    const range = resolveDateRange(query, toDateKey(zonedNow(clock, timezone)));

    const rows = await db('visits as v')
      .join('customers as c', 'v.customer_id', 'c.id')
      .join('services as s', 'v.service_id', 's.id')
      .whereBetween('v.visit_date', [range.from, range.to])
      .orderBy('v.visit_date', 'asc')
      .orderBy('v.visit_time', 'asc')
      .orderBy('v.created_at', 'asc')
      .select<ExportRow[]>(
        'v.visit_date',
        'v.visit_time',
        'c.name as customer_name',
        'c.phone',
        'c.plate_number',
        's.name as service_name',
        'v.payment_method',
        'v.is_loyalty_reward',
        'v.amount_paid',
        'v.notes',
      );

    const body = rows.map((row) => [
      row.visit_date,
      row.visit_time,
      row.customer_name,
      row.phone,
      row.plate_number,
      row.service_name,
      row.payment_method,
      row.is_loyalty_reward ? 'yes' : 'no',
      toNumber(row.amount_paid).toFixed(2),
      row.notes,
    ]);

    const csv = UTF8_BOM + rowsToCsvString([header(currency), ...body]);

    logger.info({ from: range.from, to: range.to, rowCount: rows.length }, 'Visit log exported');

    return {
      filename: `visits-${range.from}-to-${range.to}.csv`,
      csv,
      rowCount: rows.length,
    };
  }

  return {
    exportVisits,
  };
}

export type CsvExportService = ReturnType<typeof createCsvExportService>;
