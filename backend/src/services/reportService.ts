import type { Knex } from 'knex';
import { ValidationError } from '../utils/errors.js';
import { LOYALTY_THRESHOLD } from '../loyalty/loyaltyPolicy.js';
import { roundMoney } from '../ledger/customerLedger.js';
import {
  type Clock,
  type DateRange,
  type RangeQuery,
  addDays,
  daysBetween,
  eachDay,
  presetRange,
  resolveDateRange,
  systemClock,
  toDateKey,
  zonedNow,
} from '../utils/dates.js';
import { toNumber } from '../utils/sql.js';
import type { RecentVisit, VisitService } from './visitService.js';

const DEFAULT_TOP_CUSTOMERS = 5;
const MAX_TOP_CUSTOMERS = 50;
const AT_RISK_LIST_LIMIT = 10;
/** Used for the revenue-at-risk estimate when no active service has a price. */
const FALLBACK_AVERAGE_PRICE = 350;

// Reward visits count as visits but never as revenue.
const REVENUE_SQL = 'COALESCE(SUM(CASE WHEN is_loyalty_reward THEN 0 ELSE amount_paid END), 0)';
const REVENUE_SQL_V =
  'COALESCE(SUM(CASE WHEN v.is_loyalty_reward THEN 0 ELSE v.amount_paid END), 0)';

export interface ServiceRevenue {
  serviceId: string;
  serviceName: string;
  visitCount: number;
  revenue: number;
}

export interface DailyRevenue {
  date: string;
  visitCount: number;
  revenue: number;
}

export interface RevenueReport {
  currency: string;
  from: string;
  to: string;
  total: number;
  visitCount: number;
  paidVisitCount: number;
  rewardVisitCount: number;
  byService: ServiceRevenue[];
  dailySeries: DailyRevenue[];
}

export interface PeriodTotals {
  from: string;
  to: string;
  revenue: number;
  visitCount: number;
}

export interface RevenueSummary {
  currency: string;
  today: PeriodTotals;
  last7Days: PeriodTotals;
  thisMonth: PeriodTotals;
}

export interface TopCustomer {
  customerId: string;
  name: string;
  plateNumber: string;
  totalSpent: number;
  totalVisits: number;
}

export interface LoyaltyStats {
  threshold: number;
  customerCount: number;
  eligibleCount: number;
  averagePoints: number;
}

export interface AtRiskCustomer {
  customerId: string;
  name: string;
  phone: string;
  plateNumber: string;
  lastVisit: string;
  daysSinceLastVisit: number;
}

export interface Dashboard {
  date: string;
  currency: string;
  totalCustomers: number;
  visitsToday: number;
  revenue: RevenueSummary;
  loyalty: LoyaltyStats;
  atRisk: {
    days: number;
    count: number;
    estimatedRevenueAtRisk: number;
    customers: AtRiskCustomer[];
  };
  recentVisits: RecentVisit[];
  topCustomers: TopCustomer[];
}

export interface ReportServiceDeps {
  db: Knex;
  visitService: Pick<VisitService, 'listRecentVisits'>;
  timezone: string;
  currency: string;
  atRiskDays: number;
  clock?: Clock;
}

interface TotalsRow {
  revenue: number | string | null;
  visit_count: number | string;
  reward_count: number | string;
}

interface ServiceRevenueRow {
  service_id: string;
  service_name: string;
  visit_count: number | string;
  revenue: number | string | null;
}

interface DailyRevenueRow {
  visit_date: string;
  visit_count: number | string;
  revenue: number | string | null;
}

interface TopCustomerRow {
  id: string;
  name: string;
  plate_number: string;
  total_spent: number | string;
  total_visits: number;
}

interface LoyaltyStatsRow {
  customer_count: number | string;
  eligible_count: number | string;
  avg_points: number | string | null;
}

interface AtRiskRow {
  id: string;
  name: string;
  phone: string;
  plate_number: string;
  last_visit: string;
}

interface CountRow {
  count: number | string;
}

interface AveragePriceRow {
  avg_price: number | string | null;
}

export function createReportService(deps: ReportServiceDeps) {
  const { db, visitService, timezone, currency, atRiskDays } = deps;
  const clock = deps.clock ?? systemClock;

  function today(): string {
    return toDateKey(zonedNow(clock, timezone));
  }

  async function periodTotals(range: DateRange): Promise<TotalsRow | undefined> {
    const row = await db('visits')
      .whereBetween('visit_date', [range.from, range.to])
      .select(
        db.raw(`${REVENUE_SQL} AS revenue`),
        db.raw('COUNT(*) AS visit_count'),
        db.raw('COUNT(*) FILTER (WHERE is_loyalty_reward) AS reward_count'),
      )
      .first<TotalsRow | undefined>();
    return row;
  }

  async function revenueReport(query: RangeQuery = {}): Promise<RevenueReport> {
    const range = resolveDateRange(query, today());

    const totals = await periodTotals(range);

    const serviceRows = await db('visits as v')
      .join('services as s', 'v.service_id', 's.id')
      .whereBetween('v.visit_date', [range.from, range.to])
      .groupBy('s.id', 's.name')
      .orderBy('revenue', 'desc')
      .orderBy('s.name', 'asc')
      .select<ServiceRevenueRow[]>(
        's.id as service_id',
        's.name as service_name',
        db.raw('COUNT(v.id) AS visit_count'),
        db.raw(`${REVENUE_SQL_V} AS revenue`),
      );

    const dailyRows = await db('visits')
      .whereBetween('visit_date', [range.from, range.to])
      .groupBy('visit_date')
      .orderBy('visit_date', 'asc')
      .select<DailyRevenueRow[]>(
        'visit_date',
        db.raw('COUNT(*) AS visit_count'),
        db.raw(`${REVENUE_SQL} AS revenue`),
      );

    const byDate = new Map(dailyRows.map((row) => [row.visit_date, row]));
    const dailySeries = eachDay(range.from, range.to).map((date) => {
      const row = byDate.get(date);
      return {
        date,
        visitCount: toNumber(row?.visit_count),
        revenue: roundMoney(toNumber(row?.revenue)),
      };
    });

    const visitCount = toNumber(totals?.visit_count);
    const rewardVisitCount = toNumber(totals?.reward_count);

    return {
      currency,
      from: range.from,
      to: range.to,
      total: roundMoney(toNumber(totals?.revenue)),
      visitCount,
      paidVisitCount: visitCount - rewardVisitCount,
      rewardVisitCount,
      byService: serviceRows.map((row) => ({
        serviceId: row.service_id,
        serviceName: row.service_name,
        visitCount: toNumber(row.visit_count),
        revenue: roundMoney(toNumber(row.revenue)),
      })),
      dailySeries,
    };
  }

  async function revenueSummary(): Promise<RevenueSummary> {
    const day = today();
    const ranges = {
      today: presetRange('today', day),
      last7Days: presetRange('last_7_days', day),
      thisMonth: presetRange('this_month', day),
    };

    const [todayRow, weekRow, monthRow] = await Promise.all([
      periodTotals(ranges.today),
      periodTotals(ranges.last7Days),
      periodTotals(ranges.thisMonth),
    ]);

    const toTotals = (range: DateRange, row: TotalsRow | undefined): PeriodTotals => ({
      from: range.from,
      to: range.to,
      revenue: roundMoney(toNumber(row?.revenue)),
      visitCount: toNumber(row?.visit_count),
    });

    return {
      currency,
      today: toTotals(ranges.today, todayRow),
      last7Days: toTotals(ranges.last7Days, weekRow),
      thisMonth: toTotals(ranges.thisMonth, monthRow),
    };
  }

  async function topCustomers(limit = DEFAULT_TOP_CUSTOMERS): Promise<TopCustomer[]> {
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_TOP_CUSTOMERS) {
      throw new ValidationError(`limit must be an integer between 1 and ${MAX_TOP_CUSTOMERS}`);
    }

    const rows = await db('customers')
      .orderBy('total_spent', 'desc')
      .orderBy('name', 'asc')
      .limit(limit)
      .select<TopCustomerRow[]>('id', 'name', 'plate_number', 'total_spent', 'total_visits');

    return rows.map((row) => ({
      customerId: row.id,
      name: row.name,
      plateNumber: row.plate_number,
      totalSpent: toNumber(row.total_spent),
      totalVisits: row.total_visits,
    }));
  }

  async function loyaltyStats(): Promise<LoyaltyStats> {
    const row = await db('customers')
      .select(
        db.raw('COUNT(*) AS customer_count'),
        db.raw('COUNT(*) FILTER (WHERE loyalty_points >= ?) AS eligible_count', [
          LOYALTY_THRESHOLD,
        ]),
        db.raw('COALESCE(AVG(loyalty_points), 0) AS avg_points'),
      )
      .first<LoyaltyStatsRow | undefined>();

    return {
      threshold: LOYALTY_THRESHOLD,
      customerCount: toNumber(row?.customer_count),
      eligibleCount: toNumber(row?.eligible_count),
      averagePoints: roundMoney(toNumber(row?.avg_points)),
    };
  }

  async function dashboard(): Promise<Dashboard> {
    const day = today();
    const cutoff = addDays(day, -atRiskDays);

    const customerCount = await db('customers').count('* as count').first<CountRow | undefined>();
    const visitsToday = await db('visits')
      .where({ visit_date: day })
      .count('* as count')
      .first<CountRow | undefined>();

    const atRiskCount = await db('customers')
      .whereNotNull('last_visit')
      .where('last_visit', '<', cutoff)
      .count('* as count')
      .first<CountRow | undefined>();
    const atRiskRows = await db('customers')
      .whereNotNull('last_visit')
      .where('last_visit', '<', cutoff)
      .orderBy('last_visit', 'asc')
      .limit(AT_RISK_LIST_LIMIT)
      .select<AtRiskRow[]>('id', 'name', 'phone', 'plate_number', 'last_visit');

    const averagePrice = await db('services')
      .where({ is_active: true })
      .avg('price as avg_price')
      .first<AveragePriceRow | undefined>();

    const revenue = await revenueSummary();
    const loyalty = await loyaltyStats();
    const recentVisits = await visitService.listRecentVisits();
    const leaders = await topCustomers();

    const riskCount = toNumber(atRiskCount?.count);
    const avgPrice =
      averagePrice?.avg_price === null || averagePrice?.avg_price === undefined
        ? FALLBACK_AVERAGE_PRICE
        : toNumber(averagePrice.avg_price);

    return {
      date: day,
      currency,
      totalCustomers: toNumber(customerCount?.count),
      visitsToday: toNumber(visitsToday?.count),
      revenue,
      loyalty,
      atRisk: {
        days: atRiskDays,
        count: riskCount,
        estimatedRevenueAtRisk: roundMoney(riskCount * avgPrice),
        customers: atRiskRows.map((row) => ({
          customerId: row.id,
          name: row.name,
          phone: row.phone,
          plateNumber: row.plate_number,
          lastVisit: row.last_visit,
          daysSinceLastVisit: daysBetween(row.last_visit.slice(0, 10), day),
        })),
      },
      recentVisits,
      topCustomers: leaders,
    };
  }

  return {
    revenueReport,
    revenueSummary,
    topCustomers,
    loyaltyStats,
    dashboard,
  };
}

export type ReportService = ReturnType<typeof createReportService>;
