import type { Knex } from 'knex';
import {
  AppError,
  InvalidStateError,
  NotFoundError,
  StorageError,
  ValidationError,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  LOYALTY_THRESHOLD,
  canRedeemReward,
  evaluateLoyalty,
  type LoyaltyEvaluation,
} from '../loyalty/loyaltyPolicy.js';
import { applyVisit, roundMoney, type LedgerCounters } from '../ledger/customerLedger.js';
import { type Clock, systemClock, toDateKey, toTimeKey, zonedNow } from '../utils/dates.js';
import { isUuid, toNumber } from '../utils/sql.js';
import { findCustomerRecord, toLedgerCounters } from './customerService.js';
import type { ServiceRecord } from './catalogService.js';

const DEFAULT_RECENT_LIMIT = 10;
const MAX_RECENT_LIMIT = 50;
const MAX_NOTES_LENGTH = 2000;

export const PAYMENT_METHODS = ['cash', 'mobile_money', 'card'] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export interface VisitRecord {
  id: string;
  customer_id: string;
  service_id: string;
  visit_date: string;
  visit_time: string;
  amount_paid: number | string;
  payment_method: PaymentMethod;
  is_loyalty_reward: boolean;
  notes: string | null;
  created_at: string;
}

export interface Visit {
  id: string;
  customerId: string;
  serviceId: string;
  visitDate: string;
  visitTime: string;
  amountPaid: number;
  paymentMethod: PaymentMethod;
  isLoyaltyReward: boolean;
  notes: string | null;
}

export interface RecordVisitInput {
  customerId: string;
  serviceId: string;
  paymentMethod: string;
  isLoyaltyReward?: boolean;
  /** Manual amount for a paid visit; ignored for loyalty rewards. */
  amountPaid?: number;
  notes?: string | null;
}

export interface RecordVisitResult {
  visit: Visit;
  customer: LedgerCounters & { id: string; name: string };
  loyalty: LoyaltyEvaluation;
}

export interface RecentVisit {
  id: string;
  customerId: string;
  customerName: string;
  plateNumber: string;
  serviceId: string;
  serviceName: string;
  visitDate: string;
  visitTime: string;
  amountPaid: number;
  paymentMethod: PaymentMethod;
  isLoyaltyReward: boolean;
}

export interface VisitServiceDeps {
  db: Knex;
  timezone: string;
  clock?: Clock;
}

interface RecentVisitRow {
  id: string;
  customer_id: string;
  customer_name: string;
  plate_number: string;
  service_id: string;
  service_name: string;
  visit_date: string;
  visit_time: string;
  amount_paid: number | string;
  payment_method: PaymentMethod;
  is_loyalty_reward: boolean;
}

export function isPaymentMethod(value: string): value is PaymentMethod {
  return (PAYMENT_METHODS as readonly string[]).includes(value);
}

export function toVisit(record: VisitRecord): Visit {
  return {
    id: record.id,
    customerId: record.customer_id,
    serviceId: record.service_id,
    visitDate: record.visit_date,
    visitTime: record.visit_time,
    amountPaid: toNumber(record.amount_paid),
    paymentMethod: record.payment_method,
    isLoyaltyReward: record.is_loyalty_reward,
    notes: record.notes,
  };
}

function validateOverride(value: number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ValidationError('amountPaid must be a non-negative number');
  }
  return roundMoney(value);
}

function validateNotes(value: string | null | undefined): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length > MAX_NOTES_LENGTH) {
    throw new ValidationError(`notes must be at most ${MAX_NOTES_LENGTH} characters`);
  }
  return trimmed.length > 0 ? trimmed : null;
}

export function createVisitService(deps: VisitServiceDeps) {
  const { db, timezone } = deps;
  const clock = deps.clock ?? systemClock;

  /**
   * Check-in. Inserts the visit and advances the customer's cached counters in
   * one transaction; any failure rolls both back.
   */
  async function recordVisit(input: RecordVisitInput): Promise<RecordVisitResult> {
    const { customerId, serviceId } = input;
    const isLoyaltyReward = input.isLoyaltyReward === true;

    if (!isPaymentMethod(input.paymentMethod)) {
      throw new ValidationError(
        `Invalid paymentMethod: must be one of ${PAYMENT_METHODS.join(', ')}`,
      );
    }
    const paymentMethod = input.paymentMethod;
    const override = validateOverride(input.amountPaid);
    const notes = validateNotes(input.notes);

    if (!isUuid(customerId)) {
      throw new NotFoundError('Customer not found');
    }
    if (!isUuid(serviceId)) {
      throw new NotFoundError('Service not found');
    }

    const trx = await db.transaction();
    try {
      const customer = await findCustomerRecord(trx, customerId, { forUpdate: true });

      const service = await trx('services')
        .where({ id: serviceId })
        .first<ServiceRecord | undefined>();
      if (!service) {
        throw new NotFoundError('Service not found');
      }
      if (!service.is_active) {
        throw new InvalidStateError(`Service "${service.name}" is not available for new check-ins`);
      }

      const current = toLedgerCounters(customer);
      if (isLoyaltyReward && !canRedeemReward(current.loyaltyPoints)) {
        throw new InvalidStateError(
          `Free wash not available: ${current.loyaltyPoints} of ${LOYALTY_THRESHOLD} loyalty points`,
        );
      }

      const amountPaid = isLoyaltyReward ? 0 : override ?? roundMoney(toNumber(service.price));
      const now = zonedNow(clock, timezone);
      const visitDate = toDateKey(now);
      const visitTime = toTimeKey(now);

      const [visitRecord] = await trx('visits')
        .insert({
          customer_id: customerId,
          service_id: serviceId,
          visit_date: visitDate,
          visit_time: visitTime,
          amount_paid: amountPaid,
          payment_method: paymentMethod,
          is_loyalty_reward: isLoyaltyReward,
          notes,
        })
        .returning<VisitRecord[]>('*');

      const next = applyVisit(current, { amountPaid, isLoyaltyReward, visitDate, visitTime });

      await trx('customers').where({ id: customerId }).update({
        total_visits: next.totalVisits,
        total_spent: next.totalSpent,
        loyalty_points: next.loyaltyPoints,
        last_visit: next.lastVisit,
      });

      await trx.commit();

      const loyalty = evaluateLoyalty(next.loyaltyPoints);
      logger.info(
        {
          visitId: visitRecord.id,
          customerId,
          serviceId,
          amountPaid,
          paymentMethod,
          isLoyaltyReward,
          loyaltyPoints: next.loyaltyPoints,
        },
        isLoyaltyReward ? 'Loyalty reward redeemed' : 'Visit recorded',
      );

      return {
        visit: toVisit(visitRecord),
        customer: { id: customer.id, name: customer.name, ...next },
        loyalty,
      };
    } catch (err) {
      await trx.rollback();
      if (err instanceof AppError) {
        throw err;
      }
      throw new StorageError('Check-in could not be saved', { cause: err });
    }
  }

  async function listRecentVisits(limit = DEFAULT_RECENT_LIMIT): Promise<RecentVisit[]> {
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_RECENT_LIMIT) {
      throw new ValidationError(`limit must be an integer between 1 and ${MAX_RECENT_LIMIT}`);
    }

    const rows = await db('visits as v')
      .join('customers as c', 'v.customer_id', 'c.id')
      .join('services as s', 'v.service_id', 's.id')
      .orderBy('v.visit_date', 'desc')
      .orderBy('v.visit_time', 'desc')
      .orderBy('v.created_at', 'desc')
      .limit(limit)
      .select<RecentVisitRow[]>(
        'v.id',
        'v.customer_id',
        'c.name as customer_name',
        'c.plate_number',
        'v.service_id',
        's.name as service_name',
        'v.visit_date',
        'v.visit_time',
        'v.amount_paid',
        'v.payment_method',
        'v.is_loyalty_reward',
      );

    return rows.map((row) => ({
      id: row.id,
      customerId: row.customer_id,
      customerName: row.customer_name,
      plateNumber: row.plate_number,
      serviceId: row.service_id,
      serviceName: row.service_name,
      visitDate: row.visit_date,
      visitTime: row.visit_time,
      amountPaid: toNumber(row.amount_paid),
      paymentMethod: row.payment_method,
      isLoyaltyReward: row.is_loyalty_reward,
    }));
  }

  return {
    recordVisit,
    listRecentVisits,
  };
}

export type VisitService = ReturnType<typeof createVisitService>;
