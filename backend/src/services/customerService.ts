import type { Knex } from 'knex';
import {
  AppError,
  ConflictError,
  NotFoundError,
  StorageError,
  ValidationError,
  isUniqueViolation,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { evaluateLoyalty, type LoyaltyEvaluation } from '../loyalty/loyaltyPolicy.js';
import { replayVisits, type LedgerCounters } from '../ledger/customerLedger.js';
import { type Clock, systemClock, toDateKey, zonedNow } from '../utils/dates.js';
import { escapeLike, isUuid, toNumber } from '../utils/sql.js';

const QUICK_SEARCH_MIN_LENGTH = 2;
const QUICK_SEARCH_LIMIT = 10;

const MAX_NAME_LENGTH = 255;
const MAX_PHONE_LENGTH = 32;
const MAX_PLATE_LENGTH = 20;
const MAX_CAR_MODEL_LENGTH = 100;
const MAX_NOTES_LENGTH = 2000;

export interface CustomerRecord {
  id: string;
  name: string;
  phone: string;
  plate_number: string;
  car_model: string | null;
  total_visits: number;
  total_spent: number | string;
  loyalty_points: number;
  joined_date: string;
  last_visit: string | null;
  notes: string | null;
  created_at: string;
}

export interface Customer {
  id: string;
  name: string;
  phone: string;
  plateNumber: string;
  carModel: string | null;
  totalVisits: number;
  totalSpent: number;
  loyaltyPoints: number;
  joinedDate: string;
  lastVisit: string | null;
  notes: string | null;
}

export interface CustomerDetail extends Customer {
  loyalty: LoyaltyEvaluation;
}

export interface CustomerSearchHit {
  id: string;
  name: string;
  phone: string;
  plateNumber: string;
  loyaltyPoints: number;
  rewardEligible: boolean;
}

export interface CustomerVisit {
  id: string;
  serviceId: string;
  serviceName: string;
  visitDate: string;
  visitTime: string;
  amountPaid: number;
  paymentMethod: string;
  isLoyaltyReward: boolean;
  notes: string | null;
}

export interface LoyaltyStatus extends LoyaltyEvaluation {
  customerId: string;
}

export interface ReconcileResult {
  customerId: string;
  before: LedgerCounters;
  after: LedgerCounters;
  changed: boolean;
}

export interface RegisterCustomerInput {
  name: string;
  phone: string;
  plateNumber: string;
  carModel?: string | null;
  notes?: string | null;
}

export type UpdateCustomerInput = Partial<RegisterCustomerInput>;

export interface ListCustomersOptions {
  search?: string;
}

export interface CustomerServiceDeps {
  db: Knex;
  timezone: string;
  clock?: Clock;
}

interface CustomerVisitRow {
  id: string;
  service_id: string;
  service_name: string;
  visit_date: string;
  visit_time: string;
  amount_paid: number | string;
  payment_method: string;
  is_loyalty_reward: boolean;
  notes: string | null;
}

interface LedgerVisitRow {
  amount_paid: number | string;
  is_loyalty_reward: boolean;
  visit_date: string;
  visit_time: string;
}

/** Upper case, single spaces: "kda  123a " becomes "KDA 123A". */
export function normalizePlate(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toUpperCase();
}

export function toCustomer(record: CustomerRecord): Customer {
  return {
    id: record.id,
    name: record.name,
    phone: record.phone,
    plateNumber: record.plate_number,
    carModel: record.car_model,
    totalVisits: record.total_visits,
    totalSpent: toNumber(record.total_spent),
    loyaltyPoints: record.loyalty_points,
    joinedDate: record.joined_date,
    lastVisit: record.last_visit,
    notes: record.notes,
  };
}

export function toLedgerCounters(record: CustomerRecord): LedgerCounters {
  return {
    totalVisits: record.total_visits,
    totalSpent: toNumber(record.total_spent),
    loyaltyPoints: record.loyalty_points,
    lastVisit: record.last_visit,
  };
}

function requireText(value: unknown, field: string, maxLength: number): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${field} is required`);
  }
  const trimmed = value.trim();
  if (trimmed.length > maxLength) {
    throw new ValidationError(`${field} must be at most ${maxLength} characters`);
  }
  return trimmed;
}

function optionalText(value: unknown, field: string, maxLength: number): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`);
  }
  const trimmed = value.trim();
  if (trimmed.length > maxLength) {
    throw new ValidationError(`${field} must be at most ${maxLength} characters`);
  }
  return trimmed.length > 0 ? trimmed : null;
}

function requirePlate(value: unknown): string {
  return normalizePlate(requireText(value, 'plateNumber', MAX_PLATE_LENGTH));
}

/**
 * Loads a customer or throws NotFound. Inside a transaction that rewrites the
 * cached counters, pass `forUpdate` so concurrent writers queue on the row.
 */
export async function findCustomerRecord(
  conn: Knex,
  customerId: string,
  options: { forUpdate?: boolean } = {},
): Promise<CustomerRecord> {
  if (!isUuid(customerId)) {
    throw new NotFoundError('Customer not found');
  }
  const query = conn('customers').where({ id: customerId });
  if (options.forUpdate) {
    query.forUpdate();
  }
  const record = await query.first<CustomerRecord | undefined>();
  if (!record) {
    throw new NotFoundError('Customer not found');
  }
  return record;
}

export function createCustomerService(deps: CustomerServiceDeps) {
  const { db, timezone } = deps;
  const clock = deps.clock ?? systemClock;

  async function registerCustomer(input: RegisterCustomerInput): Promise<Customer> {
    const row = {
      name: requireText(input.name, 'name', MAX_NAME_LENGTH),
      phone: requireText(input.phone, 'phone', MAX_PHONE_LENGTH),
      plate_number: requirePlate(input.plateNumber),
      car_model: optionalText(input.carModel, 'carModel', MAX_CAR_MODEL_LENGTH),
      notes: optionalText(input.notes, 'notes', MAX_NOTES_LENGTH),
      joined_date: toDateKey(zonedNow(clock, timezone)),
    };

    try {
      const [record] = await db('customers').insert(row).returning<CustomerRecord[]>('*');
      logger.info(
        { customerId: record.id, plateNumber: record.plate_number },
        'Customer registered',
      );
      return toCustomer(record);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError('A customer with this phone number already exists', {
          cause: err,
        });
      }
      throw err;
    }
  }

  async function updateCustomer(
    customerId: string,
    input: UpdateCustomerInput,
  ): Promise<Customer> {
    const changes: Partial<Omit<CustomerRecord, 'id'>> = {};
    if (input.name !== undefined) {
      changes.name = requireText(input.name, 'name', MAX_NAME_LENGTH);
    }
    if (input.phone !== undefined) {
      changes.phone = requireText(input.phone, 'phone', MAX_PHONE_LENGTH);
    }
    if (input.plateNumber !== undefined) {
      changes.plate_number = requirePlate(input.plateNumber);
    }
    if (input.carModel !== undefined) {
      changes.car_model = optionalText(input.carModel, 'carModel', MAX_CAR_MODEL_LENGTH);
    }
    if (input.notes !== undefined) {
      changes.notes = optionalText(input.notes, 'notes', MAX_NOTES_LENGTH);
    }
    if (Object.keys(changes).length === 0) {
      throw new ValidationError('No customer fields to update');
    }
    if (!isUuid(customerId)) {
      throw new NotFoundError('Customer not found');
    }

    try {
      const [record] = await db('customers')
        .where({ id: customerId })
        .update(changes)
        .returning<CustomerRecord[]>('*');

      if (!record) {
        throw new NotFoundError('Customer not found');
      }

      logger.info({ customerId, fields: Object.keys(changes) }, 'Customer updated');
      return toCustomer(record);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError('Phone number already in use by another customer', {
          cause: err,
        });
      }
      throw err;
    }
  }

  async function getCustomer(customerId: string): Promise<CustomerDetail> {
    const record = await findCustomerRecord(db, customerId);
    return {
      ...toCustomer(record),
      loyalty: evaluateLoyalty(record.loyalty_points),
    };
  }

  async function searchCustomers(query: string, limit?: number): Promise<Customer[]> {
    const term = query.trim();
    if (term.length === 0) {
      return listCustomers();
    }

    const pattern = `%${escapeLike(term)}%`;
    const compactPattern = `%${escapeLike(term.replace(/\s+/g, ''))}%`;
    const exact = term.toLowerCase();

    const builder = db('customers')
      .where((qb) => {
        qb.whereILike('name', pattern)
          .orWhereILike('phone', pattern)
          .orWhereILike('plate_number', pattern)
          .orWhereRaw("REPLACE(plate_number, ' ', '') ILIKE ?", [compactPattern]);
      })
      .orderByRaw(
        'CASE WHEN LOWER(name) = ? OR LOWER(phone) = ? OR LOWER(plate_number) = ? THEN 0 ELSE 1 END',
        [exact, exact, exact],
      )
      .orderBy('total_visits', 'desc')
      .orderBy('name', 'asc');

    if (limit !== undefined) {
      builder.limit(limit);
    }

    const records = await builder.select<CustomerRecord[]>('*');
    return records.map(toCustomer);
  }

  async function listCustomers(options: ListCustomersOptions = {}): Promise<Customer[]> {
    if (options.search !== undefined && options.search.trim().length > 0) {
      return searchCustomers(options.search);
    }

    const records = await db('customers')
      .orderBy('total_visits', 'desc')
      .orderBy('name', 'asc')
      .select<CustomerRecord[]>('*');
    return records.map(toCustomer);
  }

  async function quickSearch(query: string): Promise<CustomerSearchHit[]> {
    if (query.trim().length < QUICK_SEARCH_MIN_LENGTH) {
      return [];
    }
    const customers = await searchCustomers(query, QUICK_SEARCH_LIMIT);
    return customers.map((customer) => ({
      id: customer.id,
      name: customer.name,
      phone: customer.phone,
      plateNumber: customer.plateNumber,
      loyaltyPoints: customer.loyaltyPoints,
      rewardEligible: evaluateLoyalty(customer.loyaltyPoints).eligible,
    }));
  }

  async function getCustomerVisits(customerId: string): Promise<CustomerVisit[]> {
    await findCustomerRecord(db, customerId);

    const rows = await db('visits as v')
      .join('services as s', 'v.service_id', 's.id')
      .where('v.customer_id', customerId)
      .orderBy('v.visit_date', 'desc')
      .orderBy('v.visit_time', 'desc')
      .orderBy('v.created_at', 'desc')
      .select<CustomerVisitRow[]>(
        'v.id',
        'v.service_id',
        's.name as service_name',
        'v.visit_date',
        'v.visit_time',
        'v.amount_paid',
        'v.payment_method',
        'v.is_loyalty_reward',
        'v.notes',
      );

    return rows.map((row) => ({
      id: row.id,
      serviceId: row.service_id,
      serviceName: row.service_name,
      visitDate: row.visit_date,
      visitTime: row.visit_time,
      amountPaid: toNumber(row.amount_paid),
      paymentMethod: row.payment_method,
      isLoyaltyReward: row.is_loyalty_reward,
      notes: row.notes,
    }));
  }

  async function loyaltyStatus(customerId: string): Promise<LoyaltyStatus> {
    const record = await findCustomerRecord(db, customerId);
    return {
      customerId: record.id,
      ...evaluateLoyalty(record.loyalty_points),
    };
  }

  /**
   * Rebuilds the cached counters from the visit log. Returns both versions so
   * callers can see whether the cache had drifted.
   */
  async function reconcileCustomer(customerId: string): Promise<ReconcileResult> {
    if (!isUuid(customerId)) {
      throw new NotFoundError('Customer not found');
    }

    const trx = await db.transaction();
    try {
      const record = await findCustomerRecord(trx, customerId, { forUpdate: true });

      const rows = await trx('visits')
        .where({ customer_id: customerId })
        .orderBy('visit_date', 'asc')
        .orderBy('visit_time', 'asc')
        .orderBy('created_at', 'asc')
        .select<LedgerVisitRow[]>('amount_paid', 'is_loyalty_reward', 'visit_date', 'visit_time');

      const before = toLedgerCounters(record);
      const after = replayVisits(
        rows.map((row) => ({
          amountPaid: toNumber(row.amount_paid),
          isLoyaltyReward: row.is_loyalty_reward,
          visitDate: row.visit_date,
          visitTime: row.visit_time,
        })),
      );

      const changed =
        before.totalVisits !== after.totalVisits ||
        before.totalSpent !== after.totalSpent ||
        before.loyaltyPoints !== after.loyaltyPoints ||
        before.lastVisit !== after.lastVisit;

      if (changed) {
        await trx('customers').where({ id: customerId }).update({
          total_visits: after.totalVisits,
          total_spent: after.totalSpent,
          loyalty_points: after.loyaltyPoints,
          last_visit: after.lastVisit,
        });
      }

      await trx.commit();

      if (changed) {
        logger.warn({ customerId, before, after }, 'Customer counters drifted; rebuilt from visit log');
      } else {
        logger.info({ customerId }, 'Customer counters match visit log');
      }

      return { customerId, before, after, changed };
    } catch (err) {
      await trx.rollback();
      if (err instanceof AppError) {
        throw err;
      }
      throw new StorageError('Customer counters could not be rebuilt', { cause: err });
    }
  }

  return {
    registerCustomer,
    updateCustomer,
    getCustomer,
    listCustomers,
    searchCustomers,
    quickSearch,
    getCustomerVisits,
    loyaltyStatus,
    reconcileCustomer,
  };
}

export type CustomerService = ReturnType<typeof createCustomerService>;
