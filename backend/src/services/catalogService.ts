import type { Knex } from 'knex';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { roundMoney } from '../ledger/customerLedger.js';
import { isUuid, toNumber } from '../utils/sql.js';

const DEFAULT_DURATION_MINUTES = 30;
const MAX_NAME_LENGTH = 255;
const MAX_DESCRIPTION_LENGTH = 1000;

export interface ServiceRecord {
  id: string;
  name: string;
  description: string | null;
  price: number | string;
  duration_minutes: number;
  is_active: boolean;
  created_at: string;
}

export interface WashService {
  id: string;
  name: string;
  description: string | null;
  price: number;
  durationMinutes: number;
  isActive: boolean;
}

export interface CreateServiceInput {
  name: string;
  description?: string | null;
  price: number;
  durationMinutes?: number;
  isActive?: boolean;
}

export type UpdateServiceInput = Partial<CreateServiceInput>;

export interface ListServicesOptions {
  includeInactive?: boolean;
}

export interface CatalogServiceDeps {
  db: Knex;
}

export function toWashService(record: ServiceRecord): WashService {
  return {
    id: record.id,
    name: record.name,
    description: record.description,
    price: toNumber(record.price),
    durationMinutes: record.duration_minutes,
    isActive: record.is_active,
  };
}

function validateName(value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError('name is required');
  }
  const trimmed = value.trim();
  if (trimmed.length > MAX_NAME_LENGTH) {
    throw new ValidationError(`name must be at most ${MAX_NAME_LENGTH} characters`);
  }
  return trimmed;
}

function validateDescription(value: unknown): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new ValidationError('description must be a string');
  }
  const trimmed = value.trim();
  if (trimmed.length > MAX_DESCRIPTION_LENGTH) {
    throw new ValidationError(
      `description must be at most ${MAX_DESCRIPTION_LENGTH} characters`,
    );
  }
  return trimmed.length > 0 ? trimmed : null;
}

function validatePrice(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ValidationError('price must be a non-negative number');
  }
  return roundMoney(value);
}

function validateDuration(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ValidationError('durationMinutes must be a non-negative integer');
  }
  return value;
}

function validateActive(value: unknown): boolean {
  if (typeof value !== 'boolean') {
    throw new ValidationError('isActive must be a boolean');
  }
  return value;
}

export function createCatalogService(deps: CatalogServiceDeps) {
  const { db } = deps;

  async function getService(serviceId: string): Promise<WashService> {
    if (!isUuid(serviceId)) {
      throw new NotFoundError('Service not found');
    }
    const record = await db('services')
      .where({ id: serviceId })
      .first<ServiceRecord | undefined>();
    if (!record) {
      throw new NotFoundError('Service not found');
    }
    return toWashService(record);
  }

  async function listServices(options: ListServicesOptions = {}): Promise<WashService[]> {
    const builder = db('services').orderBy('price', 'asc').orderBy('name', 'asc');
    if (!options.includeInactive) {
      builder.where({ is_active: true });
    }
    const records = await builder.select<ServiceRecord[]>('*');
    return records.map(toWashService);
  }

  async function createService(input: CreateServiceInput): Promise<WashService> {
    const row = {
      name: validateName(input.name),
      description: validateDescription(input.description),
      price: validatePrice(input.price),
      duration_minutes:
        input.durationMinutes === undefined
          ? DEFAULT_DURATION_MINUTES
          : validateDuration(input.durationMinutes),
      is_active: input.isActive === undefined ? true : validateActive(input.isActive),
    };

    const [record] = await db('services').insert(row).returning<ServiceRecord[]>('*');

    logger.info({ serviceId: record.id, name: record.name, price: row.price }, 'Service created');
    return toWashService(record);
  }

  async function updateService(
    serviceId: string,
    input: UpdateServiceInput,
  ): Promise<WashService> {
    const changes: Partial<Omit<ServiceRecord, 'id' | 'created_at'>> = {};
    if (input.name !== undefined) {
      changes.name = validateName(input.name);
    }
    if (input.description !== undefined) {
      changes.description = validateDescription(input.description);
    }
    if (input.price !== undefined) {
      changes.price = validatePrice(input.price);
    }
    if (input.durationMinutes !== undefined) {
      changes.duration_minutes = validateDuration(input.durationMinutes);
    }
    if (input.isActive !== undefined) {
      changes.is_active = validateActive(input.isActive);
    }
    if (Object.keys(changes).length === 0) {
      throw new ValidationError('No service fields to update');
    }
    if (!isUuid(serviceId)) {
      throw new NotFoundError('Service not found');
    }

    const [record] = await db('services')
      .where({ id: serviceId })
      .update(changes)
      .returning<ServiceRecord[]>('*');

    if (!record) {
      throw new NotFoundError('Service not found');
    }

    logger.info({ serviceId, fields: Object.keys(changes) }, 'Service updated');
    return toWashService(record);
  }

  async function setServiceActive(serviceId: string, isActive: boolean): Promise<WashService> {
    return updateService(serviceId, { isActive });
  }

  return {
    getService,
    listServices,
    createService,
    updateService,
    setServiceActive,
  };
}

export type CatalogService = ReturnType<typeof createCatalogService>;
