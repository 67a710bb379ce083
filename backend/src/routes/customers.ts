import type { FastifyInstance } from 'fastify';
import type {
  CustomerService,
  RegisterCustomerInput,
  UpdateCustomerInput,
} from '../services/customerService.js';
import { UUID_PATTERN } from '../utils/sql.js';

export interface CustomerRoutesDeps {
  customerService: CustomerService;
}

const customerFields = {
  name: { type: 'string' as const, minLength: 1, maxLength: 255 },
  phone: { type: 'string' as const, minLength: 1, maxLength: 32 },
  plateNumber: { type: 'string' as const, minLength: 1, maxLength: 20 },
  carModel: { type: ['string', 'null'] as const, maxLength: 100 },
  notes: { type: ['string', 'null'] as const, maxLength: 2000 },
};

const registerSchema = {
  body: {
    type: 'object' as const,
    required: ['name', 'phone', 'plateNumber'],
    additionalProperties: false,
    properties: customerFields,
  },
};

const updateSchema = {
  params: {
    type: 'object' as const,
    required: ['id'],
    properties: {
      id: { type: 'string' as const, pattern: UUID_PATTERN },
    },
  },
  body: {
    type: 'object' as const,
    minProperties: 1,
    additionalProperties: false,
    properties: customerFields,
  },
};

const idParamsSchema = {
  params: {
    type: 'object' as const,
    required: ['id'],
    properties: {
      id: { type: 'string' as const, pattern: UUID_PATTERN },
    },
  },
};

const listSchema = {
  querystring: {
    type: 'object' as const,
    properties: {
      search: { type: 'string' as const, maxLength: 100 },
    },
  },
};

const quickSearchSchema = {
  querystring: {
    type: 'object' as const,
    properties: {
      q: { type: 'string' as const, maxLength: 100 },
    },
  },
};

export async function customerRoutes(fastify: FastifyInstance, deps: CustomerRoutesDeps) {
  const { customerService } = deps;

  // POST /api/customers — register a customer
  fastify.post<{ Body: RegisterCustomerInput }>(
    '/api/customers',
    { schema: registerSchema },
    async (request, reply) => {
      const customer = await customerService.registerCustomer(request.body);

      return reply.status(201).send({
        success: true,
        data: customer,
      });
    },
  );

  // GET /api/customers — list customers, optionally filtered by ?search=
  fastify.get<{ Querystring: { search?: string } }>(
    '/api/customers',
    { schema: listSchema },
    async (request, reply) => {
      const customers = await customerService.listCustomers({ search: request.query.search });

      return reply.status(200).send({
        success: true,
        data: { customers },
      });
    },
  );

  // GET /api/customers/search?q= — autocomplete for check-in
  fastify.get<{ Querystring: { q?: string } }>(
    '/api/customers/search',
    { schema: quickSearchSchema },
    async (request, reply) => {
      const results = await customerService.quickSearch(request.query.q ?? '');

      return reply.status(200).send({
        success: true,
        data: { results },
      });
    },
  );

  // GET /api/customers/:id — profile with loyalty status
  fastify.get<{ Params: { id: string } }>(
    '/api/customers/:id',
    { schema: idParamsSchema },
    async (request, reply) => {
      const customer = await customerService.getCustomer(request.params.id);

      return reply.status(200).send({
        success: true,
        data: customer,
      });
    },
  );

  // PATCH /api/customers/:id — edit profile fields
  fastify.patch<{ Params: { id: string }; Body: UpdateCustomerInput }>(
    '/api/customers/:id',
    { schema: updateSchema },
    async (request, reply) => {
      const customer = await customerService.updateCustomer(request.params.id, request.body);

      return reply.status(200).send({
        success: true,
        data: customer,
      });
    },
  );

  // GET /api/customers/:id/visits — visit history, newest first
  fastify.get<{ Params: { id: string } }>(
    '/api/customers/:id/visits',
    { schema: idParamsSchema },
    async (request, reply) => {
      const visits = await customerService.getCustomerVisits(request.params.id);

      return reply.status(200).send({
        success: true,
        data: { visits },
      });
    },
  );

  // GET /api/customers/:id/loyalty — points and reward eligibility
  fastify.get<{ Params: { id: string } }>(
    '/api/customers/:id/loyalty',
    { schema: idParamsSchema },
    async (request, reply) => {
      const status = await customerService.loyaltyStatus(request.params.id);

      return reply.status(200).send({
        success: true,
        data: status,
      });
    },
  );

  // POST /api/customers/:id/reconcile — rebuild counters from the visit log
  fastify.post<{ Params: { id: string } }>(
    '/api/customers/:id/reconcile',
    { schema: idParamsSchema },
    async (request, reply) => {
      const result = await customerService.reconcileCustomer(request.params.id);

      return reply.status(200).send({
        success: true,
        data: result,
      });
    },
  );
}
