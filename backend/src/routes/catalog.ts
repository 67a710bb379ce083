import type { FastifyInstance } from 'fastify';
import type {
  CatalogService,
  CreateServiceInput,
  UpdateServiceInput,
} from '../services/catalogService.js';
import { UUID_PATTERN } from '../utils/sql.js';

export interface CatalogRoutesDeps {
  catalogService: CatalogService;
}

const serviceFields = {
  name: { type: 'string' as const, minLength: 1, maxLength: 255 },
  description: { type: ['string', 'null'] as const, maxLength: 1000 },
  price: { type: 'number' as const, minimum: 0 },
  durationMinutes: { type: 'integer' as const, minimum: 0 },
  isActive: { type: 'boolean' as const },
};

const idParams = {
  type: 'object' as const,
  required: ['id'],
  properties: {
    id: { type: 'string' as const, pattern: UUID_PATTERN },
  },
};

const createSchema = {
  body: {
    type: 'object' as const,
    required: ['name', 'price'],
    additionalProperties: false,
    properties: serviceFields,
  },
};

const updateSchema = {
  params: idParams,
  body: {
    type: 'object' as const,
    minProperties: 1,
    additionalProperties: false,
    properties: serviceFields,
  },
};

const statusSchema = {
  params: idParams,
  body: {
    type: 'object' as const,
    required: ['isActive'],
    additionalProperties: false,
    properties: {
      isActive: { type: 'boolean' as const },
    },
  },
};

const listSchema = {
  querystring: {
    type: 'object' as const,
    properties: {
      includeInactive: { type: 'boolean' as const },
    },
  },
};

export async function catalogRoutes(fastify: FastifyInstance, deps: CatalogRoutesDeps) {
  const { catalogService } = deps;

  // GET /api/services — active services; ?includeInactive=true for all
  fastify.get<{ Querystring: { includeInactive?: boolean } }>(
    '/api/services',
    { schema: listSchema },
    async (request, reply) => {
      const services = await catalogService.listServices({
        includeInactive: request.query.includeInactive === true,
      });

      return reply.status(200).send({
        success: true,
        data: { services },
      });
    },
  );

  // POST /api/services — add a service to the catalog
  fastify.post<{ Body: CreateServiceInput }>(
    '/api/services',
    { schema: createSchema },
    async (request, reply) => {
      const service = await catalogService.createService(request.body);

      return reply.status(201).send({
        success: true,
        data: service,
      });
    },
  );

  // GET /api/services/:id
  fastify.get<{ Params: { id: string } }>(
    '/api/services/:id',
    { schema: { params: idParams } },
    async (request, reply) => {
      const service = await catalogService.getService(request.params.id);

      return reply.status(200).send({
        success: true,
        data: service,
      });
    },
  );

  // PATCH /api/services/:id — edit name, description, price or duration
  fastify.patch<{ Params: { id: string }; Body: UpdateServiceInput }>(
    '/api/services/:id',
    { schema: updateSchema },
    async (request, reply) => {
      const service = await catalogService.updateService(request.params.id, request.body);

      return reply.status(200).send({
        success: true,
        data: service,
      });
    },
  );

  // PUT /api/services/:id/status — activate or retire a service
  fastify.put<{ Params: { id: string }; Body: { isActive: boolean } }>(
    '/api/services/:id/status',
    { schema: statusSchema },
    async (request, reply) => {
      const service = await catalogService.setServiceActive(
        request.params.id,
        request.body.isActive,
      );

      return reply.status(200).send({
        success: true,
        data: service,
      });
    },
  );
}
