import type { FastifyInstance } from 'fastify';
import type { RecordVisitInput, VisitService } from '../services/visitService.js';
import { PAYMENT_METHODS } from '../services/visitService.js';
import { UUID_PATTERN } from '../utils/sql.js';

export interface VisitRoutesDeps {
  visitService: VisitService;
}

const checkInSchema = {
  body: {
    type: 'object' as const,
    required: ['customerId', 'serviceId', 'paymentMethod'],
    additionalProperties: false,
    properties: {
      customerId: { type: 'string' as const, pattern: UUID_PATTERN },
      serviceId: { type: 'string' as const, pattern: UUID_PATTERN },
      paymentMethod: { type: 'string' as const, enum: [...PAYMENT_METHODS] },
      isLoyaltyReward: { type: 'boolean' as const },
      amountPaid: { type: 'number' as const, minimum: 0 },
      notes: { type: ['string', 'null'] as const, maxLength: 2000 },
    },
  },
};

const recentSchema = {
  querystring: {
    type: 'object' as const,
    properties: {
      limit: { type: 'integer' as const, minimum: 1, maximum: 50 },
    },
  },
};

export async function visitRoutes(fastify: FastifyInstance, deps: VisitRoutesDeps) {
  const { visitService } = deps;

  // POST /api/visits — check-in (paid visit or loyalty redemption)
  fastify.post<{ Body: RecordVisitInput }>(
    '/api/visits',
    { schema: checkInSchema },
    async (request, reply) => {
      const result = await visitService.recordVisit(request.body);

      return reply.status(201).send({
        success: true,
        data: result,
      });
    },
  );

  // GET /api/visits/recent — latest check-ins
  fastify.get<{ Querystring: { limit?: number } }>(
    '/api/visits/recent',
    { schema: recentSchema },
    async (request, reply) => {
      const visits = await visitService.listRecentVisits(request.query.limit);

      return reply.status(200).send({
        success: true,
        data: { visits },
      });
    },
  );
}
