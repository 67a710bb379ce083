import type { FastifyInstance } from 'fastify';
import type { ReportService } from '../../services/reportService.js';
import { PERIOD_PRESETS } from '../../utils/dates.js';

export interface ReportRoutesDeps {
  reportService: ReportService;
}

interface RangeQuerystring {
  period?: string;
  from?: string;
  to?: string;
}

export const rangeQuerySchema = {
  type: 'object' as const,
  additionalProperties: false,
  properties: {
    period: { type: 'string' as const, enum: [...PERIOD_PRESETS] },
    from: { type: 'string' as const, pattern: '^\\d{4}-\\d{2}-\\d{2}$' },
    to: { type: 'string' as const, pattern: '^\\d{4}-\\d{2}-\\d{2}$' },
  },
};

const topCustomersSchema = {
  querystring: {
    type: 'object' as const,
    properties: {
      limit: { type: 'integer' as const, minimum: 1, maximum: 50 },
    },
  },
};

export async function reportRoutes(fastify: FastifyInstance, deps: ReportRoutesDeps) {
  const { reportService } = deps;

  // GET /api/reports/revenue — ?period=today|last_7_days|this_month or ?from=&to=
  fastify.get<{ Querystring: RangeQuerystring }>(
    '/api/reports/revenue',
    { schema: { querystring: rangeQuerySchema } },
    async (request, reply) => {
      const report = await reportService.revenueReport(request.query);

      return reply.status(200).send({
        success: true,
        data: report,
      });
    },
  );

  // GET /api/reports/summary — today, last 7 days, this month
  fastify.get('/api/reports/summary', async (_request, reply) => {
    const summary = await reportService.revenueSummary();

    return reply.status(200).send({
      success: true,
      data: summary,
    });
  });

  // GET /api/reports/top-customers — leaderboard by total spent
  fastify.get<{ Querystring: { limit?: number } }>(
    '/api/reports/top-customers',
    { schema: topCustomersSchema },
    async (request, reply) => {
      const customers = await reportService.topCustomers(request.query.limit);

      return reply.status(200).send({
        success: true,
        data: { customers },
      });
    },
  );

  // GET /api/reports/loyalty — eligible customers and average points
  fastify.get('/api/reports/loyalty', async (_request, reply) => {
    const stats = await reportService.loyaltyStats();

    return reply.status(200).send({
      success: true,
      data: stats,
    });
  });

  // GET /api/reports/dashboard — everything the home screen shows
  fastify.get('/api/reports/dashboard', async (_request, reply) => {
    const dashboard = await reportService.dashboard();

    return reply.status(200).send({
      success: true,
      data: dashboard,
    });
  });
}
