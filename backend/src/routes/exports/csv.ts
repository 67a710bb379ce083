import type { FastifyInstance } from 'fastify';
import type { CsvExportService } from '../../services/csvExportService.js';
import { rangeQuerySchema } from '../reports/index.js';

export interface CsvExportRoutesDeps {
  csvExportService: CsvExportService;
}

interface ExportQuerystring {
  period?: string;
  from?: string;
  to?: string;
}

export async function csvExportRoutes(
  fastify: FastifyInstance,
  deps: CsvExportRoutesDeps,
) {
  const { csvExportService } = deps;

  // GET /api/exports/visits.csv — visit log for a period as CSV
  fastify.get<{ Querystring: ExportQuerystring }>(
    '/api/exports/visits.csv',
    { schema: { querystring: rangeQuerySchema } },
    async (request, reply) => {
      const { filename, csv } = await csvExportService.exportVisits(request.query);

      return reply
        .status(200)
        .header('Content-Type', 'text/csv; charset=utf-8')
        .header('Content-Disposition', `attachment; filename="${filename}"`)
        .send(csv);
    },
  );
}
