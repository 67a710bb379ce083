import Fastify from 'fastify';
import { randomUUID } from 'node:crypto';
import { config } from './config.js';
import { logger } from './utils/logger.js';
import { createDb } from './db/connection.js';
import { registerErrorHandler } from './middleware/errorHandler.js';
import { healthRoutes } from './routes/health.js';
import { customerRoutes } from './routes/customers.js';
import { catalogRoutes } from './routes/catalog.js';
import { visitRoutes } from './routes/visits.js';
import { reportRoutes } from './routes/reports/index.js';
import { csvExportRoutes } from './routes/exports/csv.js';
import { createCustomerService } from './services/customerService.js';
import { createCatalogService } from './services/catalogService.js';
import { createVisitService } from './services/visitService.js';
import { createReportService } from './services/reportService.js';
import { createCsvExportService } from './services/csvExportService.js';

const startTime = Date.now();

const fastify = Fastify({
  logger: false,
  requestIdHeader: 'x-request-id',
  genReqId: () => randomUUID(),
});

// Database
const db = createDb(config.database);

const { timezone, currency, atRiskDays } = config.business;

// Request logging
fastify.addHook('onRequest', async (request) => {
  logger.info({ requestId: request.id, method: request.method, url: request.url }, 'Request received');
});

fastify.addHook('onResponse', async (request, reply) => {
  logger.info(
    { requestId: request.id, method: request.method, url: request.url, statusCode: reply.statusCode },
    'Request completed',
  );
});

// Error handler
registerErrorHandler(fastify);

// Services
const customerService = createCustomerService({ db, timezone });
const catalogService = createCatalogService({ db });
const visitService = createVisitService({ db, timezone });
const reportService = createReportService({ db, visitService, timezone, currency, atRiskDays });
const csvExportService = createCsvExportService({ db, timezone, currency });

// Routes
await fastify.register(
  async (instance) => healthRoutes(instance, { db, startTime }),
);

await fastify.register(
  async (instance) => customerRoutes(instance, { customerService }),
);

await fastify.register(
  async (instance) => catalogRoutes(instance, { catalogService }),
);

await fastify.register(
  async (instance) => visitRoutes(instance, { visitService }),
);

await fastify.register(
  async (instance) => reportRoutes(instance, { reportService }),
);

await fastify.register(
  async (instance) => csvExportRoutes(instance, { csvExportService }),
);

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down gracefully...');
  await fastify.close();
  await db.destroy();
  logger.info('Server shut down');
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((err: unknown) => {
    logger.error({ err }, 'Shutdown failed');
    process.exit(1);
  });
});
process.on('SIGINT', () => {
  shutdown('SIGINT').catch((err: unknown) => {
    logger.error({ err }, 'Shutdown failed');
    process.exit(1);
  });
});

// Start
try {
  await fastify.listen({ port: config.port, host: config.host });
  logger.info({ port: config.port, host: config.host, timezone }, 'Server started');
} catch (err) {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
}

export { fastify, db };
