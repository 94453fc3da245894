// =============================================================
// File: server/app.ts
// Description: Fastify server factory: plugins, JSON body
//              parsing, the error envelope and route
//              registration under /api.
// =============================================================

import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import sensible from '@fastify/sensible';
import { ZodError } from 'zod';
import { initializeDb } from './database/connection';
import { loggerOptions } from './lib/logger';
import { AppError, ValidationError } from './lib/errors';
import { healthRoutes } from './routes/health';
import { customerRoutes } from './routes/customers';
import { catalogRoutes } from './routes/catalog';
import { quotationRoutes } from './routes/quotations';
import { invoiceRoutes } from './routes/invoices';
import { paymentRoutes } from './routes/payments';
import { reportRoutes } from './routes/reports';

function zodIssues(error: ZodError) {
  return error.issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message }));
}

export async function buildServer(): Promise<FastifyInstance> {
  const server = Fastify({ logger: loggerOptions });

  // Plugins
  await server.register(cors, {
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });
  await server.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });
  await server.register(sensible);

  // Action endpoints (issue, cancel, convert) are often posted with a JSON
  // content type and no body.
  server.removeContentTypeParser('application/json');
  server.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    const text = (typeof body === 'string' ? body : body.toString('utf8')).trim();
    if (!text) {
      done(null, {});
      return;
    }
    try {
      done(null, JSON.parse(text));
    } catch {
      done(new ValidationError('Request body is not valid JSON'), undefined);
    }
  });

  server.setErrorHandler((error: FastifyError | AppError | ZodError, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.warn({ err: error }, error.message);
      }
      return reply.code(error.statusCode).send(error.toResponse());
    }
    if (error instanceof ZodError) {
      return reply.code(400).send({
        success: false,
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        issues: zodIssues(error),
      });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ success: false, error: error.message });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({ success: false, error: 'Something went wrong. Please try again.' });
  });

  // Initialize database
  await initializeDb();

  // Register routes
  await server.register(healthRoutes, { prefix: '/api' });
  await server.register(customerRoutes, { prefix: '/api' });
  await server.register(catalogRoutes, { prefix: '/api' });
  await server.register(quotationRoutes, { prefix: '/api' });
  await server.register(invoiceRoutes, { prefix: '/api' });
  await server.register(paymentRoutes, { prefix: '/api' });
  await server.register(reportRoutes, { prefix: '/api' });

  return server;
}
