import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Broker } from '../core/broker';

// ---------- Schemas ----------
const healthQuerySchema = z.object({
  key: z.string().optional(),
});

export interface HealthRouteOptions {
  broker: Broker;
  // Already normalised: '' for the root, otherwise '/segment'
  prefix: string;
  serverKey: string;
  version: string;
}

// ---------- Routes ----------
export async function registerHealthRoutes(app: FastifyInstance, options: HealthRouteOptions) {
  const { broker, prefix, serverKey, version } = options;

  if (prefix !== '') {
    app.get('/', async (_req, reply) => reply.redirect(`${prefix}/`));
  }

  app.get(`${prefix}/`, async () => ({ message: 'MCP Endpoint Server', version, status: 'running' }));

  // Stats are only served to callers that present the server key.
  app.get(`${prefix}/health`, async (req) => {
    const parsed = healthQuerySchema.safeParse(req.query);
    const key = parsed.success ? parsed.data.key : undefined;
    if (!serverKey || key !== serverKey) {
      req.log.warn('Health check rejected: bad key');
      return { status: 'key_error' };
    }
    return { status: 'success', connections: broker.stats.snapshot() };
  });
}
