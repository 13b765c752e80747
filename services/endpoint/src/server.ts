import Fastify, { type FastifyBaseLogger } from 'fastify';
import websocket from '@fastify/websocket';
import { JsonTokenResolver } from './auth/jsonToken';
import { config as defaultConfig, type EndpointConfig } from './config';
import type { TokenResolver } from './contracts/auth';
import { Broker, DEFAULT_BROKER_INFO } from './core/broker';
import { registerEndpointRoutes } from './routes/endpoints';
import { registerHealthRoutes } from './routes/health';

declare module 'fastify' {
  interface FastifyInstance {
    broker: Broker;
  }
}

export interface BuildAppOptions {
  config?: EndpointConfig;
  // false silences Fastify; otherwise a pino logger instance to reuse
  logger?: FastifyBaseLogger | false;
  tokens?: TokenResolver;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const config = options.config ?? defaultConfig;
  const app = Fastify({
    logger: options.logger === false ? false : options.logger ?? { level: config.logLevel },
    ignoreTrailingSlash: true,
  });

  const broker = new Broker({
    logger: app.log,
    callTimeoutMs: config.callTimeoutMs,
    broadcastTimeoutMs: config.broadcastTimeoutMs,
    fanOutMethods: config.fanOutMethods,
    duplicatePolicy: config.duplicateServerPolicy,
    brokerInfo: DEFAULT_BROKER_INFO,
  });
  app.decorate('broker', broker);

  await app.register(websocket, { options: { maxPayload: config.maxPayloadBytes } });

  const prefix = config.basePath === '/' ? '' : config.basePath;
  await registerHealthRoutes(app, {
    broker,
    prefix,
    serverKey: config.serverKey,
    version: DEFAULT_BROKER_INFO.version,
  });
  await registerEndpointRoutes(app, {
    broker,
    tokens: options.tokens ?? new JsonTokenResolver(),
    prefix,
  });

  // --- Idle sweep ---
  let sweep: ReturnType<typeof setInterval> | undefined;
  if (config.idleTimeoutMs > 0) {
    sweep = setInterval(() => {
      const closed = broker.sweepIdle(config.idleTimeoutMs);
      if (closed > 0) app.log.info({ closed }, 'Idle sweep closed connections');
    }, config.sweepIntervalMs);
    sweep.unref();
  }

  // --- Keepalive ---
  let keepalive: ReturnType<typeof setInterval> | undefined;
  if (config.pingIntervalMs > 0) {
    keepalive = setInterval(() => {
      for (const socket of app.websocketServer.clients) {
        if (socket.readyState === socket.OPEN) socket.ping();
      }
    }, config.pingIntervalMs);
    keepalive.unref();
  }

  app.addHook('onClose', async () => {
    if (sweep) clearInterval(sweep);
    if (keepalive) clearInterval(keepalive);
    await broker.shutdown();
  });

  return app;
}
