import { config } from './config';
import { buildApp } from './server';

/**
 * Main entrypoint for the MCP endpoint broker.
 * Builds the Fastify app (health + provider/client sockets) and listens on configured host/port.
 */
async function main() {
  const app = await buildApp({ config });

  // --- Graceful shutdown ---
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`MCP endpoint listening on ws://${config.host}:${config.port}${config.basePath}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting MCP endpoint:', err);
  process.exit(1);
});
