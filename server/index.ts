// Load environment variables from .env file FIRST before any other imports
import { config } from 'dotenv';
config();

import express from 'express';
import type { Server } from 'http';
import { loadConfig } from './config';
import { PostgresCustomerReadSource } from './customers/postgres-customer-reader';
import { createGraphDriver, Neo4jGraphWriter } from './graph/neo4j-graph-writer';
import { createHealthRouter } from './health-routes';
import { createLogger, errorMessage } from './logger';
import { PostgresOutboxStore } from './outbox/postgres-outbox-store';
import { createCustomerPipeline } from './pipeline';
import { createSourceDatabase } from './storage';

const log = createLogger('Worker');

(async () => {
  const workerConfig = loadConfig();
  log.info(`Starting ${workerConfig.pipelineName}`, { nodeEnv: workerConfig.nodeEnv });

  const source = createSourceDatabase(workerConfig.databaseUrl);
  const graph = new Neo4jGraphWriter(createGraphDriver(workerConfig.neo4j), {
    database: workerConfig.neo4j.database,
  });

  try {
    await graph.verifyConnectivity();
    await graph.ensureConstraints();
  } catch (err) {
    await Promise.allSettled([graph.close(), source.close()]);
    throw err;
  }

  const { consumer } = createCustomerPipeline({
    store: new PostgresOutboxStore(source.db),
    readSource: new PostgresCustomerReadSource(source.db),
    graph,
    options: workerConfig.outbox,
    pipelineName: workerConfig.pipelineName,
  });
  consumer.start();

  let server: Server | null = null;
  if (workerConfig.healthPort !== undefined) {
    const app = express();
    app.use(
      createHealthRouter({
        db: source.db,
        graph,
        consumer,
        pipelineName: workerConfig.pipelineName,
      })
    );
    const port = workerConfig.healthPort;
    server = app.listen(port, '0.0.0.0', () => {
      log.info(`Health routes serving on port ${port}`);
    });
  }

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down gracefully`);

    await consumer.stop();
    await new Promise<void>((resolve) => (server ? server.close(() => resolve()) : resolve()));
    const closed = await Promise.allSettled([graph.close(), source.close()]);
    for (const result of closed) {
      if (result.status === 'rejected') {
        log.error('Error during shutdown', { error: errorMessage(result.reason) });
      }
    }
    log.info('Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
})().catch((err: unknown) => {
  log.error('Startup failed', { error: errorMessage(err) });
  process.exit(1);
});
