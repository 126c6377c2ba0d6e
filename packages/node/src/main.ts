/**
 * @pft-node/node — Entry point.
 *
 * Loads `.env` and config, wires the pipeline, starts the status server
 * and the monitor loop, and handles graceful shutdown. Exits 1 when
 * ledger connectivity is exhausted.
 *
 * Started with `npm start`, which runs this file through the tsx loader
 * so the workspace packages resolve to their TypeScript sources.
 */

import dotenv from "dotenv";
import { serve } from "@hono/node-server";
import pino from "pino";
import { ConnectionManager, buildEndpoints } from "@pft-node/chain-observer";
import { XrplResponder } from "@pft-node/responder";
import { loadConfig, toRuntimeOptions } from "./config.js";
import { createApp } from "./app.js";
import { MetricsCollector } from "./middleware/metrics.js";
import { AnalysisClient } from "./services/analysis-client.js";
import {
  DedupLedger,
  InMemoryDedupPersistence,
  JsonlDedupPersistence,
} from "./services/dedup-ledger.js";
import {
  INTERRUPTIONS_METRIC,
  MonitorLoop,
  TRANSACTIONS_METRIC,
} from "./services/monitor-loop.js";
import { TransactionFilter } from "./services/transaction-filter.js";

async function main(): Promise<void> {
  dotenv.config();

  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
  const options = toRuntimeOptions(config);

  const metrics = new MetricsCollector();
  metrics.describeCounter(TRANSACTIONS_METRIC, "Transactions seen, by pipeline outcome");
  metrics.describeCounter(INTERRUPTIONS_METRIC, "Ledger feed interruptions");

  const responder = new XrplResponder({
    ...options.responder,
    logger: logger.child({ component: "responder" }),
  });

  const endpoints = buildEndpoints(options.endpoints);
  const connection = new ConnectionManager({
    endpoints,
    ...options.connection,
    logger: logger.child({ component: "connection" }),
  });

  const dedup = new DedupLedger(
    options.dedup.file !== undefined
      ? new JsonlDedupPersistence(options.dedup.file)
      : new InMemoryDedupPersistence(),
  );

  const monitor = new MonitorLoop({
    supervisor: connection,
    filter: new TransactionFilter({ nodeAddress: responder.address, token: options.token }),
    dedup,
    analyzer: new AnalysisClient(options.analysis),
    responder,
    analysisRetry: options.analysisRetry,
    rebuildFromHistory: options.dedup.rebuild,
    ensureTrustLine: options.ensureTrustLine,
    logger: logger.child({ component: "monitor" }),
    metrics,
  });

  const { app } = createApp({
    monitor,
    metricsCollector: metrics,
    logger: logger.child({ component: "http" }),
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      nodeAddress: responder.address,
      endpoints: endpoints.map((e) => e.url),
      answered: dedup.size,
      port: config.PORT,
    },
    "PFT memo node started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    await monitor.stop();
    server.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));

  try {
    await monitor.run();
  } catch {
    // Logged at fatal by the monitor
    server.close();
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
