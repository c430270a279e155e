import "dotenv/config";
import { loadConfig } from "./config";
import { createPool, createRedis } from "./db";
import { Engine } from "./engine";
import { createGrpcServer, startGrpcServer } from "./grpc/server";
import { ConfigError } from "./errors";
import { loadPriceTable } from "./services/price-table";

const TAG = "[swarmline]";

async function main() {
  const config = loadConfig();
  const prices = await loadPriceTable(config.modelPricesFile);
  console.log(`${TAG} starting engine (workers: ${config.minWorkers}-${config.maxWorkers}, models: ${config.workerModels.join(", ")})`);

  const pgPool = config.databaseUrl ? createPool(config.databaseUrl) : null;
  const redis = config.redisUrl ? createRedis(config.redisUrl) : null;

  // Health checks
  if (pgPool) {
    await pgPool.query("SELECT 1");
    console.log(`${TAG} postgres connected`);
  } else {
    console.warn(`${TAG} DATABASE_URL is not set, tasks are kept in memory only`);
  }
  if (redis) {
    await redis.ping();
    console.log(`${TAG} redis connected`);
  }

  const engine = new Engine(config, { pgPool, redis, prices });
  await engine.start();

  const grpcServer = createGrpcServer(engine.scheduler, engine.pool);
  await startGrpcServer(grpcServer, config.port);

  let shuttingDown = false;
  async function shutdown(signal: string, exitCode = 0) {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`${TAG} ${signal} received, shutting down...`);

    grpcServer.forceShutdown();
    await engine.shutdown();
    if (pgPool) await pgPool.end();
    if (redis) await redis.quit();
    console.log(`${TAG} shutdown complete`);
    process.exit(exitCode);
  }

  engine
    .stopped()
    .then(() => (engine.lease?.wasLost ? shutdown("scheduler lease loss", 1) : undefined))
    .catch((err) => {
      console.error(`${TAG} shutdown failed:`, err);
      process.exit(1);
    });

  for (const signal of ["SIGTERM", "SIGINT", "SIGUSR2"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        console.error(`${TAG} shutdown failed:`, err);
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  console.error(`${TAG} fatal:`, err instanceof ConfigError ? err.message : err);
  process.exit(1);
});
