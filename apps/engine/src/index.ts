import "dotenv/config";
import path from "path";
import { TaskRegistry, isTaskModule } from "@batchline/sdk";
import { EngineConfig, loadConfig } from "./config";
import { createPool } from "./db";
import { createGrpcServer, startGrpcServer, stopGrpcServer } from "./grpc/server";
import { FileJobStore } from "./repositories/file-job-store";
import { JobStore } from "./repositories/job-store";
import { MemoryJobStore } from "./repositories/memory-job-store";
import { PgJobStore } from "./repositories/pg-job-store";
import { JobEngine } from "./services/job-engine";
import { registerBuiltinTasks } from "./tasks";

const TAG = "[batchline]";

async function createStore(config: EngineConfig): Promise<JobStore> {
  switch (config.store) {
    case "postgres": {
      const store = new PgJobStore(createPool(config.databaseUrl ?? undefined));
      await store.ping();
      await store.ensureSchema();
      console.log(`${TAG} postgres connected`);
      return store;
    }
    case "memory":
      console.warn(`${TAG} using the in-memory store, jobs will not survive a restart`);
      return new MemoryJobStore();
    case "file": {
      const store = new FileJobStore(config.dataDir);
      await store.init();
      return store;
    }
  }
}

function loadTaskModules(registry: TaskRegistry, modules: string[]): void {
  for (const entry of modules) {
    const resolved = entry.startsWith(".") ? path.resolve(process.cwd(), entry) : entry;
    const loaded: unknown = require(resolved);
    if (!isTaskModule(loaded)) {
      throw new Error(`${entry} does not export registerTasks(registry)`);
    }
    loaded.registerTasks(registry);
    console.log(`${TAG} loaded tasks from ${entry}`);
  }
}

async function main() {
  const config = loadConfig();
  console.log(`${TAG} starting engine... (store: ${config.store}, workers: ${config.maxWorkers})`);

  const registry = new TaskRegistry();
  registerBuiltinTasks(registry);
  if (config.taskModules.length === 0) {
    console.warn(`${TAG} WARNING: BATCHLINE_TASKS is not set. Only built-in tasks are available.`);
  }
  loadTaskModules(registry, config.taskModules);
  console.log(`${TAG} registered tasks: ${registry.list().join(", ")}`);

  const store = await createStore(config);
  const engine = new JobEngine({
    store,
    registry,
    maxWorkers: config.maxWorkers,
    maxQueueSize: config.maxQueueSize,
    pollIntervalMs: config.pollIntervalMs,
    defaultTimeoutMs: config.defaultTimeoutMs,
    retryPolicy: config.retryPolicy,
  });

  await engine.start();

  const grpcServer = createGrpcServer(engine, store);
  await startGrpcServer(grpcServer, config.port);

  let shuttingDown = false;
  async function shutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`${TAG} ${signal} received, shutting down...`);

    try {
      await stopGrpcServer(grpcServer);
      await engine.stop();
      await store.close();
      console.log(`${TAG} shutdown complete`);
      process.exit(0);
    } catch (err) {
      console.error(`${TAG} shutdown failed:`, err);
      process.exit(1);
    }
  }

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  console.log(`${TAG} engine ready`);
}

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
