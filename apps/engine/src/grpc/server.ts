import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import { ReflectionService } from "@grpc/reflection";
import path from "path";
import { JobStore } from "../repositories/job-store";
import { JobEngine } from "../services/job-engine";
import { HealthService } from "./health.service";
import { JobServiceImpl } from "./jobs.service";

const TAG = "[grpc]";

const HEALTH_PROTO_PATH = path.join(
  __dirname,
  "../../../..",
  "packages/proto/health.service.proto",
);
const JOBS_PROTO_PATH = path.join(
  __dirname,
  "../../../..",
  "packages/proto/jobs.service.proto",
);

const protoOptions = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

type GrpcNode =
  | grpc.GrpcObject
  | grpc.ServiceClientConstructor
  | grpc.ProtobufTypeDefinition;

function isTypeDefinition(
  node: grpc.GrpcObject | grpc.ProtobufTypeDefinition,
): node is grpc.ProtobufTypeDefinition {
  return "fileDescriptorProtos" in node && Array.isArray(node.fileDescriptorProtos);
}

// Walks a loaded package by its dotted name, e.g. "grpc.health.v1.Health".
export function lookupService(
  root: grpc.GrpcObject,
  qualifiedName: string,
): grpc.ServiceDefinition {
  let node: GrpcNode | undefined = root;
  for (const segment of qualifiedName.split(".")) {
    if (node === undefined || typeof node === "function" || isTypeDefinition(node)) {
      node = undefined;
      break;
    }
    node = node[segment];
  }
  if (typeof node === "function") return node.service;
  throw new Error(`service ${qualifiedName} not found in loaded protos`);
}

export function createGrpcServer(engine: JobEngine, store: JobStore): grpc.Server {
  const healthPackageDef = protoLoader.loadSync(HEALTH_PROTO_PATH, protoOptions);
  const jobsPackageDef = protoLoader.loadSync(JOBS_PROTO_PATH, protoOptions);

  const server = new grpc.Server({
    "grpc.max_receive_message_length": 4 * 1024 * 1024,
    "grpc.max_send_message_length": 4 * 1024 * 1024,
    "grpc.keepalive_time_ms": 30000,
    "grpc.keepalive_timeout_ms": 10000,
    "grpc.keepalive_permit_without_calls": 1,
  });

  const healthService = new HealthService(store, () => engine.isRunning());
  server.addService(
    lookupService(grpc.loadPackageDefinition(healthPackageDef), "grpc.health.v1.Health"),
    {
      check: healthService.check.bind(healthService),
      watch: healthService.watch.bind(healthService),
    },
  );

  const jobService = new JobServiceImpl(engine);
  server.addService(
    lookupService(grpc.loadPackageDefinition(jobsPackageDef), "batchline.v1.JobService"),
    {
      createJob: jobService.createJob.bind(jobService),
      submitJob: jobService.submitJob.bind(jobService),
      getJobStatus: jobService.getJobStatus.bind(jobService),
      getJobResult: jobService.getJobResult.bind(jobService),
      pauseJob: jobService.pauseJob.bind(jobService),
      resumeJob: jobService.resumeJob.bind(jobService),
      cancelJob: jobService.cancelJob.bind(jobService),
      createGroup: jobService.createGroup.bind(jobService),
      addJobToGroup: jobService.addJobToGroup.bind(jobService),
      cancelGroup: jobService.cancelGroup.bind(jobService),
      getGroupStatus: jobService.getGroupStatus.bind(jobService),
      waitForJob: jobService.waitForJob.bind(jobService),
      getStats: jobService.getStats.bind(jobService),
      clearJobs: jobService.clearJobs.bind(jobService),
    },
  );

  // reflection for grpcurl debugging
  const reflectionService = new ReflectionService({
    ...healthPackageDef,
    ...jobsPackageDef,
  });
  reflectionService.addToServer(server);

  return server;
}

export function startGrpcServer(
  server: grpc.Server,
  port: number = 50051,
): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(
      `0.0.0.0:${port}`,
      grpc.ServerCredentials.createInsecure(),
      (err, boundPort) => {
        if (err) {
          reject(err);
        } else {
          console.log(`${TAG} server listening on port ${boundPort}`);
          resolve(boundPort);
        }
      },
    );
  });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.tryShutdown((err) => (err ? reject(err) : resolve()));
  });
}
