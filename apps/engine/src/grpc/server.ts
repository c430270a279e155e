import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import path from "path";
import { ControlPool, ControlScheduler, ControlServiceImpl } from "./control.service";

export const CONTROL_PROTO_PATH = path.join(
  __dirname,
  "../../../..",
  "packages/proto/control.proto",
);

const protoOptions: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

const SERVICE_NAME = "swarmline.ControlService";

function loadControlService(): protoLoader.ServiceDefinition {
  const packageDef = protoLoader.loadSync(CONTROL_PROTO_PATH, protoOptions);
  const definition = packageDef[SERVICE_NAME];
  // message and enum definitions carry a `format`; services do not
  if (!definition || "format" in definition) {
    throw new Error(`${SERVICE_NAME} not found in ${CONTROL_PROTO_PATH}`);
  }
  return definition;
}

export function createGrpcServer(scheduler: ControlScheduler, pool: ControlPool): grpc.Server {
  const server = new grpc.Server({
    "grpc.max_receive_message_length": 4 * 1024 * 1024,
    "grpc.max_send_message_length": 4 * 1024 * 1024,
    "grpc.keepalive_time_ms": 30000,
    "grpc.keepalive_timeout_ms": 10000,
    "grpc.keepalive_permit_without_calls": 1,
  });

  const control = new ControlServiceImpl(scheduler, pool);
  server.addService(loadControlService(), {
    submitGoal: control.submitGoal.bind(control),
    submitTasks: control.submitTasks.bind(control),
    spawnWorker: control.spawnWorker.bind(control),
    stopWorker: control.stopWorker.bind(control),
    getStatus: control.getStatus.bind(control),
    check: control.check.bind(control),
  });

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
          console.log(`[swarmline] grpc server listening on port ${boundPort}`);
          resolve(boundPort);
        }
      },
    );
  });
}
