import * as grpc from "@grpc/grpc-js";
import { ReflectionService } from "@grpc/reflection";
import { loadService } from "@photoflow/sdk";
import { HealthService } from "./health.service";
import { TaskServiceImpl } from "./task.service";
import { RpcError } from "./rpc-error";

const TAG = "[photoflow]";

type UnaryHandler = (request: unknown) => Promise<object>;

/** Adapts a promise-returning handler to grpc-js's callback style. */
export function unary(handler: UnaryHandler, name: string): grpc.handleUnaryCall<unknown, object> {
  return (call, callback) => {
    handler(call.request).then(
      (response) => callback(null, response),
      (error: unknown) => {
        if (error instanceof RpcError) {
          callback({ code: error.code, details: error.message });
          return;
        }
        console.error(`${TAG} ${name} error:`, error);
        callback({
          code: grpc.status.INTERNAL,
          details: error instanceof Error ? error.message : "Unknown error",
        });
      },
    );
  };
}

export function createGrpcServer(tasks: TaskServiceImpl, health: HealthService): grpc.Server {
  const server = new grpc.Server({
    "grpc.max_receive_message_length": 4 * 1024 * 1024,
    "grpc.max_send_message_length": 4 * 1024 * 1024,
    "grpc.keepalive_time_ms": 30000,
    "grpc.keepalive_timeout_ms": 10000,
    "grpc.keepalive_permit_without_calls": 1,
  });

  const healthService = loadService("health.service.proto", "grpc.health.v1.Health");
  server.addService(healthService.client.service, {
    check: health.check.bind(health),
    watch: health.watch.bind(health),
  });

  const taskService = loadService("task.service.proto", "photoflow.TaskService");
  server.addService(taskService.client.service, {
    submitTask: unary((request) => tasks.submitTask(request), "SubmitTask"),
    getTask: unary((request) => tasks.getTask(request), "GetTask"),
  });

  // reflection for grpcurl debugging
  const reflectionService = new ReflectionService({
    ...healthService.packageDefinition,
    ...taskService.packageDefinition,
  });
  reflectionService.addToServer(server);

  return server;
}

export function startGrpcServer(server: grpc.Server, port: number = 50051): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(
      `0.0.0.0:${port}`,
      grpc.ServerCredentials.createInsecure(),
      (err, boundPort) => {
        if (err) {
          reject(err);
        } else {
          console.log(`${TAG} grpc server listening on port ${boundPort}`);
          resolve(boundPort);
        }
      },
    );
  });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
  return new Promise((resolve) => server.tryShutdown(() => resolve()));
}
