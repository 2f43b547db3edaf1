import path from 'path';
import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { PhotoTask, SubmitTaskInput } from './types';
import { decodeTask } from './utils/serialization';

export const PROTO_DIR = path.resolve(__dirname, '../../proto');

export const PROTO_OPTIONS: protoLoader.Options = {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
};

type GrpcCallback = (err: grpc.ServiceError | null, res?: unknown) => void;

export interface SubmitTaskRequest {
    sku_code: string;
    product_name: string;
    title: string;
    locale: string;
    photo_urls: string[];
}

export interface GetTaskRequest {
    task_id: string;
    sku_code: string;
}

/** Callback-style surface of the generated TaskService client. */
export interface TaskServiceStub {
    submitTask(request: SubmitTaskRequest, callback: GrpcCallback): unknown;
    getTask(request: GetTaskRequest, callback: GrpcCallback): unknown;
}

export type TaskQuery = { task_id: string } | { sku_code: string };

export interface TaskClient {
    submitTask(input: SubmitTaskInput): Promise<string>;
    getTask(query: TaskQuery): Promise<PhotoTask | null>;
}

function rpc(fn: (cb: GrpcCallback) => void): Promise<unknown> {
    return new Promise((resolve, reject) => {
        fn((err, res) => err ? reject(err) : resolve(res));
    });
}

function field(res: unknown, key: string): unknown {
    if (typeof res !== 'object' || res === null || !(key in res)) return undefined;
    return Reflect.get(res, key);
}

export function createTaskClient(stub: TaskServiceStub): TaskClient {
    return {
        async submitTask(input) {
            const res = await rpc(cb => stub.submitTask({ sku_code: input.sku_code, ...input.metadata }, cb));
            const taskId = field(res, 'task_id');
            if (typeof taskId !== 'string' || taskId === '') {
                throw new Error('SubmitTask returned no task id');
            }
            return taskId;
        },

        async getTask(query) {
            const request: GetTaskRequest = 'task_id' in query
                ? { task_id: query.task_id, sku_code: '' }
                : { task_id: '', sku_code: query.sku_code };
            const res = await rpc(cb => stub.getTask(request, cb));
            const bytes = field(res, 'task');
            if (field(res, 'found') !== true || !(bytes instanceof Uint8Array)) return null;
            return decodeTask(bytes);
        },
    };
}

function isServiceClient(node: unknown): node is grpc.ServiceClientConstructor {
    return typeof node === 'function' && 'service' in node;
}

/**
 * Loads a .proto file from PROTO_DIR and resolves a service by its dotted name,
 * e.g. loadService('task.service.proto', 'photoflow.TaskService').
 */
export function loadService(protoFile: string, serviceName: string): {
    client: grpc.ServiceClientConstructor;
    packageDefinition: protoLoader.PackageDefinition;
} {
    const packageDefinition = protoLoader.loadSync(path.join(PROTO_DIR, protoFile), PROTO_OPTIONS);
    let node: unknown = grpc.loadPackageDefinition(packageDefinition);

    for (const segment of serviceName.split('.')) {
        node = field(node, segment);
    }

    if (!isServiceClient(node)) {
        throw new Error(`service "${serviceName}" not found in ${protoFile}`);
    }
    return { client: node, packageDefinition };
}

function isTaskServiceStub(client: grpc.Client): client is grpc.Client & TaskServiceStub {
    return typeof field(client, 'submitTask') === 'function' && typeof field(client, 'getTask') === 'function';
}

export function connectTaskClient(
    address: string,
    credentials: grpc.ChannelCredentials = grpc.credentials.createInsecure(),
): TaskClient & { close(): void } {
    const { client: TaskServiceClient } = loadService('task.service.proto', 'photoflow.TaskService');
    const client = new TaskServiceClient(address, credentials);

    if (!isTaskServiceStub(client)) {
        client.close();
        throw new Error('TaskService client is missing its methods');
    }

    return { ...createTaskClient(client), close: () => client.close() };
}
