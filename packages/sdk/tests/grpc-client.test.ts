import * as grpc from '@grpc/grpc-js';
import {
    createTaskClient,
    loadService,
    TaskServiceStub,
    SubmitTaskRequest,
    GetTaskRequest,
} from '../src/grpc-client';
import { encodeTask } from '../src/utils/serialization';
import { PhotoTask, TaskStatus } from '../src/types';

type Reply = { err: grpc.ServiceError | null; res?: unknown };

function fakeStub(replies: { submit?: Reply; get?: Reply }) {
    const submitted: SubmitTaskRequest[] = [];
    const queried: GetTaskRequest[] = [];
    const stub: TaskServiceStub = {
        submitTask(request, callback) {
            submitted.push(request);
            const reply = replies.submit ?? { err: null, res: {} };
            callback(reply.err, reply.res);
        },
        getTask(request, callback) {
            queried.push(request);
            const reply = replies.get ?? { err: null, res: {} };
            callback(reply.err, reply.res);
        },
    };
    return { stub, submitted, queried };
}

const task: PhotoTask = {
    id: 'task-1',
    sku_code: 'SKU-1',
    status: TaskStatus.UPLOADED,
    workflow_step: 1,
    metadata: { product_name: 'Mug', title: 'Blue Mug', locale: 'en-GB', photo_urls: ['/p/1.jpg'] },
    color_analysis: [],
    publish_results: [],
    agent_log: [],
    retry_metadata: { count: 0, last_error: null, last_error_kind: null },
    next_attempt_at: null,
    version: 0,
    created_at: new Date('2026-03-01T10:00:00.000Z'),
    updated_at: new Date('2026-03-01T10:00:00.000Z'),
};

describe('createTaskClient', () => {
    it('flattens metadata into the SubmitTask request', async () => {
        const { stub, submitted } = fakeStub({ submit: { err: null, res: { task_id: 'task-1' } } });
        const client = createTaskClient(stub);

        const id = await client.submitTask({ sku_code: 'SKU-1', metadata: task.metadata });

        expect(id).toBe('task-1');
        expect(submitted).toEqual([{
            sku_code: 'SKU-1',
            product_name: 'Mug',
            title: 'Blue Mug',
            locale: 'en-GB',
            photo_urls: ['/p/1.jpg'],
        }]);
    });

    it('rejects with the gRPC error', async () => {
        const err = Object.assign(new Error('sku exists'), {
            code: grpc.status.ALREADY_EXISTS,
            details: 'sku exists',
            metadata: new grpc.Metadata(),
        });
        const { stub } = fakeStub({ submit: { err } });

        await expect(createTaskClient(stub).submitTask({ sku_code: 'SKU-1', metadata: task.metadata }))
            .rejects.toThrow('sku exists');
    });

    it('decodes a found task', async () => {
        const { stub, queried } = fakeStub({ get: { err: null, res: { found: true, task: encodeTask(task) } } });

        const found = await createTaskClient(stub).getTask({ sku_code: 'SKU-1' });

        expect(queried).toEqual([{ task_id: '', sku_code: 'SKU-1' }]);
        expect(found).toEqual(task);
    });

    it('returns null when the task is not found', async () => {
        const { stub } = fakeStub({ get: { err: null, res: { found: false, task: Buffer.alloc(0) } } });

        await expect(createTaskClient(stub).getTask({ task_id: 'missing' })).resolves.toBeNull();
    });
});

describe('loadService', () => {
    it('resolves the task service definition', () => {
        const { client } = loadService('task.service.proto', 'photoflow.TaskService');
        expect(Object.keys(client.service)).toEqual(['SubmitTask', 'GetTask']);
    });

    it('throws for an unknown service', () => {
        expect(() => loadService('task.service.proto', 'photoflow.Nope')).toThrow('service "photoflow.Nope" not found');
    });
});
