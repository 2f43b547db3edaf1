import { status } from '@grpc/grpc-js';
import { z } from 'zod';
import { encodeTask } from '@photoflow/sdk';
import { TaskStore } from '../repositories/task.store';
import { AGENTS, AuditLogger } from '../audit/audit-logger';
import { DuplicateSkuError } from '../errors';
import { RpcError } from './rpc-error';

const TAG = '[TaskService]';

const SubmitTaskSchema = z.object({
    sku_code: z.string().trim().min(1, 'sku_code is required'),
    product_name: z.string().trim().min(1, 'product_name is required'),
    title: z.string().trim(),
    locale: z.string().trim().min(1, 'locale is required'),
    photo_urls: z.array(z.string().trim().min(1, 'photo_urls must not contain empty entries'))
        .min(1, 'at least one photo is required'),
});

// Proto3 has no optional scalars; the unused lookup field arrives as ''
const GetTaskSchema = z.object({
    task_id: z.string().trim()
        .refine(id => id === '' || z.string().uuid().safeParse(id).success, 'task_id must be a UUID'),
    sku_code: z.string().trim(),
}).refine(q => (q.task_id === '') !== (q.sku_code === ''), 'exactly one of task_id or sku_code is required');

export interface SubmitTaskResponse {
    task_id: string;
}

export interface GetTaskResponse {
    found: boolean;
    task: Buffer;
}

function invalidArgument(error: z.ZodError): RpcError {
    const detail = error.issues.map(i => i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message).join('; ');
    return new RpcError(status.INVALID_ARGUMENT, detail);
}

/**
 * The creation boundary. SubmitTask plays the upload collaborator: it inserts the task
 * in UPLOADED with its metadata and first audit entry, which puts it on the change feed.
 */
export class TaskServiceImpl {
    constructor(
        private readonly store: Pick<TaskStore, 'insert' | 'findById' | 'findBySku'>,
        private readonly audit: AuditLogger,
    ) { }

    async submitTask(request: unknown): Promise<SubmitTaskResponse> {
        const parsed = SubmitTaskSchema.safeParse(request);
        if (!parsed.success) throw invalidArgument(parsed.error);
        const { sku_code, ...metadata } = parsed.data;

        try {
            const task = await this.store.insert({
                sku_code,
                metadata,
                agent_log: [
                    this.audit.entry(AGENTS.upload, 'task_created', `Received ${metadata.photo_urls.length} photo(s) for ${sku_code}`),
                ],
            });
            console.log(`${TAG} created task ${task.id} for ${sku_code}`);
            return { task_id: task.id };
        } catch (err) {
            if (err instanceof DuplicateSkuError) throw new RpcError(status.ALREADY_EXISTS, err.message);
            throw err;
        }
    }

    async getTask(request: unknown): Promise<GetTaskResponse> {
        const parsed = GetTaskSchema.safeParse(request);
        if (!parsed.success) throw invalidArgument(parsed.error);
        const { task_id, sku_code } = parsed.data;

        const task = task_id !== ''
            ? await this.store.findById(task_id)
            : await this.store.findBySku(sku_code);

        if (!task) return { found: false, task: Buffer.alloc(0) };
        return { found: true, task: encodeTask(task) };
    }
}
