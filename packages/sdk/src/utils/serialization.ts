import superjson from 'superjson';
import { PhotoTask, isTaskStatus } from '../types';

const MAX_PAYLOAD_SIZE = 4 * 1024 * 1024; // gRPC default message limit

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

export function serialize(value: unknown): string {
    if (value === undefined) return '';

    try {
        const stringified = superjson.stringify(value);

        if (Buffer.byteLength(stringified) > MAX_PAYLOAD_SIZE) {
            throw new SerializationError(
                `Payload size exceeds maximum limit of 4MB. Current size: ${(Buffer.byteLength(stringified) / 1024 / 1024).toFixed(2)}MB`
            );
        }

        return stringified;
    } catch (err) {
        if (err instanceof SerializationError) throw err;
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

export function deserialize(value: string | null | undefined): unknown {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

function isPhotoTask(value: unknown): value is PhotoTask {
    if (typeof value !== 'object' || value === null) return false;
    return 'id' in value && typeof value.id === 'string'
        && 'sku_code' in value && typeof value.sku_code === 'string'
        && 'status' in value && isTaskStatus(value.status)
        && 'agent_log' in value && Array.isArray(value.agent_log)
        && 'created_at' in value && value.created_at instanceof Date;
}

export function encodeTask(task: PhotoTask): Buffer {
    return Buffer.from(serialize(task), 'utf-8');
}

/** Inverse of encodeTask; dates survive the round trip. */
export function decodeTask(bytes: Buffer | Uint8Array): PhotoTask {
    const value = deserialize(Buffer.from(bytes).toString('utf-8'));
    if (!isPhotoTask(value)) {
        throw new SerializationError('Payload is not a photo task document');
    }
    return value;
}
