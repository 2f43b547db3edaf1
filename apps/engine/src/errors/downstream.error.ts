import { ErrorKind } from '@photoflow/sdk';

export type DownstreamErrorKind = Exclude<ErrorKind, 'data_integrity'>;

/**
 * A failed call to an external collaborator (vision service, publishing API).
 * `kind` decides how the failure is reported; every kind still counts against
 * the task's retry budget.
 */
export class DownstreamError extends Error {
    constructor(
        message: string,
        public readonly kind: DownstreamErrorKind,
        public readonly status: number | null = null,
        public readonly cause?: unknown,
    ) {
        super(message);
        this.name = 'DownstreamError';
    }
}

export function isDownstreamError(err: unknown): err is DownstreamError {
    return err instanceof DownstreamError;
}

/** Wraps anything thrown by a collaborator call; unknown failures count as transient. */
export function asDownstreamError(err: unknown): DownstreamError {
    if (err instanceof DownstreamError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new DownstreamError(message, 'transient', null, err);
}
