import { DownstreamError } from './downstream.error';

export class StepTimeoutError extends DownstreamError {
    constructor(
        public readonly label: string,
        public readonly timeoutMs: number,
    ) {
        super(`${label} timed out after ${timeoutMs}ms`, 'timeout');
        this.name = 'StepTimeoutError';
    }
}
