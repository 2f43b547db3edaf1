export class AuditWriteError extends Error {
    constructor(
        public readonly taskId: string,
        public readonly action: string,
        public readonly cause?: unknown,
    ) {
        super(`failed to append "${action}" to agent log of task ${taskId}`);
        this.name = 'AuditWriteError';
    }
}
