// The task is missing input its next step needs; retrying cannot fix it.
export class DataIntegrityError extends Error {
    constructor(
        public readonly taskId: string,
        message: string,
    ) {
        super(message);
        this.name = 'DataIntegrityError';
    }
}
