export class ResumeTokenInvalidError extends Error {
    constructor(
        public readonly token: number,
        public readonly oldest: number | null,
        public readonly newest: number | null,
    ) {
        super(`resume token ${token} is outside retained history (oldest: ${oldest ?? 'none'}, newest: ${newest ?? 'none'})`);
        this.name = 'ResumeTokenInvalidError';
    }
}
