import { status } from '@grpc/grpc-js';

/** An error the gRPC layer reports with its own status code instead of INTERNAL. */
export class RpcError extends Error {
    constructor(
        public readonly code: status,
        message: string,
    ) {
        super(message);
        this.name = 'RpcError';
    }
}
