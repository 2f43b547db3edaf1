import { ServerUnaryCall, ServerWritableStream, sendUnaryData, status as grpcStatus } from '@grpc/grpc-js';

export type ServingStatus = 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';

export interface HealthCheckRequest {
    service: string;
}

export interface HealthCheckResponse {
    status: ServingStatus;
}

/** A dependency the engine cannot serve without, e.g. `() => pool.query('SELECT 1')`. */
export type HealthProbe = () => Promise<unknown>;

/**
 * Standard gRPC health check service.
 * Reports SERVING only while every probe (Postgres, Redis) succeeds.
 */
export class HealthService {
    constructor(private readonly probes: HealthProbe[]) { }

    async status(): Promise<ServingStatus> {
        try {
            await Promise.all(this.probes.map(probe => probe()));
            return 'SERVING';
        } catch (error) {
            console.error('[health] check failed:', error);
            return 'NOT_SERVING';
        }
    }

    check(
        _call: ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>,
        callback: sendUnaryData<HealthCheckResponse>,
    ): void {
        this.status().then(
            status => callback(null, { status }),
            (err: Error) => callback({ code: grpcStatus.INTERNAL, details: err.message }),
        );
    }

    watch(call: ServerWritableStream<HealthCheckRequest, HealthCheckResponse>): void {
        this.status().then(
            status => {
                call.write({ status });
                call.end();
            },
            (err: Error) => call.destroy(err),
        );
    }
}
