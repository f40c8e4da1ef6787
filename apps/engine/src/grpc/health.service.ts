import { ServerUnaryCall, sendUnaryData, ServerWritableStream } from '@grpc/grpc-js';
import { JobStore } from '../repositories/job-store';

type ServingStatus = 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';

export interface HealthCheckRequest {
    service: string;
}

export interface HealthCheckResponse {
    status: ServingStatus;
}

/**
 * Standard gRPC health check service implementation.
 * Serving while the engine runs and its store answers.
 */
export class HealthService {
    constructor(
        private readonly store: JobStore,
        private readonly isRunning: () => boolean,
    ) { }

    async check(
        _call: ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>,
        callback: sendUnaryData<HealthCheckResponse>,
    ): Promise<void> {
        callback(null, { status: await this.currentStatus() });
    }

    async watch(call: ServerWritableStream<HealthCheckRequest, HealthCheckResponse>): Promise<void> {
        call.write({ status: await this.currentStatus() });
        call.end();
    }

    async currentStatus(): Promise<ServingStatus> {
        if (!this.isRunning()) return 'NOT_SERVING';
        try {
            await this.store.ping();
            return 'SERVING';
        } catch (error) {
            console.error('[grpc] health check failed:', error);
            return 'NOT_SERVING';
        }
    }
}
