import { HealthService } from '../../src/grpc/health.service';
import { MemoryJobStore } from '../../src/repositories/memory-job-store';

describe('HealthService', () => {
    let store: MemoryJobStore;

    beforeEach(() => {
        store = new MemoryJobStore();
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('is serving while the engine runs and the store answers', async () => {
        const health = new HealthService(store, () => true);
        await expect(health.currentStatus()).resolves.toBe('SERVING');
    });

    it('is not serving while the engine is stopped', async () => {
        const health = new HealthService(store, () => false);
        await expect(health.currentStatus()).resolves.toBe('NOT_SERVING');
    });

    it('is not serving when the store is unreachable', async () => {
        const logged = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        jest.spyOn(store, 'ping').mockRejectedValue(new Error('connection refused'));
        const health = new HealthService(store, () => true);

        await expect(health.currentStatus()).resolves.toBe('NOT_SERVING');
        expect(logged).toHaveBeenCalledTimes(1);
    });
});
