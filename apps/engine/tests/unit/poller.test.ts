import { Poller } from '../../src/services/poller';
import { sleep } from '../helpers/poll';

describe('Poller', () => {
    let releaseDue: jest.Mock<number, [Date]>;
    let poller: Poller;

    beforeEach(() => {
        releaseDue = jest.fn<number, [Date]>().mockReturnValue(0);
        poller = new Poller({ releaseDue }, { intervalMs: 10 });
    });

    afterEach(async () => {
        await poller.stop();
    });

    it('polls immediately and keeps polling', async () => {
        poller.start();
        expect(releaseDue).toHaveBeenCalledTimes(1);

        await sleep(150);

        expect(releaseDue.mock.calls.length).toBeGreaterThan(1);
        expect(releaseDue.mock.calls[0][0]).toBeInstanceOf(Date);
    });

    it('backs off while nothing is due', () => {
        poller.start();
        expect(poller.currentInterval).toBe(20);
    });

    it('stays at the minimum interval while jobs are released', () => {
        releaseDue.mockReturnValue(2);
        poller.start();
        expect(poller.currentInterval).toBe(10);
    });

    it('respects backpressure', async () => {
        const checkBackpressure = jest.fn().mockReturnValue(true);
        poller = new Poller({ releaseDue }, { intervalMs: 10, checkBackpressure });

        poller.start();
        await sleep(50);

        expect(checkBackpressure).toHaveBeenCalled();
        expect(releaseDue).not.toHaveBeenCalled();
    });

    it('survives an error from the source', async () => {
        const errorLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        releaseDue.mockImplementationOnce(() => {
            throw new Error('boom');
        });

        poller.start();
        expect(poller.currentInterval).toBe(50);
        await sleep(120);

        expect(releaseDue.mock.calls.length).toBeGreaterThan(1);
        errorLog.mockRestore();
    });
});
