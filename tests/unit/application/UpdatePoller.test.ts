import { POLL_ERROR_BACKOFF_MS, UpdateHandler, UpdatePoller } from '../../../src/application/UpdatePoller';
import { ChatUpdate } from '../../../src/domain/ports/IChatPlatformClient';
import { createFakePlatform } from '../../helpers/fakes';

describe('UpdatePoller', () => {
    let platform: ReturnType<typeof createFakePlatform>;
    let handler: { handleUpdate: jest.Mock<Promise<void>, [ChatUpdate]> } & UpdateHandler;
    let sleep: jest.Mock<Promise<void>, [number]>;
    let poller: UpdatePoller;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        platform = createFakePlatform();
        handler = { handleUpdate: jest.fn().mockResolvedValue(undefined) };
        sleep = jest.fn().mockResolvedValue(undefined);
        poller = new UpdatePoller(platform, handler, { sleep });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('handles each update in order and advances the offset past it', async () => {
        platform.getUpdates.mockResolvedValueOnce({ ok: true, result: [{ update_id: 5 }, { update_id: 6 }] });

        await poller.pollOnce();
        await poller.pollOnce();

        expect(handler.handleUpdate.mock.calls.map(([u]) => u.update_id)).toEqual([5, 6]);
        expect(poller.currentOffset).toBe(7);
        expect(platform.getUpdates).toHaveBeenNthCalledWith(1, 0, 30);
        expect(platform.getUpdates).toHaveBeenNthCalledWith(2, 7, 30);
    });

    it('backs off five seconds when the response is not ok', async () => {
        platform.getUpdates.mockResolvedValueOnce({ ok: false, result: [] });

        await poller.pollOnce();

        expect(sleep).toHaveBeenCalledWith(POLL_ERROR_BACKOFF_MS);
        expect(POLL_ERROR_BACKOFF_MS).toBe(5000);
        expect(handler.handleUpdate).not.toHaveBeenCalled();
    });

    it('keeps looping after errors until stopped', async () => {
        platform.getUpdates
            .mockRejectedValueOnce(new Error('ECONNRESET'))
            .mockResolvedValueOnce({ ok: true, result: [{ update_id: 1 }] })
            .mockImplementation(async () => {
                poller.stop();
                return { ok: true, result: [] };
            });

        const loop = poller.start();
        expect(poller.isRunning).toBe(true);
        await loop;

        expect(sleep).toHaveBeenCalledWith(5000);
        expect(handler.handleUpdate).toHaveBeenCalledTimes(1);
        expect(platform.getUpdates).toHaveBeenCalledTimes(3);
        expect(poller.isRunning).toBe(false);
    });

    it('does not replay an update whose handler failed', async () => {
        handler.handleUpdate.mockRejectedValueOnce(new Error('boom'));
        platform.getUpdates
            .mockResolvedValueOnce({ ok: true, result: [{ update_id: 40 }] })
            .mockImplementation(async () => {
                poller.stop();
                return { ok: true, result: [] };
            });

        await poller.start();

        expect(platform.getUpdates).toHaveBeenLastCalledWith(41, 30);
        expect(sleep).toHaveBeenCalledWith(5000);
    });

    it('starts a single loop', async () => {
        platform.getUpdates.mockImplementation(async () => {
            poller.stop();
            return { ok: true, result: [] };
        });

        const first = poller.start();
        const second = poller.start();
        await first;

        expect(second).toBe(first);
        expect(platform.getUpdates).toHaveBeenCalledTimes(1);
    });
});
