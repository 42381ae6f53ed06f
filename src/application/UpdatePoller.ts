import { ChatUpdate, IChatPlatformClient } from '../domain/ports/IChatPlatformClient';
import { SleepFn, sleep } from '../lib/sleep';

export interface UpdateHandler {
    handleUpdate(update: ChatUpdate): Promise<void>;
}

export const POLL_TIMEOUT_SECONDS = 30;
export const POLL_ERROR_BACKOFF_MS = 5000;

/**
 * Long-poll loop over getUpdates. The cursor only moves forward: an update
 * is acknowledged (offset = id + 1) before it is handled, so a crash mid-way
 * loses that update rather than replaying it.
 */
export class UpdatePoller {
    private offset = 0;
    private running = false;
    private loop: Promise<void> | null = null;
    private readonly sleep: SleepFn;

    constructor(
        private readonly platform: IChatPlatformClient,
        private readonly handler: UpdateHandler,
        options: { sleep?: SleepFn } = {}
    ) {
        this.sleep = options.sleep ?? sleep;
    }

    get isRunning(): boolean {
        return this.running;
    }

    get currentOffset(): number {
        return this.offset;
    }

    /**
     * Starts the loop once; later calls return the same loop.
     */
    start(): Promise<void> {
        if (!this.loop) {
            this.running = true;
            this.loop = this.run().finally(() => {
                this.running = false;
            });
        }
        return this.loop;
    }

    /**
     * Ends the loop after the in-flight request returns.
     */
    stop(): void {
        this.running = false;
    }

    /**
     * Fetches and handles one batch. Exposed for the loop and for tests.
     */
    async pollOnce(): Promise<void> {
        const response = await this.platform.getUpdates(this.offset, POLL_TIMEOUT_SECONDS);
        if (!response.ok) {
            await this.sleep(POLL_ERROR_BACKOFF_MS);
            return;
        }

        for (const update of response.result) {
            this.offset = Math.max(this.offset, update.update_id + 1);
            await this.handler.handleUpdate(update);
        }
    }

    private async run(): Promise<void> {
        console.log('[Poller] Long-polling for updates');
        while (this.running) {
            try {
                await this.pollOnce();
            } catch (error) {
                console.error(`[Poller] Update batch failed, retrying in ${POLL_ERROR_BACKOFF_MS / 1000}s:`, error instanceof Error ? error.message : error);
                await this.sleep(POLL_ERROR_BACKOFF_MS);
            }
        }
        console.log('[Poller] Stopped');
    }
}
