import axios, { AxiosInstance } from 'axios';
import { ChatUpdate } from '../../domain/ports/IChatPlatformClient';
import { SleepFn, sleep } from '../../lib/sleep';

/**
 * Envelope every Bot API method answers with.
 */
export interface TelegramResponse<T = unknown> {
    ok: boolean;
    result?: T;
    description?: string;
    error_code?: number;
    parameters?: {
        retry_after?: number;
        migrate_to_chat_id?: number;
    };
}

export interface TelegramApiClientOptions {
    baseUrl?: string;
    maxAttempts?: number;
    requestTimeoutMs?: number;
    sleep?: SleepFn;
}

const DEFAULT_RETRY_AFTER_SECONDS = 5;
const TRANSIENT_BACKOFF_MS = 2000;

/**
 * Authenticated Bot API client with rate-limit and transient-error handling.
 * All platform traffic of the bot goes through `call`.
 */
export class TelegramApiClient {
    private readonly http: AxiosInstance;
    private readonly maxAttempts: number;
    private readonly sleep: SleepFn;

    constructor(botToken: string, options: TelegramApiClientOptions = {}) {
        if (!botToken) {
            throw new Error('Telegram bot token is required');
        }
        const baseUrl = options.baseUrl ?? 'https://api.telegram.org';
        this.maxAttempts = options.maxAttempts ?? 3;
        this.sleep = options.sleep ?? sleep;
        this.http = axios.create({
            baseURL: `${baseUrl}/bot${botToken}`,
            timeout: options.requestTimeoutMs ?? 20000,
            // Status handling is done here, not by axios
            validateStatus: () => true,
        });
    }

    /**
     * Calls a Bot API method. Resolves null once every attempt is used up.
     *
     * - 429: waits the advertised `retry_after` (5s when absent) plus one second.
     * - 5xx: waits 2s.
     * - anything else that fails: waits 2s, or gives up on the last attempt.
     */
    async call<T = unknown>(method: string, payload: object = {}): Promise<TelegramResponse<T> | null> {
        for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
            try {
                const response = await this.http.post<TelegramResponse<T>>(`/${method}`, payload);
                const status = response.status;

                if (status === 429) {
                    const retryAfter = readRetryAfter(response.data);
                    console.warn(`[TelegramApi] Rate limited on ${method} (HTTP 429). Sleeping ${retryAfter}s...`);
                    await this.sleep((retryAfter + 1) * 1000);
                    continue;
                }

                if (status >= 500 && status < 600) {
                    await this.sleep(TRANSIENT_BACKOFF_MS);
                    continue;
                }

                if (status < 200 || status >= 300) {
                    const description = isTelegramResponse(response.data) ? response.data.description : undefined;
                    throw new Error(`HTTP ${status}${description ? `: ${description}` : ''}`);
                }

                if (!isTelegramResponse(response.data)) {
                    throw new Error(`Unexpected response body for ${method}`);
                }
                return response.data;
            } catch (error) {
                if (attempt === this.maxAttempts - 1) {
                    console.error(`[TelegramApi] ${method} failed: ${error instanceof Error ? error.message : String(error)}`);
                    return null;
                }
                await this.sleep(TRANSIENT_BACKOFF_MS);
            }
        }

        console.error(`[TelegramApi] ${method} failed after ${this.maxAttempts} attempts`);
        return null;
    }

    /**
     * Single long-poll request. Errors propagate to the poll loop, which owns the backoff.
     */
    async getUpdates(offset: number, timeoutSeconds: number = 30): Promise<{ ok: boolean; result: ChatUpdate[] }> {
        const response = await this.http.get('/getUpdates', {
            params: {
                offset,
                timeout: timeoutSeconds,
                allowed_updates: JSON.stringify(['message', 'chat_member']),
            },
            timeout: (timeoutSeconds + 5) * 1000,
        });

        const body: unknown = response.data;
        if (!isTelegramResponse(body) || !body.ok || !Array.isArray(body.result)) {
            return { ok: false, result: [] };
        }
        return { ok: true, result: body.result.filter(isChatUpdate) };
    }
}

function isTelegramResponse(value: unknown): value is TelegramResponse {
    return typeof value === 'object' && value !== null && 'ok' in value && typeof value.ok === 'boolean';
}

function isChatUpdate(value: unknown): value is ChatUpdate {
    return typeof value === 'object' && value !== null && 'update_id' in value && typeof value.update_id === 'number';
}

function readRetryAfter(body: unknown): number {
    if (isTelegramResponse(body)) {
        const retryAfter = Number(body.parameters?.retry_after);
        if (Number.isFinite(retryAfter) && retryAfter > 0) {
            return Math.floor(retryAfter);
        }
    }
    return DEFAULT_RETRY_AFTER_SECONDS;
}
