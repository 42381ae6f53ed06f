import {
    ChatUpdate,
    IChatPlatformClient,
    SendMessageOptions,
} from '../../domain/ports/IChatPlatformClient';
import { SleepFn, sleep } from '../../lib/sleep';
import { TelegramApiClient } from './TelegramApiClient';

/**
 * Adapter that implements IChatPlatformClient on the Telegram Bot API.
 */
export class TelegramPlatformClient implements IChatPlatformClient {
    private readonly sleep: SleepFn;

    constructor(
        private readonly api: TelegramApiClient,
        options: { sleep?: SleepFn } = {}
    ) {
        this.sleep = options.sleep ?? sleep;
    }

    async sendMessage(chatId: string, text: string, options: SendMessageOptions = {}): Promise<boolean> {
        const payload: Record<string, unknown> = {
            chat_id: chatId,
            text,
            disable_web_page_preview: options.disablePreview ?? true,
        };
        const parseMode = options.parseMode === undefined ? 'HTML' : options.parseMode;
        if (parseMode) {
            payload.parse_mode = parseMode;
        }

        const result = await this.api.call('sendMessage', payload);
        return result?.ok === true;
    }

    async createInviteLink(chatId: string, expireSeconds: number, memberLimit: number): Promise<string | null> {
        const expireDate = Math.floor(Date.now() / 1000) + expireSeconds;
        const result = await this.api.call<{ invite_link?: string }>('createChatInviteLink', {
            chat_id: chatId,
            expire_date: expireDate,
            member_limit: memberLimit,
        });

        if (result?.ok && result.result?.invite_link) {
            return result.result.invite_link;
        }
        return null;
    }

    /**
     * Ban, pause, then unban with only_if_banned so the user is out of the
     * group but can come back with a new invite.
     */
    async evictButAllowRejoin(chatId: string, userId: number): Promise<boolean> {
        const banned = await this.api.call('banChatMember', { chat_id: chatId, user_id: userId });
        await this.sleep(500);
        const unbanned = await this.api.call('unbanChatMember', {
            chat_id: chatId,
            user_id: userId,
            only_if_banned: true,
        });
        return banned?.ok === true && unbanned?.ok === true;
    }

    getUpdates(offset: number, timeoutSeconds: number): Promise<{ ok: boolean; result: ChatUpdate[] }> {
        return this.api.getUpdates(offset, timeoutSeconds);
    }
}
