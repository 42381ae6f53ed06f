/**
 * Telegram update types (minimal definitions).
 */
export interface ChatUser {
    id: number;
    is_bot?: boolean;
    first_name?: string;
    last_name?: string;
    username?: string;
}

export interface Chat {
    id: number;
    type: 'private' | 'group' | 'supergroup' | 'channel';
    title?: string;
}

export interface ChatMessage {
    message_id: number;
    chat: Chat;
    from?: ChatUser;
    text?: string;
    new_chat_members?: ChatUser[];
}

export interface ChatMemberUpdated {
    chat: Chat;
    from: ChatUser;
    new_chat_member: {
        status: string;
        user: ChatUser;
    };
}

export interface ChatUpdate {
    update_id: number;
    message?: ChatMessage;
    chat_member?: ChatMemberUpdated;
}

export interface SendMessageOptions {
    parseMode?: 'HTML' | 'MarkdownV2' | null;
    disablePreview?: boolean;
}

/**
 * Port for everything the engine asks of the chat platform.
 * Implementations: TelegramPlatformClient
 */
export interface IChatPlatformClient {
    /**
     * Sends a message. Resolves false when the platform did not accept it.
     */
    sendMessage(chatId: string, text: string, options?: SendMessageOptions): Promise<boolean>;

    /**
     * Mints a new invite link for a group. Every call yields a distinct link.
     */
    createInviteLink(chatId: string, expireSeconds: number, memberLimit: number): Promise<string | null>;

    /**
     * Removes a user from a group now while leaving them free to rejoin
     * later through a fresh invite (ban, then unban-if-banned).
     */
    evictButAllowRejoin(chatId: string, userId: number): Promise<boolean>;

    /**
     * Long-polls for updates with id >= offset.
     */
    getUpdates(offset: number, timeoutSeconds: number): Promise<{ ok: boolean; result: ChatUpdate[] }>;
}
