import { IChatPlatformClient } from '../domain/ports/IChatPlatformClient';

export const INVITE_EXPIRY_SECONDS = 60;
export const INVITE_MEMBER_LIMIT = 1;

/**
 * Mints a fresh single-use, short-lived invite per request. Links are never
 * reused, so concurrent requests for the same group each get their own.
 */
export class InviteIssuer {
    constructor(private readonly platform: IChatPlatformClient) { }

    async issue(groupId: string): Promise<string | null> {
        const link = await this.platform.createInviteLink(groupId, INVITE_EXPIRY_SECONDS, INVITE_MEMBER_LIMIT);
        if (!link) {
            console.warn(`[InviteIssuer] Could not create invite link for group ${groupId}`);
        }
        return link;
    }
}
