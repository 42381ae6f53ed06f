/**
 * AdminReviewService - Walks the admin through pending donation claims.
 *
 * Two steps per session: pick a claim by number, then verify (1) or reject (2).
 * Sessions live in memory only and expire after REVIEW_SESSION_TTL_MS.
 */

import { TopicGroupConfig } from '../config';
import {
    ActingReviewSession,
    AdminReviewSession,
    SelectingReviewSession,
    createReviewSession,
    isSessionExpired,
    selectClaim,
    selectPendingClaim,
} from '../domain/entities/AdminReviewSession';
import { DonationClaim } from '../domain/entities/DonationClaim';
import { displayName } from '../domain/entities/Subscriber';
import { IChatPlatformClient } from '../domain/ports/IChatPlatformClient';
import { ITranslator } from '../domain/ports/ITranslator';
import { escapeHtml } from '../domain/services/MessageFormatter';
import { DonationRegistry } from './DonationRegistry';
import { InviteIssuer } from './InviteIssuer';

export const CANCEL_COMMAND = '/cancel';

export interface AdminReviewDependencies {
    platform: IChatPlatformClient;
    donations: DonationRegistry;
    inviteIssuer: InviteIssuer;
    translator: ITranslator;
    groups: TopicGroupConfig;
    now?: () => Date;
}

export class AdminReviewService {
    private sessions: Map<string, AdminReviewSession> = new Map();
    private readonly deps: AdminReviewDependencies;
    private readonly now: () => Date;

    constructor(deps: AdminReviewDependencies) {
        this.deps = deps;
        this.now = deps.now ?? (() => new Date());
    }

    /**
     * Opens a review over the current unverified claims. Replaces any
     * session the admin already had.
     */
    async start(adminChatId: string): Promise<void> {
        const pending = await this.deps.donations.listUnverified();
        if (pending.length === 0) {
            this.sessions.delete(adminChatId);
            await this.send(adminChatId, this.t('review_none'));
            return;
        }

        const session = createReviewSession(adminChatId, pending, this.now());
        this.sessions.set(adminChatId, session);

        const items = session.pending.map((claim, i) =>
            this.t('review_item', {
                index: i + 1,
                name: escapeHtml(displayName(claim) || 'Unknown'),
                username: escapeHtml(claim.username || 'N/A'),
                tx_id: escapeHtml(claim.transactionId),
            })
        );
        await this.send(adminChatId, this.t('review_list', { items: items.join('\n') }));
    }

    /**
     * True while a non-expired session is open. Expired sessions are dropped here.
     */
    hasSession(adminChatId: string): boolean {
        const session = this.sessions.get(adminChatId);
        if (!session) {
            return false;
        }
        if (isSessionExpired(session, this.now())) {
            this.sessions.delete(adminChatId);
            console.log(`[AdminReview] Session for ${adminChatId} expired`);
            return false;
        }
        return true;
    }

    getSession(adminChatId: string): AdminReviewSession | null {
        return this.hasSession(adminChatId) ? this.sessions.get(adminChatId) ?? null : null;
    }

    async handleReply(adminChatId: string, text: string): Promise<void> {
        const session = this.getSession(adminChatId);
        if (!session) {
            return;
        }

        const reply = text.trim();
        if (reply === CANCEL_COMMAND) {
            this.sessions.delete(adminChatId);
            await this.send(adminChatId, this.t('review_cancelled'));
            return;
        }

        if (session.step === 'select') {
            await this.handleSelect(session, reply);
        } else {
            await this.handleAction(session, reply);
        }
    }

    private async handleSelect(session: SelectingReviewSession, reply: string): Promise<void> {
        const claim = selectPendingClaim(session, reply);
        if (!claim) {
            await this.send(session.adminChatId, this.t('review_invalid_selection', { count: session.pending.length }));
            return;
        }

        this.sessions.set(session.adminChatId, selectClaim(session, claim));
        await this.send(
            session.adminChatId,
            this.t('review_claim', {
                name: escapeHtml(displayName(claim) || 'Unknown'),
                username: escapeHtml(claim.username || 'N/A'),
                chat_id: claim.chatId,
                tx_id: escapeHtml(claim.transactionId),
                donated_at: claim.donatedAt,
            })
        );
    }

    private async handleAction(session: ActingReviewSession, reply: string): Promise<void> {
        const claim = session.selected;
        if (reply === '1') {
            this.sessions.delete(session.adminChatId);
            await this.verify(session.adminChatId, claim);
            return;
        }
        if (reply === '2') {
            this.sessions.delete(session.adminChatId);
            await this.reject(session.adminChatId, claim);
            return;
        }

        await this.send(session.adminChatId, this.t('review_invalid_action'));
    }

    private async verify(adminChatId: string, claim: DonationClaim): Promise<void> {
        const name = escapeHtml(displayName(claim) || 'Unknown');
        const updated = await this.deps.donations.setVerified(claim.chatId, true);
        if (!updated) {
            await this.send(adminChatId, this.t('review_missing', { chat_id: claim.chatId }));
            return;
        }

        console.log(`[AdminReview] Donation from ${claim.chatId} verified`);
        await this.send(adminChatId, this.t('review_verified', { name, chat_id: claim.chatId }));
        await this.send(claim.chatId, this.t('donate_verified_user'));

        const premiumGroupId = this.deps.groups.premiumGroupId;
        if (!premiumGroupId) {
            return;
        }
        const link = await this.deps.inviteIssuer.issue(premiumGroupId);
        if (link) {
            await this.send(claim.chatId, this.t('premium_invite_link', { link }));
        } else {
            await this.send(adminChatId, this.t('review_invite_failed', { chat_id: claim.chatId }));
        }
    }

    private async reject(adminChatId: string, claim: DonationClaim): Promise<void> {
        const name = escapeHtml(displayName(claim) || 'Unknown');
        const removed = await this.deps.donations.remove(claim.chatId);
        if (!removed) {
            await this.send(adminChatId, this.t('review_missing', { chat_id: claim.chatId }));
            return;
        }

        console.log(`[AdminReview] Donation from ${claim.chatId} rejected`);
        await this.send(adminChatId, this.t('review_rejected', { name, chat_id: claim.chatId }));
        await this.send(claim.chatId, this.t('donate_rejected_user'));
    }

    private send(chatId: string, text: string): Promise<boolean> {
        return this.deps.platform.sendMessage(chatId, text);
    }

    private t(key: string, params?: Record<string, string | number>): string {
        return this.deps.translator.t(key, params);
    }
}
