import { TopicGroupConfig } from '../config';
import { isValidTransactionId, MAX_TRANSACTION_ID_LENGTH } from '../domain/entities/DonationClaim';
import {
    UserProfile,
    displayName,
    normalizeIdentity,
} from '../domain/entities/Subscriber';
import { getAllTopics, resolveTopicSelection } from '../domain/entities/Topic';
import {
    ChatMessage,
    ChatUpdate,
    ChatUser,
    IChatPlatformClient,
} from '../domain/ports/IChatPlatformClient';
import { IEndorsementChecker } from '../domain/ports/IEndorsementChecker';
import { ITranslator, TranslationParams } from '../domain/ports/ITranslator';
import { escapeHtml, formatTopicMenu } from '../domain/services/MessageFormatter';
import { AdminReviewService } from './AdminReviewService';
import { DonationRegistry } from './DonationRegistry';
import { InviteIssuer } from './InviteIssuer';
import { MembershipEnforcer } from './MembershipEnforcer';
import { SubscriberRegistry } from './SubscriberRegistry';

export interface UpdateDispatcherDependencies {
    platform: IChatPlatformClient;
    subscribers: SubscriberRegistry;
    donations: DonationRegistry;
    endorsements: IEndorsementChecker;
    translator: ITranslator;
    groups: TopicGroupConfig;
    adminReview: AdminReviewService;
    membership: MembershipEnforcer;
    inviteIssuer: InviteIssuer;
    adminChatId: string;
    donationWalletAddress: string;
}

/**
 * Routes one inbound update. Precedence, first match wins:
 * group joins, non-private/non-text (ignored), open admin review,
 * pre-verification commands, admin commands, verification gate,
 * then the commands and topic selection of verified subscribers.
 */
export class UpdateDispatcher {
    private readonly deps: UpdateDispatcherDependencies;

    constructor(deps: UpdateDispatcherDependencies) {
        this.deps = deps;
    }

    async handleUpdate(update: ChatUpdate): Promise<void> {
        const joined = extractJoinEvent(update);
        if (joined) {
            await this.deps.membership.handleNewMembers(joined.chatId, joined.members);
            return;
        }

        const message = update.message;
        if (!message || typeof message.text !== 'string' || message.chat.type !== 'private') {
            return;
        }

        const chatId = String(message.chat.id);
        const text = message.text.trim();

        try {
            await this.route(chatId, text, message);
        } catch (error) {
            console.error(`[Dispatcher] Failed to handle message from ${chatId}:`, error);
        }
    }

    private async route(chatId: string, text: string, message: ChatMessage): Promise<void> {
        const profile = toProfile(message.from);
        const isAdmin = this.isAdmin(chatId);

        if (isAdmin && this.deps.adminReview.hasSession(chatId)) {
            await this.deps.adminReview.handleReply(chatId, text);
            return;
        }

        // Available before verification
        if (text === '/start') {
            await this.cmdStart(chatId, profile);
            return;
        }
        if (text === '/donate') {
            await this.cmdDonateInfo(chatId);
            return;
        }
        if (text.startsWith('/donate ')) {
            await this.cmdDonateSubmit(chatId, text.slice('/donate '.length).trim(), profile);
            return;
        }
        const [command, ...rest] = text.split(/\s+/);
        if (command === '/github' || command === '/star') {
            await this.cmdVerifyStar(chatId, rest.join(' '), profile);
            return;
        }

        // Admin only; not listed in /help
        if (isAdmin) {
            if (text === '/interval') {
                await this.send(chatId, this.t('interval_info'));
                return;
            }
            if (command === '/interval') {
                await this.cmdSetInterval(chatId, rest);
                return;
            }
            if (text === '/pending') {
                await this.deps.adminReview.start(chatId);
                return;
            }
        }

        const subscriber = await this.deps.subscribers.get(chatId);
        if (!subscriber || !subscriber.active || !subscriber.githubVerified) {
            await this.send(chatId, this.t('github_required', { repo: this.deps.endorsements.targetUrl }));
            return;
        }

        switch (text) {
            case '/stop':
                await this.deps.subscribers.unsubscribe(chatId);
                await this.send(chatId, this.t('bot_stopped'));
                return;
            case '/exam':
            case '/exams':
                await this.send(chatId, formatTopicMenu(getAllTopics(), this.deps.translator));
                return;
            case '/status':
                await this.cmdStatus(chatId);
                return;
            case '/help':
                await this.send(chatId, this.t('help_message'));
                return;
            default:
                await this.trySelectTopic(chatId, text);
        }
    }

    private async cmdStart(chatId: string, profile: UserProfile): Promise<void> {
        const isNew = await this.deps.subscribers.subscribe(chatId, profile);
        await this.send(chatId, this.t('welcome', { repo: this.deps.endorsements.targetUrl }));
        if (isNew) {
            console.log(
                `[Dispatcher] New subscriber: ${displayName(profile) || 'Unknown'} ` +
                `(@${profile.username || 'N/A'}, ID: ${profile.userId ?? 'N/A'})`
            );
        }
    }

    private async cmdDonateInfo(chatId: string): Promise<void> {
        await this.send(chatId, this.t('donate_info', { address: escapeHtml(this.deps.donationWalletAddress) }));
    }

    private async cmdDonateSubmit(chatId: string, transactionId: string, profile: UserProfile): Promise<void> {
        if (!transactionId) {
            await this.cmdDonateInfo(chatId);
            return;
        }
        if (!isValidTransactionId(transactionId)) {
            await this.send(chatId, this.t('donate_usage', { max: MAX_TRANSACTION_ID_LENGTH }));
            return;
        }

        const result = await this.deps.donations.addClaim(chatId, transactionId, profile);
        if (result === 'already_verified') {
            await this.send(chatId, this.t('donate_already_premium'));
            return;
        }

        const txId = escapeHtml(transactionId);
        await this.send(chatId, this.t('donate_submitted', { tx_id: txId }));

        if (this.deps.adminChatId) {
            await this.send(
                this.deps.adminChatId,
                this.t('donate_admin_notice', {
                    name: escapeHtml(displayName(profile)),
                    username: escapeHtml(profile.username || 'N/A'),
                    chat_id: chatId,
                    tx_id: txId,
                })
            );
        }
        console.log(`[Dispatcher] Donation claim from ${chatId} (TX: ${transactionId})`);
    }

    private async cmdVerifyStar(chatId: string, argument: string, profile: UserProfile): Promise<void> {
        const username = normalizeIdentity(argument);
        if (!username) {
            await this.send(chatId, this.t('github_usage'));
            return;
        }

        const safeName = escapeHtml(username);
        await this.send(chatId, this.t('github_checking', { username: safeName }));

        const starred = await this.deps.endorsements.hasEndorsed(username);
        if (!starred) {
            await this.send(
                chatId,
                this.t('github_not_starred', { username: safeName, repo: this.deps.endorsements.targetUrl })
            );
            return;
        }

        const existing = await this.deps.subscribers.get(chatId);
        if (!existing || !existing.active) {
            await this.deps.subscribers.subscribe(chatId, profile);
        }

        const result = await this.deps.subscribers.setVerifiedIdentity(chatId, username);
        if (!result.ok) {
            await this.send(chatId, this.t('github_taken', { username: safeName }));
            console.warn(`[Dispatcher] GitHub identity ${username} rejected for ${chatId}: ${result.reason}`);
            return;
        }

        await this.send(chatId, this.t('github_verified', { username: safeName }));
        console.log(`[Dispatcher] GitHub verified: ${chatId} -> ${username}`);
    }

    private async cmdSetInterval(chatId: string, args: string[]): Promise<void> {
        const value = args[0] ?? '';
        const minutes = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
        if (!Number.isInteger(minutes) || minutes < 1 || minutes > 60) {
            await this.send(chatId, this.t('interval_usage'));
            return;
        }

        const stored = await this.deps.subscribers.setInterval(chatId, minutes);
        if (!stored) {
            await this.send(chatId, this.t('bot_not_subscribed'));
            return;
        }
        await this.send(chatId, this.t('interval_set', { minutes }));
    }

    private async cmdStatus(chatId: string): Promise<void> {
        const subscriber = await this.deps.subscribers.get(chatId);
        if (!subscriber || !subscriber.active) {
            await this.send(chatId, this.t('bot_not_subscribed'));
            return;
        }

        const premium = await this.deps.donations.isVerified(chatId);
        await this.send(
            chatId,
            this.t('status_message', {
                active: this.t('yes'),
                github: escapeHtml(subscriber.githubUsername ?? 'N/A'),
                verified: subscriber.githubVerified ? '✅' : '❌',
                premium: premium ? '✅' : '❌',
            })
        );
    }

    private async trySelectTopic(chatId: string, text: string): Promise<void> {
        const topic = resolveTopicSelection(text);
        if (!topic) {
            return;
        }

        const groupId = this.deps.groups.topicGroups[topic];
        if (!groupId) {
            await this.send(chatId, this.t('group_not_configured', { exam: topic }));
            return;
        }

        await this.send(chatId, this.t('invite_generating', { exam: topic }));
        const link = await this.deps.inviteIssuer.issue(groupId);
        if (link) {
            await this.send(chatId, this.t('invite_link', { exam: topic, link }));
            console.log(`[Dispatcher] Invite link sent to ${chatId} for ${topic}`);
        } else {
            await this.send(chatId, this.t('invite_failed', { exam: topic }));
        }
    }

    private isAdmin(chatId: string): boolean {
        return this.deps.adminChatId !== '' && chatId === this.deps.adminChatId;
    }

    private send(chatId: string, text: string): Promise<boolean> {
        return this.deps.platform.sendMessage(chatId, text);
    }

    private t(key: string, params?: TranslationParams): string {
        return this.deps.translator.t(key, params);
    }
}

/**
 * Pulls "users joined a group" out of a service message. chat_member updates
 * describe the same joins and are not acted on, so a join is handled once.
 */
function extractJoinEvent(update: ChatUpdate): { chatId: string; members: ChatUser[] } | null {
    const message = update.message;
    if (
        message?.new_chat_members &&
        message.new_chat_members.length > 0 &&
        (message.chat.type === 'group' || message.chat.type === 'supergroup')
    ) {
        return { chatId: String(message.chat.id), members: message.new_chat_members };
    }

    return null;
}

function toProfile(user: ChatUser | undefined): UserProfile {
    return {
        userId: user?.id ?? null,
        username: user?.username ?? '',
        firstName: user?.first_name ?? '',
        lastName: user?.last_name ?? '',
    };
}
