import { TopicGroupConfig } from '../config';
import { ChatUser, IChatPlatformClient } from '../domain/ports/IChatPlatformClient';
import { IEndorsementChecker } from '../domain/ports/IEndorsementChecker';
import { ITranslator } from '../domain/ports/ITranslator';
import { escapeHtml } from '../domain/services/MessageFormatter';
import { SleepFn, sleep } from '../lib/sleep';
import { DonationRegistry } from './DonationRegistry';
import { SubscriberRegistry } from './SubscriberRegistry';

export interface MembershipEnforcerDependencies {
    platform: IChatPlatformClient;
    subscribers: SubscriberRegistry;
    donations: DonationRegistry;
    endorsements: Pick<IEndorsementChecker, 'targetUrl'>;
    translator: ITranslator;
    groups: TopicGroupConfig;
    sleep?: SleepFn;
}

/**
 * Removes members who join a monitored group without qualifying for it:
 * the premium group needs a verified donation, every other group a verified star.
 */
export class MembershipEnforcer {
    private readonly deps: MembershipEnforcerDependencies;
    private readonly sleep: SleepFn;

    constructor(deps: MembershipEnforcerDependencies) {
        this.deps = deps;
        this.sleep = deps.sleep ?? sleep;
    }

    async handleNewMembers(groupChatId: string, members: ChatUser[]): Promise<void> {
        if (!this.isMonitoredGroup(groupChatId)) {
            return;
        }
        for (const member of members) {
            if (member.is_bot) {
                continue;
            }
            try {
                await this.enforce(groupChatId, member);
            } catch (error) {
                console.error(`[Membership] Failed to check user ${member.id} in ${groupChatId}:`, error);
            }
        }
    }

    /**
     * Resolves whether `userId` may stay in `groupChatId`.
     */
    async isAdmitted(groupChatId: string, userId: number): Promise<boolean> {
        const subscriber = await this.deps.subscribers.findByUserId(userId);
        if (!subscriber) {
            return false;
        }
        if (this.isPremiumGroup(groupChatId)) {
            return this.deps.donations.isVerified(subscriber.chatId);
        }
        return subscriber.githubVerified;
    }

    private async enforce(groupChatId: string, member: ChatUser): Promise<void> {
        if (await this.isAdmitted(groupChatId, member.id)) {
            return;
        }

        const name = escapeHtml(member.first_name || 'Unknown');
        const notice = this.isPremiumGroup(groupChatId)
            ? this.deps.translator.t('kick_notice_premium', { name })
            : this.deps.translator.t('kick_notice', { name, repo: this.deps.endorsements.targetUrl });

        await this.deps.platform.sendMessage(groupChatId, notice);
        await this.sleep(1000);
        await this.deps.platform.evictButAllowRejoin(groupChatId, member.id);
        console.warn(`[Membership] Removed unverified user ${member.first_name ?? ''} (${member.id}) from group ${groupChatId}`);
    }

    isMonitoredGroup(groupChatId: string): boolean {
        return this.isPremiumGroup(groupChatId) || Object.values(this.deps.groups.topicGroups).includes(groupChatId);
    }

    private isPremiumGroup(groupChatId: string): boolean {
        return this.deps.groups.premiumGroupId !== null && this.deps.groups.premiumGroupId === groupChatId;
    }
}
