import { TopicGroupConfig } from '../config';
import { DonationClaim } from '../domain/entities/DonationClaim';
import { ResultsByTopic } from '../domain/entities/SeatRecord';
import { Subscriber } from '../domain/entities/Subscriber';
import { IChatPlatformClient } from '../domain/ports/IChatPlatformClient';
import { IEndorsementChecker } from '../domain/ports/IEndorsementChecker';
import { IRecordStore } from '../domain/ports/IRecordStore';
import { ITranslator } from '../domain/ports/ITranslator';
import { ClockFn, SleepFn } from '../lib/sleep';
import { AdminReviewService } from './AdminReviewService';
import { DonationRegistry } from './DonationRegistry';
import { InviteIssuer } from './InviteIssuer';
import { MembershipEnforcer } from './MembershipEnforcer';
import { FanoutReport, NotificationFanout } from './NotificationFanout';
import { SubscriberRegistry } from './SubscriberRegistry';
import { UpdateDispatcher } from './UpdateDispatcher';
import { UpdatePoller } from './UpdatePoller';

export interface SeatAlertBotOptions {
    platform: IChatPlatformClient;
    endorsements: IEndorsementChecker;
    translator: ITranslator;
    groups: TopicGroupConfig;
    subscriberStore: IRecordStore<Subscriber>;
    donationStore: IRecordStore<DonationClaim>;
    adminChatId: string;
    multiUser: boolean;
    donationWalletAddress: string;
    bookingUrl: string;
    sleep?: SleepFn;
    now?: ClockFn;
}

export interface BotStats {
    subscribers: number;
    activeSubscribers: number;
    verifiedSubscribers: number;
    pendingDonations: number;
    premiumMembers: number;
    endorsers: number;
    polling: boolean;
}

/**
 * Wires the engine together and exposes what the scrape loop and the
 * admin HTTP surface call.
 */
export class SeatAlertBot {
    readonly subscribers: SubscriberRegistry;
    readonly donations: DonationRegistry;
    readonly dispatcher: UpdateDispatcher;
    readonly fanout: NotificationFanout;
    readonly poller: UpdatePoller;

    private readonly options: SeatAlertBotOptions;
    private pollingStarted = false;

    constructor(options: SeatAlertBotOptions) {
        this.options = options;
        const { platform, translator, groups, sleep } = options;

        this.subscribers = new SubscriberRegistry(options.subscriberStore);
        this.donations = new DonationRegistry(options.donationStore);

        const inviteIssuer = new InviteIssuer(platform);
        const adminReview = new AdminReviewService({
            platform,
            donations: this.donations,
            inviteIssuer,
            translator,
            groups,
        });
        const membership = new MembershipEnforcer({
            platform,
            subscribers: this.subscribers,
            donations: this.donations,
            endorsements: options.endorsements,
            translator,
            groups,
            sleep,
        });

        this.dispatcher = new UpdateDispatcher({
            platform,
            subscribers: this.subscribers,
            donations: this.donations,
            endorsements: options.endorsements,
            translator,
            groups,
            adminReview,
            membership,
            inviteIssuer,
            adminChatId: options.adminChatId,
            donationWalletAddress: options.donationWalletAddress,
        });

        this.fanout = new NotificationFanout({
            platform,
            translator,
            groups,
            subscribers: this.subscribers,
            adminChatId: options.adminChatId,
            bookingUrl: options.bookingUrl,
            sleep,
            now: options.now,
        });

        this.poller = new UpdatePoller(platform, this.dispatcher, { sleep });
    }

    sendAvailability(results: ResultsByTopic): Promise<FanoutReport> {
        return this.fanout.sendAvailability(results);
    }

    sendDailyDigest(results: ResultsByTopic, hours: number = 24): Promise<FanoutReport> {
        return this.fanout.sendDailyDigest(results, hours);
    }

    sendToSubscribers(results: ResultsByTopic): Promise<FanoutReport> {
        return this.fanout.sendToSubscribers(results);
    }

    testConnection(): Promise<boolean> {
        return this.fanout.testConnection();
    }

    /**
     * Starts the update loop once per process. Does nothing unless multi-user mode is on.
     */
    startPolling(): boolean {
        if (!this.options.multiUser || this.pollingStarted) {
            return false;
        }
        this.pollingStarted = true;
        this.poller.start().catch((error) => {
            console.error('[SeatAlertBot] Update loop exited unexpectedly:', error);
        });
        console.log('[SeatAlertBot] Telegram multi-user mode: ENABLED');
        return true;
    }

    stopPolling(): void {
        this.poller.stop();
    }

    async getStats(): Promise<BotStats> {
        const all = await this.subscribers.listAll();
        const active = all.filter((s) => s.active);
        return {
            subscribers: all.length,
            activeSubscribers: active.length,
            verifiedSubscribers: active.filter((s) => s.githubVerified).length,
            pendingDonations: (await this.donations.listUnverified()).length,
            premiumMembers: (await this.donations.listVerified()).length,
            endorsers: await this.options.endorsements.getEndorserCount(),
            polling: this.poller.isRunning,
        };
    }
}
