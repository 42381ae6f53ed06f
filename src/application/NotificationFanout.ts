import { TopicGroupConfig } from '../config';
import { ResultsByTopic } from '../domain/entities/SeatRecord';
import { wantsTopic } from '../domain/entities/Subscriber';
import { getAllTopics } from '../domain/entities/Topic';
import { IChatPlatformClient } from '../domain/ports/IChatPlatformClient';
import { ITranslator } from '../domain/ports/ITranslator';
import { formatTopicSummary } from '../domain/services/MessageFormatter';
import { ClockFn, SleepFn, epochSeconds, sleep } from '../lib/sleep';
import { SubscriberRegistry } from './SubscriberRegistry';

export const SEND_PACING_MS = 500;

export interface NotificationFanoutDependencies {
    platform: IChatPlatformClient;
    translator: ITranslator;
    groups: TopicGroupConfig;
    subscribers?: SubscriberRegistry;
    adminChatId?: string;
    bookingUrl: string;
    sleep?: SleepFn;
    now?: ClockFn;
}

export interface FanoutReport {
    sent: number;
    failed: number;
}

/**
 * Turns scrape results into outbound alerts: one aggregated message per topic
 * group, optional per-subscriber copies, and a once-per-window "still running"
 * digest for topics with nothing found.
 */
export class NotificationFanout {
    private readonly deps: NotificationFanoutDependencies;
    private readonly sleep: SleepFn;
    private readonly now: ClockFn;
    /** destination -> topic -> epoch seconds of the last digest; memory only */
    private lastDigestSent: Map<string, Map<string, number>> = new Map();

    constructor(deps: NotificationFanoutDependencies) {
        this.deps = deps;
        this.sleep = deps.sleep ?? sleep;
        this.now = deps.now ?? epochSeconds;
    }

    async sendAvailability(results: ResultsByTopic): Promise<FanoutReport> {
        const report: FanoutReport = { sent: 0, failed: 0 };

        for (const [topic, seats] of Object.entries(results)) {
            if (!seats || seats.length === 0) {
                continue;
            }
            const groupId = this.deps.groups.topicGroups[topic];
            if (!groupId) {
                continue;
            }

            const message = formatTopicSummary(topic, seats, this.deps.translator, this.deps.bookingUrl);
            await this.deliver(groupId, message, report, `${topic} alert`);
            await this.sleep(SEND_PACING_MS);
        }

        return report;
    }

    async sendDailyDigest(results: ResultsByTopic, windowHours: number = 24): Promise<FanoutReport> {
        const report: FanoutReport = { sent: 0, failed: 0 };
        const now = this.now();
        const windowSeconds = Math.floor(windowHours * 3600);

        for (const topic of getAllTopics()) {
            const groupId = this.deps.groups.topicGroups[topic];
            if (!groupId) {
                continue;
            }
            if ((results[topic] ?? []).length > 0) {
                continue;
            }

            const last = this.lastDigestSent.get(groupId)?.get(topic) ?? 0;
            if (now - last < windowSeconds) {
                continue;
            }

            const message = this.deps.translator.t('daily_no_spots', { exam: topic, hours: windowHours });
            await this.deliver(groupId, message, report, `${topic} digest`);
            this.stampDigest(groupId, topic, now);
            await this.sleep(SEND_PACING_MS);
        }

        return report;
    }

    /**
     * Sends each topic's alert straight to every active subscriber who opted in to it.
     * Subscribers with no preferences receive nothing.
     */
    async sendToSubscribers(results: ResultsByTopic): Promise<FanoutReport> {
        const report: FanoutReport = { sent: 0, failed: 0 };
        if (!this.deps.subscribers) {
            return report;
        }

        const recipients = await this.deps.subscribers.listActive();
        for (const [topic, seats] of Object.entries(results)) {
            if (!seats || seats.length === 0) {
                continue;
            }
            const message = formatTopicSummary(topic, seats, this.deps.translator, this.deps.bookingUrl);
            for (const subscriber of recipients) {
                if (!wantsTopic(subscriber, topic)) {
                    continue;
                }
                await this.deliver(subscriber.chatId, message, report, `${topic} alert`);
                await this.sleep(SEND_PACING_MS);
            }
        }

        return report;
    }

    /**
     * Sends a test message to the admin chat.
     */
    async testConnection(): Promise<boolean> {
        if (!this.deps.adminChatId) {
            console.warn('[Fanout] No admin chat configured, skipping connection test');
            return false;
        }
        return this.deps.platform.sendMessage(this.deps.adminChatId, this.deps.translator.t('test_message'));
    }

    private stampDigest(groupId: string, topic: string, at: number): void {
        let perTopic = this.lastDigestSent.get(groupId);
        if (!perTopic) {
            perTopic = new Map();
            this.lastDigestSent.set(groupId, perTopic);
        }
        perTopic.set(topic, at);
    }

    private async deliver(chatId: string, message: string, report: FanoutReport, label: string): Promise<void> {
        try {
            const ok = await this.deps.platform.sendMessage(chatId, message);
            if (ok) {
                report.sent += 1;
            } else {
                report.failed += 1;
                console.error(`[Fanout] ${label} to ${chatId} was not delivered`);
            }
        } catch (error) {
            report.failed += 1;
            console.error(`[Fanout] ${label} to ${chatId} failed:`, error);
        }
    }
}
