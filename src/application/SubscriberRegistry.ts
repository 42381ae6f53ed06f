import {
    Subscriber,
    UserProfile,
    activateSubscriber,
    sameIdentity,
    wantsTopic,
} from '../domain/entities/Subscriber';
import { IRecordStore } from '../domain/ports/IRecordStore';
import { AsyncLock } from '../lib/AsyncLock';

export type VerifyIdentityResult =
    | { ok: true }
    | { ok: false; reason: 'not_found' | 'taken' };

/**
 * Subscriber storage keyed by chat id.
 * Every operation runs under one lock; every mutation rewrites the whole store
 * and reaches memory only once that write succeeded.
 */
export class SubscriberRegistry {
    private subscribers: Map<string, Subscriber> = new Map();
    private loaded: Promise<void> | null = null;
    private readonly lock = new AsyncLock();

    constructor(private readonly store: IRecordStore<Subscriber>) { }

    /**
     * Adds or reactivates a subscriber. Resolves true when the chat was
     * unknown or inactive before.
     */
    subscribe(chatId: string, profile: UserProfile): Promise<boolean> {
        return this.withLock(async () => {
            const existing = this.subscribers.get(chatId);
            const isNew = !existing || !existing.active;
            await this.commit(chatId, activateSubscriber(chatId, profile, existing));
            return isNew;
        });
    }

    unsubscribe(chatId: string): Promise<boolean> {
        return this.mutate(chatId, (subscriber) => {
            subscriber.active = false;
        });
    }

    /**
     * Replaces exam preferences: [] for none, ['ALL'] for every topic.
     */
    setPreferences(chatId: string, exams: string[]): Promise<boolean> {
        return this.mutate(chatId, (subscriber) => {
            subscriber.exams = [...exams];
        });
    }

    setInterval(chatId: string, minutes: number): Promise<boolean> {
        return this.mutate(chatId, (subscriber) => {
            subscriber.intervalMinutes = minutes;
        });
    }

    /**
     * Marks a subscriber verified for `username`, unless another active
     * subscriber already holds that identity. Nothing changes on failure.
     */
    setVerifiedIdentity(chatId: string, username: string): Promise<VerifyIdentityResult> {
        return this.withLock(async (): Promise<VerifyIdentityResult> => {
            const subscriber = this.subscribers.get(chatId);
            if (!subscriber) {
                return { ok: false, reason: 'not_found' };
            }

            const holder = Array.from(this.subscribers.values()).find(
                (other) =>
                    other.chatId !== chatId &&
                    other.active &&
                    other.githubVerified &&
                    sameIdentity(other.githubUsername, username)
            );
            if (holder) {
                return { ok: false, reason: 'taken' };
            }

            await this.commit(chatId, { ...copy(subscriber), githubVerified: true, githubUsername: username });
            return { ok: true };
        });
    }

    get(chatId: string): Promise<Subscriber | null> {
        return this.withLock(async () => {
            const subscriber = this.subscribers.get(chatId);
            return subscriber ? copy(subscriber) : null;
        });
    }

    findByUserId(userId: number): Promise<Subscriber | null> {
        return this.withLock(async () => {
            const subscriber = Array.from(this.subscribers.values()).find((s) => s.userId === userId);
            return subscriber ? copy(subscriber) : null;
        });
    }

    wantsTopic(chatId: string, topic: string): Promise<boolean> {
        return this.withLock(async () => {
            const subscriber = this.subscribers.get(chatId);
            return subscriber ? wantsTopic(subscriber, topic) : false;
        });
    }

    listActive(): Promise<Subscriber[]> {
        return this.withLock(async () => Array.from(this.subscribers.values()).filter((s) => s.active).map(copy));
    }

    listAll(): Promise<Subscriber[]> {
        return this.withLock(async () => Array.from(this.subscribers.values()).map(copy));
    }

    private mutate(chatId: string, change: (subscriber: Subscriber) => void): Promise<boolean> {
        return this.withLock(async () => {
            const subscriber = this.subscribers.get(chatId);
            if (!subscriber) {
                return false;
            }
            const updated = copy(subscriber);
            change(updated);
            await this.commit(chatId, updated);
            return true;
        });
    }

    private withLock<T>(fn: () => Promise<T>): Promise<T> {
        return this.lock.run(async () => {
            await this.ensureLoaded();
            return fn();
        });
    }

    private ensureLoaded(): Promise<void> {
        if (!this.loaded) {
            this.loaded = this.store.load().then((records) => {
                for (const record of records) {
                    this.subscribers.set(String(record.chatId), record);
                }
                console.log(`[Registry] Loaded ${this.subscribers.size} subscribers`);
            });
        }
        return this.loaded;
    }

    /**
     * Writes the store with `record` in place and only then swaps it into
     * memory, so a failed write leaves the registry as it was.
     */
    private async commit(chatId: string, record: Subscriber): Promise<void> {
        const next = new Map(this.subscribers);
        next.set(chatId, record);
        await this.store.saveAll(Array.from(next.values()));
        this.subscribers = next;
    }
}

function copy(subscriber: Subscriber): Subscriber {
    return { ...subscriber, exams: [...subscriber.exams] };
}
