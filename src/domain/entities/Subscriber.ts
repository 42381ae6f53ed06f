import { ALL_TOPICS } from './Topic';

/**
 * Profile snapshot taken from the platform's `from` field.
 */
export interface UserProfile {
    userId: number | null;
    username: string;
    firstName: string;
    lastName: string;
}

/**
 * A recipient of the bot, keyed by private chat id.
 */
export interface Subscriber extends UserProfile {
    chatId: string;
    /** ISO timestamp of first contact; kept across reactivation */
    joinedAt: string;
    active: boolean;
    /**
     * Topic preferences:
     * - [] receives nothing
     * - ['ALL'] receives every topic
     * - explicit codes receive only those
     */
    exams: string[];
    githubVerified: boolean;
    githubUsername: string | null;
    /** Preferred polling interval in minutes. Informational only. */
    intervalMinutes: number | null;
}

export function displayName(profile: Pick<UserProfile, 'firstName' | 'lastName'>): string {
    return `${profile.firstName} ${profile.lastName}`.trim();
}

/**
 * Creates a new subscriber or reactivates an existing one.
 * Preferences and verification carry over; profile fields are refreshed.
 */
export function activateSubscriber(
    chatId: string,
    profile: UserProfile,
    existing?: Subscriber
): Subscriber {
    return {
        chatId,
        userId: profile.userId ?? existing?.userId ?? null,
        username: profile.username || existing?.username || '',
        firstName: profile.firstName || existing?.firstName || '',
        lastName: profile.lastName || existing?.lastName || '',
        joinedAt: existing?.joinedAt ?? new Date().toISOString(),
        active: true,
        exams: existing ? [...existing.exams] : [],
        githubVerified: existing?.githubVerified ?? false,
        githubUsername: existing?.githubUsername ?? null,
        intervalMinutes: existing?.intervalMinutes ?? null,
    };
}

/**
 * True when an active subscriber should be notified about a topic.
 */
export function wantsTopic(subscriber: Subscriber, topic: string): boolean {
    if (!subscriber.active || subscriber.exams.length === 0) {
        return false;
    }
    return subscriber.exams.includes(ALL_TOPICS) || subscriber.exams.includes(topic);
}

/**
 * Normalises a code-hosting identity: trims, drops a leading "@" and
 * trailing "/", and takes the last path segment of a profile URL.
 */
export function normalizeIdentity(raw: string): string {
    let value = raw.trim().replace(/^@+/, '').replace(/^\/+|\/+$/g, '');
    if (value.includes('github.com/')) {
        const segments = value.split('/').filter((s) => s.length > 0);
        value = segments[segments.length - 1] ?? '';
    }
    return value.trim();
}

export function sameIdentity(a: string | null, b: string | null): boolean {
    if (!a || !b) return false;
    return a.toLowerCase() === b.toLowerCase();
}

export function isSubscriberRecord(value: unknown): value is Subscriber {
    if (typeof value !== 'object' || value === null) return false;
    return (
        'chatId' in value && typeof value.chatId === 'string' &&
        'active' in value && typeof value.active === 'boolean' &&
        'exams' in value && Array.isArray(value.exams) &&
        'githubVerified' in value && typeof value.githubVerified === 'boolean'
    );
}
