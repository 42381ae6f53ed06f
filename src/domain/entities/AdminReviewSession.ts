import { DonationClaim } from './DonationClaim';

interface ReviewSessionBase {
    readonly adminChatId: string;
    /** Unverified claims as they were when the review started */
    readonly pending: readonly DonationClaim[];
    readonly createdAt: Date;
    readonly expiresAt: Date;
}

/** Waiting for the admin to pick a claim by number */
export interface SelectingReviewSession extends ReviewSessionBase {
    readonly step: 'select';
}

/** Waiting for verify (1) or reject (2) on the picked claim */
export interface ActingReviewSession extends ReviewSessionBase {
    readonly step: 'action';
    readonly selected: DonationClaim;
}

/**
 * In-memory state of one admin's donation review. Never persisted:
 * a restart drops it, and it lapses on its own after `expiresAt`.
 */
export type AdminReviewSession = SelectingReviewSession | ActingReviewSession;

export const REVIEW_SESSION_TTL_MS = 10 * 60 * 1000;

export function createReviewSession(
    adminChatId: string,
    pending: DonationClaim[],
    now: Date = new Date(),
    ttlMs: number = REVIEW_SESSION_TTL_MS
): SelectingReviewSession {
    return {
        adminChatId,
        step: 'select',
        pending: Object.freeze(pending.map((claim) => ({ ...claim }))),
        createdAt: now,
        expiresAt: new Date(now.getTime() + ttlMs),
    };
}

export function isSessionExpired(session: AdminReviewSession, now: Date = new Date()): boolean {
    return now.getTime() >= session.expiresAt.getTime();
}

/**
 * Maps a 1-based reply to a claim in the snapshot, or null when the reply
 * is not an integer in range.
 */
export function selectPendingClaim(session: AdminReviewSession, reply: string): DonationClaim | null {
    const trimmed = reply.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) {
        return null;
    }
    const index = parseInt(trimmed, 10);
    if (index < 1 || index > session.pending.length) {
        return null;
    }
    return session.pending[index - 1];
}

export function selectClaim(session: SelectingReviewSession, claim: DonationClaim): ActingReviewSession {
    return { ...session, step: 'action', selected: claim };
}
