import { UserProfile } from './Subscriber';

/**
 * A user's claim to have donated, pending admin review.
 * One claim per chat; a rejected claim is deleted, a verified one makes the user premium.
 */
export interface DonationClaim extends UserProfile {
    chatId: string;
    /** Free-form transaction reference supplied by the user */
    transactionId: string;
    donatedAt: string;
    verified: boolean;
}

export const MAX_TRANSACTION_ID_LENGTH = 200;

/**
 * A reference is accepted when it is a single non-empty token of bounded length.
 */
export function isValidTransactionId(value: string): boolean {
    return value.length > 0 && value.length <= MAX_TRANSACTION_ID_LENGTH && !/\s/.test(value);
}

export function createDonationClaim(chatId: string, transactionId: string, profile: UserProfile): DonationClaim {
    return {
        chatId,
        userId: profile.userId,
        username: profile.username,
        firstName: profile.firstName,
        lastName: profile.lastName,
        transactionId,
        donatedAt: new Date().toISOString(),
        verified: false,
    };
}

export function isDonationClaimRecord(value: unknown): value is DonationClaim {
    if (typeof value !== 'object' || value === null) return false;
    return (
        'chatId' in value && typeof value.chatId === 'string' &&
        'transactionId' in value && typeof value.transactionId === 'string' &&
        'verified' in value && typeof value.verified === 'boolean'
    );
}
