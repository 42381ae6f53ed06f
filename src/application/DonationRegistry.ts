import { DonationClaim, createDonationClaim } from '../domain/entities/DonationClaim';
import { UserProfile } from '../domain/entities/Subscriber';
import { IRecordStore } from '../domain/ports/IRecordStore';
import { AsyncLock } from '../lib/AsyncLock';

export type AddClaimResult = 'recorded' | 'already_verified';

/**
 * Donation claims keyed by chat id, one per chat.
 * Same locking and full-rewrite behaviour as SubscriberRegistry.
 */
export class DonationRegistry {
    private claims: Map<string, DonationClaim> = new Map();
    private loaded: Promise<void> | null = null;
    private readonly lock = new AsyncLock();

    constructor(private readonly store: IRecordStore<DonationClaim>) { }

    /**
     * Records a claim, replacing an earlier unverified one.
     * A verified claim is left untouched.
     */
    addClaim(chatId: string, transactionId: string, profile: UserProfile): Promise<AddClaimResult> {
        return this.withLock(async (): Promise<AddClaimResult> => {
            if (this.claims.get(chatId)?.verified) {
                return 'already_verified';
            }
            const next = new Map(this.claims);
            next.set(chatId, createDonationClaim(chatId, transactionId, profile));
            await this.commit(next);
            return 'recorded';
        });
    }

    setVerified(chatId: string, verified: boolean = true): Promise<boolean> {
        return this.withLock(async () => {
            const claim = this.claims.get(chatId);
            if (!claim) {
                return false;
            }
            const next = new Map(this.claims);
            next.set(chatId, { ...claim, verified });
            await this.commit(next);
            return true;
        });
    }

    remove(chatId: string): Promise<boolean> {
        return this.withLock(async () => {
            if (!this.claims.has(chatId)) {
                return false;
            }
            const next = new Map(this.claims);
            next.delete(chatId);
            await this.commit(next);
            return true;
        });
    }

    get(chatId: string): Promise<DonationClaim | null> {
        return this.withLock(async () => {
            const claim = this.claims.get(chatId);
            return claim ? { ...claim } : null;
        });
    }

    isVerified(chatId: string): Promise<boolean> {
        return this.withLock(async () => this.claims.get(chatId)?.verified === true);
    }

    listUnverified(): Promise<DonationClaim[]> {
        return this.list((claim) => !claim.verified);
    }

    listVerified(): Promise<DonationClaim[]> {
        return this.list((claim) => claim.verified);
    }

    listAll(): Promise<DonationClaim[]> {
        return this.list(() => true);
    }

    private list(predicate: (claim: DonationClaim) => boolean): Promise<DonationClaim[]> {
        return this.withLock(async () =>
            Array.from(this.claims.values()).filter(predicate).map((claim) => ({ ...claim }))
        );
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
                    this.claims.set(String(record.chatId), record);
                }
                console.log(`[Registry] Loaded ${this.claims.size} donation claims`);
            });
        }
        return this.loaded;
    }

    private async commit(next: Map<string, DonationClaim>): Promise<void> {
        await this.store.saveAll(Array.from(next.values()));
        this.claims = next;
    }
}
