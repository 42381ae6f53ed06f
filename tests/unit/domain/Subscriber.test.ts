import {
    activateSubscriber,
    displayName,
    isSubscriberRecord,
    normalizeIdentity,
    sameIdentity,
    wantsTopic,
} from '../../../src/domain/entities/Subscriber';
import { createDonationClaim, isDonationClaimRecord, isValidTransactionId } from '../../../src/domain/entities/DonationClaim';
import { profile, subscriber } from '../../helpers/fakes';

describe('Subscriber', () => {
    describe('activateSubscriber', () => {
        it('creates an active subscriber with no preferences', () => {
            const created = activateSubscriber('1001', profile());
            expect(created.active).toBe(true);
            expect(created.exams).toEqual([]);
            expect(created.githubVerified).toBe(false);
            expect(created.githubUsername).toBeNull();
            expect(created.firstName).toBe('Mario');
        });

        it('keeps preferences, verification and join date on reactivation', () => {
            const existing = subscriber({
                active: false,
                exams: ['TOLC-I'],
                githubVerified: true,
                githubUsername: 'octo-user',
                intervalMinutes: 10,
            });

            const reactivated = activateSubscriber('1001', profile({ firstName: 'Marco' }), existing);

            expect(reactivated.active).toBe(true);
            expect(reactivated.exams).toEqual(['TOLC-I']);
            expect(reactivated.githubVerified).toBe(true);
            expect(reactivated.githubUsername).toBe('octo-user');
            expect(reactivated.intervalMinutes).toBe(10);
            expect(reactivated.joinedAt).toBe('2026-01-05T10:00:00.000Z');
            expect(reactivated.firstName).toBe('Marco');
        });
    });

    describe('wantsTopic', () => {
        it('sends nothing to subscribers without preferences', () => {
            expect(wantsTopic(subscriber({ exams: [] }), 'TOLC-I')).toBe(false);
        });

        it('matches ALL and explicit codes', () => {
            expect(wantsTopic(subscriber({ exams: ['ALL'] }), 'TOLC-B')).toBe(true);
            expect(wantsTopic(subscriber({ exams: ['TOLC-I'] }), 'TOLC-I')).toBe(true);
            expect(wantsTopic(subscriber({ exams: ['TOLC-I'] }), 'TOLC-E')).toBe(false);
        });

        it('never matches inactive subscribers', () => {
            expect(wantsTopic(subscriber({ active: false, exams: ['ALL'] }), 'TOLC-I')).toBe(false);
        });
    });

    describe('identities', () => {
        it('normalizes handles and profile URLs', () => {
            expect(normalizeIdentity('  @octo-user/ ')).toBe('octo-user');
            expect(normalizeIdentity('https://github.com/octo-user')).toBe('octo-user');
            expect(normalizeIdentity('github.com/octo-user/')).toBe('octo-user');
            expect(normalizeIdentity('   ')).toBe('');
        });

        it('compares identities case-insensitively', () => {
            expect(sameIdentity('Octo-User', 'octo-user')).toBe(true);
            expect(sameIdentity(null, 'octo-user')).toBe(false);
        });
    });

    it('builds a display name from first and last name', () => {
        expect(displayName({ firstName: 'Mario', lastName: '' })).toBe('Mario');
        expect(displayName({ firstName: 'Mario', lastName: 'Rossi' })).toBe('Mario Rossi');
    });

    it('recognises stored subscriber records', () => {
        expect(isSubscriberRecord(subscriber())).toBe(true);
        expect(isSubscriberRecord({ chatId: 1001, active: true, exams: [], githubVerified: false })).toBe(false);
        expect(isSubscriberRecord('1001')).toBe(false);
    });
});

describe('DonationClaim', () => {
    it('accepts a single bounded token as transaction reference', () => {
        expect(isValidTransactionId('tx-0001')).toBe(true);
        expect(isValidTransactionId('a'.repeat(200))).toBe(true);
        expect(isValidTransactionId('a'.repeat(201))).toBe(false);
        expect(isValidTransactionId('two words')).toBe(false);
        expect(isValidTransactionId('')).toBe(false);
    });

    it('creates unverified claims from a profile', () => {
        const claim = createDonationClaim('1001', 'tx-0001', profile());
        expect(claim).toMatchObject({ chatId: '1001', transactionId: 'tx-0001', verified: false, username: 'mario' });
        expect(isDonationClaimRecord(claim)).toBe(true);
        expect(isDonationClaimRecord({ chatId: '1001' })).toBe(false);
    });
});
