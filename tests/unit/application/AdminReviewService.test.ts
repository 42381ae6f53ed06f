/**
 * AdminReviewService Unit Tests
 *
 * Two-step donation review: select a claim, then verify or reject it.
 */

import { AdminReviewService } from '../../../src/application/AdminReviewService';
import { DonationRegistry } from '../../../src/application/DonationRegistry';
import { InviteIssuer } from '../../../src/application/InviteIssuer';
import { TopicGroupConfig } from '../../../src/config';
import { DonationClaim } from '../../../src/domain/entities/DonationClaim';
import { Translator } from '../../../src/infrastructure/i18n/Translator';
import { InMemoryRecordStore } from '../../../src/infrastructure/storage/JsonFileRecordStore';
import { createFakePlatform, donationClaim, sentTo } from '../../helpers/fakes';

const ADMIN = '900';
const PREMIUM_GROUP = '-2001';

describe('AdminReviewService', () => {
    const translator = new Translator('en');

    let platform: ReturnType<typeof createFakePlatform>;
    let store: InMemoryRecordStore<DonationClaim>;
    let donations: DonationRegistry;
    let clock: Date;

    const createService = (premiumGroupId: string | null = PREMIUM_GROUP) => {
        const groups: TopicGroupConfig = { topicGroups: {}, premiumGroupId };
        return new AdminReviewService({
            platform,
            donations,
            inviteIssuer: new InviteIssuer(platform),
            translator,
            groups,
            now: () => clock,
        });
    };

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        platform = createFakePlatform();
        store = new InMemoryRecordStore([
            donationClaim({ chatId: '1001', transactionId: 'tx-0001' }),
            donationClaim({ chatId: '1002', userId: 1002, username: 'lucia', firstName: 'Lucia', lastName: '', transactionId: 'tx-0002' }),
            donationClaim({ chatId: '1003', transactionId: 'tx-0003', verified: true }),
        ]);
        donations = new DonationRegistry(store);
        clock = new Date('2026-03-01T12:00:00.000Z');
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    // =====================================================
    // Starting a review
    // =====================================================
    describe('start', () => {
        it('says so when nothing is pending', async () => {
            donations = new DonationRegistry(new InMemoryRecordStore<DonationClaim>());
            const service = createService();

            await service.start(ADMIN);

            expect(sentTo(platform, ADMIN)).toEqual([translator.t('review_none')]);
            expect(service.hasSession(ADMIN)).toBe(false);
        });

        it('lists unverified claims with 1-based numbers', async () => {
            const service = createService();

            await service.start(ADMIN);

            const items = [
                translator.t('review_item', { index: 1, name: 'Mario Rossi', username: 'mario', tx_id: 'tx-0001' }),
                translator.t('review_item', { index: 2, name: 'Lucia', username: 'lucia', tx_id: 'tx-0002' }),
            ].join('\n');
            expect(sentTo(platform, ADMIN)).toEqual([translator.t('review_list', { items })]);
            expect(service.getSession(ADMIN)?.step).toBe('select');
        });
    });

    // =====================================================
    // Selecting a claim
    // =====================================================
    describe('selection', () => {
        it.each(['0', '-1', '3', 'abc'])('rejects %p and stays in selection', async (reply) => {
            const service = createService();
            await service.start(ADMIN);
            platform.sendMessage.mockClear();

            await service.handleReply(ADMIN, reply);

            expect(sentTo(platform, ADMIN)).toEqual([translator.t('review_invalid_selection', { count: 2 })]);
            expect(service.getSession(ADMIN)?.step).toBe('select');
        });

        it('shows the selected claim and asks for an action', async () => {
            const service = createService();
            await service.start(ADMIN);
            platform.sendMessage.mockClear();

            await service.handleReply(ADMIN, '2');

            expect(sentTo(platform, ADMIN)).toEqual([
                translator.t('review_claim', {
                    name: 'Lucia',
                    username: 'lucia',
                    chat_id: '1002',
                    tx_id: 'tx-0002',
                    donated_at: '2026-02-01T09:30:00.000Z',
                }),
            ]);
            const session = service.getSession(ADMIN);
            expect(session?.step).toBe('action');
            expect(session?.step === 'action' ? session.selected.chatId : null).toBe('1002');
        });

        it('cancels on /cancel', async () => {
            const service = createService();
            await service.start(ADMIN);
            await service.handleReply(ADMIN, '/cancel');

            expect(sentTo(platform, ADMIN).pop()).toBe(translator.t('review_cancelled'));
            expect(service.hasSession(ADMIN)).toBe(false);
        });
    });

    // =====================================================
    // Acting on a claim
    // =====================================================
    describe('actions', () => {
        it('verifies the claim, notifies both sides and sends a premium invite', async () => {
            const service = createService();
            await service.start(ADMIN);
            await service.handleReply(ADMIN, '1');
            platform.sendMessage.mockClear();

            await service.handleReply(ADMIN, '1');

            expect(await donations.isVerified('1001')).toBe(true);
            expect(sentTo(platform, ADMIN)).toEqual([
                translator.t('review_verified', { name: 'Mario Rossi', chat_id: '1001' }),
            ]);
            expect(sentTo(platform, '1001')).toEqual([
                translator.t('donate_verified_user'),
                translator.t('premium_invite_link', { link: 'https://t.me/+invite1' }),
            ]);
            expect(platform.createInviteLink).toHaveBeenCalledTimes(1);
            expect(platform.createInviteLink).toHaveBeenCalledWith(PREMIUM_GROUP, 60, 1);
            expect(service.hasSession(ADMIN)).toBe(false);
        });

        it('skips the invite when no premium group is configured', async () => {
            const service = createService(null);
            await service.start(ADMIN);
            await service.handleReply(ADMIN, '1');
            await service.handleReply(ADMIN, '1');

            expect(platform.createInviteLink).not.toHaveBeenCalled();
            expect(sentTo(platform, '1001')).toEqual([translator.t('donate_verified_user')]);
        });

        it('tells the admin when the invite could not be created', async () => {
            platform.createInviteLink.mockResolvedValue(null);
            const service = createService();
            await service.start(ADMIN);
            await service.handleReply(ADMIN, '1');
            await service.handleReply(ADMIN, '1');

            expect(sentTo(platform, ADMIN).pop()).toBe(translator.t('review_invite_failed', { chat_id: '1001' }));
            expect(await donations.isVerified('1001')).toBe(true);
        });

        it('rejects the claim by removing it', async () => {
            const service = createService();
            await service.start(ADMIN);
            await service.handleReply(ADMIN, '2');
            platform.sendMessage.mockClear();

            await service.handleReply(ADMIN, '2');

            expect(await donations.get('1002')).toBeNull();
            expect(sentTo(platform, ADMIN)).toEqual([
                translator.t('review_rejected', { name: 'Lucia', chat_id: '1002' }),
            ]);
            expect(sentTo(platform, '1002')).toEqual([translator.t('donate_rejected_user')]);
        });

        it('repeats the prompt on any other reply', async () => {
            const service = createService();
            await service.start(ADMIN);
            await service.handleReply(ADMIN, '1');
            platform.sendMessage.mockClear();

            await service.handleReply(ADMIN, 'yes');

            expect(sentTo(platform, ADMIN)).toEqual([translator.t('review_invalid_action')]);
            expect(service.getSession(ADMIN)?.step).toBe('action');
        });

        it('reports a claim that disappeared since the review started', async () => {
            const service = createService();
            await service.start(ADMIN);
            await service.handleReply(ADMIN, '1');
            await donations.remove('1001');
            platform.sendMessage.mockClear();

            await service.handleReply(ADMIN, '1');

            expect(sentTo(platform, ADMIN)).toEqual([translator.t('review_missing', { chat_id: '1001' })]);
            expect(sentTo(platform, '1001')).toEqual([]);
        });
    });

    // =====================================================
    // Expiry
    // =====================================================
    describe('expiry', () => {
        it('drops the session after ten minutes', async () => {
            const service = createService();
            await service.start(ADMIN);

            clock = new Date(clock.getTime() + 9 * 60 * 1000);
            expect(service.hasSession(ADMIN)).toBe(true);

            clock = new Date(clock.getTime() + 60 * 1000);
            expect(service.hasSession(ADMIN)).toBe(false);
        });

        it('ignores replies once expired', async () => {
            const service = createService();
            await service.start(ADMIN);
            platform.sendMessage.mockClear();
            clock = new Date(clock.getTime() + 11 * 60 * 1000);

            await service.handleReply(ADMIN, '1');

            expect(platform.sendMessage).not.toHaveBeenCalled();
        });
    });
});
