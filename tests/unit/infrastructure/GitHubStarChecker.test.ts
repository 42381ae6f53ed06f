import nock from 'nock';
import { GitHubStarChecker } from '../../../src/infrastructure/github/GitHubStarChecker';

const API = 'https://api.github.test';
const PATH = '/repos/example-org/example-repo/stargazers';

describe('GitHubStarChecker', () => {
    let clock: number;

    const createChecker = (token = '') =>
        new GitHubStarChecker({
            owner: 'example-org',
            repo: 'example-repo',
            token,
            baseUrl: API,
            perPage: 2,
            now: () => clock,
        });

    beforeAll(() => {
        nock.disableNetConnect();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    beforeEach(() => {
        clock = 1_000_000;
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        nock.cleanAll();
        jest.restoreAllMocks();
    });

    it('exposes the repository URL', () => {
        expect(createChecker().targetUrl).toBe('https://github.com/example-org/example-repo');
    });

    it('pages through stargazers and matches case-insensitively', async () => {
        nock(API)
            .get(PATH)
            .query({ per_page: '2', page: '1' })
            .reply(200, [{ login: 'Alice' }, { login: 'bob' }])
            .get(PATH)
            .query({ per_page: '2', page: '2' })
            .reply(200, [{ login: 'carol' }]);

        const checker = createChecker();

        expect(await checker.hasEndorsed('ALICE')).toBe(true);
        expect(await checker.hasEndorsed('@carol')).toBe(true);
        expect(await checker.hasEndorsed('dave')).toBe(false);
        expect(await checker.getEndorserCount()).toBe(3);
        expect(nock.isDone()).toBe(true);
    });

    it('sends the token as a bearer header', async () => {
        nock(API)
            .matchHeader('authorization', 'Bearer test-token')
            .get(PATH)
            .query(true)
            .reply(200, [{ login: 'alice' }]);

        expect(await createChecker('test-token').hasEndorsed('alice')).toBe(true);
    });

    it('serves from cache within the TTL and refetches after it', async () => {
        nock(API).get(PATH).query(true).reply(200, [{ login: 'alice' }]);
        const checker = createChecker();
        expect(await checker.hasEndorsed('alice')).toBe(true);

        clock += 60_000;
        expect(await checker.hasEndorsed('alice')).toBe(true);
        expect(nock.pendingMocks()).toEqual([]);

        nock(API).get(PATH).query(true).reply(200, [{ login: 'bob' }]);
        clock += 5 * 60 * 1000;
        expect(await checker.hasEndorsed('alice')).toBe(false);
        expect(await checker.hasEndorsed('bob')).toBe(true);
    });

    it('keeps the pages that arrived before a failure', async () => {
        nock(API)
            .get(PATH)
            .query({ per_page: '2', page: '1' })
            .reply(200, [{ login: 'alice' }, { login: 'bob' }])
            .get(PATH)
            .query({ per_page: '2', page: '2' })
            .reply(500, { message: 'Server Error' });

        const checker = createChecker();

        expect(await checker.hasEndorsed('bob')).toBe(true);
        expect(await checker.getEndorserCount()).toBe(2);
    });

    it('treats an empty identity as not endorsed without fetching', async () => {
        expect(await createChecker().hasEndorsed('  ')).toBe(false);
    });
});
