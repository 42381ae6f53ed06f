import axios from 'axios';
import { IEndorsementChecker } from '../../domain/ports/IEndorsementChecker';
import { AsyncLock } from '../../lib/AsyncLock';

export interface GitHubStarCheckerOptions {
    owner: string;
    repo: string;
    token?: string;
    baseUrl?: string;
    cacheTtlMs?: number;
    perPage?: number;
    now?: () => number;
}

interface Stargazer {
    login?: string;
}

/**
 * Checks whether a GitHub user has starred the project repository.
 * The stargazer list is cached and refetched at most once per TTL.
 */
export class GitHubStarChecker implements IEndorsementChecker {
    readonly targetUrl: string;

    private readonly owner: string;
    private readonly repo: string;
    private readonly token: string;
    private readonly baseUrl: string;
    private readonly cacheTtlMs: number;
    private readonly perPage: number;
    private readonly now: () => number;
    private readonly lock = new AsyncLock();

    private stargazers: Set<string> = new Set();
    private lastFetch = 0;

    constructor(options: GitHubStarCheckerOptions) {
        this.owner = options.owner;
        this.repo = options.repo;
        this.token = options.token ?? '';
        this.baseUrl = options.baseUrl ?? 'https://api.github.com';
        this.cacheTtlMs = options.cacheTtlMs ?? 5 * 60 * 1000;
        this.perPage = options.perPage ?? 100;
        this.now = options.now ?? Date.now;
        this.targetUrl = `https://github.com/${this.owner}/${this.repo}`;
    }

    async hasEndorsed(identity: string): Promise<boolean> {
        const login = identity.trim().replace(/^@/, '').toLowerCase();
        if (!login) {
            return false;
        }
        return this.lock.run(async () => {
            await this.refreshIfStale();
            return this.stargazers.has(login);
        });
    }

    async getEndorserCount(): Promise<number> {
        return this.lock.run(async () => {
            await this.refreshIfStale();
            return this.stargazers.size;
        });
    }

    private async refreshIfStale(): Promise<void> {
        const now = this.now();
        if (now - this.lastFetch < this.cacheTtlMs && this.stargazers.size > 0) {
            return;
        }

        const collected = new Set<string>();
        let page = 1;

        while (true) {
            try {
                const response = await axios.get<unknown>(`${this.baseUrl}/repos/${this.owner}/${this.repo}/stargazers`, {
                    headers: this.buildHeaders(),
                    params: { per_page: this.perPage, page },
                    timeout: 15000,
                    validateStatus: () => true,
                });

                if (response.status !== 200 || !Array.isArray(response.data) || response.data.length === 0) {
                    break;
                }

                const users: Stargazer[] = response.data;
                for (const user of users) {
                    const login = typeof user?.login === 'string' ? user.login.toLowerCase() : '';
                    if (login) {
                        collected.add(login);
                    }
                }

                if (users.length < this.perPage) {
                    break;
                }
                page += 1;
            } catch (error) {
                // Keep whatever pages already arrived
                console.warn(`[GitHubStars] Stargazer fetch stopped at page ${page}: ${error instanceof Error ? error.message : String(error)}`);
                break;
            }
        }

        this.stargazers = collected;
        this.lastFetch = now;
        console.log(`[GitHubStars] Cached ${collected.size} stargazers for ${this.owner}/${this.repo}`);
    }

    private buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {
            Accept: 'application/vnd.github+json',
            'X-GitHub-Api-Version': '2022-11-28',
        };
        if (this.token) {
            headers.Authorization = `Bearer ${this.token}`;
        }
        return headers;
    }
}
