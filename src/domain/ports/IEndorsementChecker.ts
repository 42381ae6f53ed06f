/**
 * Port for checking whether an external identity endorsed the project.
 * Implementations: GitHubStarChecker
 */
export interface IEndorsementChecker {
    hasEndorsed(identity: string): Promise<boolean>;
    getEndorserCount(): Promise<number>;
    /** Public URL users are pointed at to endorse */
    readonly targetUrl: string;
}
