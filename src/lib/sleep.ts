export type SleepFn = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Current time in whole epoch seconds.
 */
export type ClockFn = () => number;

export function epochSeconds(): number {
    return Math.floor(Date.now() / 1000);
}
