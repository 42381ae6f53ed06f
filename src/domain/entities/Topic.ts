/**
 * Exam topics that seat results and alert groups are keyed by.
 */
export const TOPIC_CODES = [
    'TOLC-I',
    'TOLC-E',
    'TOLC-S',
    'TOLC-F',
    'TOLC-SU',
    'TOLC-B',
    'TOLC-AV',
    'TOLC-PSI',
    'TOLC-SPS',
    'TOLC-LP',
    'CEnT-S',
] as const;

export type TopicCode = (typeof TOPIC_CODES)[number];

/**
 * Preference sentinel meaning "every topic".
 */
export const ALL_TOPICS = 'ALL';

/**
 * Returns all topic codes in menu order (code-point sorted, so "CEnT-S" comes first).
 */
export function getAllTopics(): string[] {
    return [...TOPIC_CODES].sort();
}

export function isKnownTopic(value: string): value is TopicCode {
    return TOPIC_CODES.some((code) => code === value);
}

/**
 * Resolves a free-text menu reply to a topic: either a 1-based ordinal
 * into getAllTopics() or an exact, case-insensitive topic name.
 */
export function resolveTopicSelection(text: string): string | null {
    const topics = getAllTopics();
    const trimmed = text.trim();

    if (/^\d+$/.test(trimmed)) {
        const index = parseInt(trimmed, 10);
        if (index >= 1 && index <= topics.length) {
            return topics[index - 1];
        }
        return null;
    }

    const upper = trimmed.toUpperCase();
    return topics.find((topic) => topic.toUpperCase() === upper) ?? null;
}
