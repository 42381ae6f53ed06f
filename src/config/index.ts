import dotenv from 'dotenv';
import { isKnownTopic } from '../domain/entities/Topic';

// Load environment variables
dotenv.config();

export const SUPPORTED_LANGUAGES = ['en', 'it'];

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;
    language: string;

    // Telegram
    telegramBotToken: string;
    adminChatId: string;
    multiUser: boolean;

    // Destinations
    topicGroupIds: Record<string, string>;
    premiumGroupId: string;

    // GitHub star verification
    githubToken: string;
    githubRepoOwner: string;
    githubRepoName: string;

    // Donations
    donationWalletAddress: string;

    // Alerts
    bookingUrl: string;

    // Storage
    subscribersFile: string;
    donatorsFile: string;

    // Admin HTTP surface
    adminApiToken: string;
}

/**
 * Immutable destination map handed to the notification and membership components.
 */
export interface TopicGroupConfig {
    readonly topicGroups: Readonly<Record<string, string>>;
    readonly premiumGroupId: string | null;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value.trim().toLowerCase() === 'true';
}

/**
 * Parses TOPIC_GROUP_IDS, a JSON object of topic code -> group chat id.
 * Empty ids are dropped so an unset topic reads as "not configured".
 */
export function parseTopicGroupIds(raw: string): Record<string, string> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw || '{}');
    } catch {
        throw new Error('TOPIC_GROUP_IDS must be a JSON object of topic code to group id');
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error('TOPIC_GROUP_IDS must be a JSON object of topic code to group id');
    }

    const result: Record<string, string> = {};
    for (const [topic, groupId] of Object.entries(parsed)) {
        if (typeof groupId !== 'string' && typeof groupId !== 'number') {
            throw new Error(`TOPIC_GROUP_IDS.${topic} must be a string or number`);
        }
        const id = String(groupId).trim();
        if (id) {
            result[topic] = id;
        }
    }
    return result;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),
        language: getEnvVar('LANGUAGE', 'en'),

        // Telegram
        telegramBotToken: getEnvVar('TELEGRAM_BOT_TOKEN', ''),
        adminChatId: getEnvVar('TELEGRAM_ADMIN_CHAT_ID', ''),
        multiUser: getEnvVarBoolean('TELEGRAM_MULTI_USER', false),

        // Destinations
        topicGroupIds: parseTopicGroupIds(getEnvVar('TOPIC_GROUP_IDS', '{}')),
        premiumGroupId: getEnvVar('PREMIUM_GROUP_ID', ''),

        // GitHub star verification
        githubToken: getEnvVar('GITHUB_TOKEN', ''),
        githubRepoOwner: getEnvVar('GITHUB_REPO_OWNER', 'seat-alerts'),
        githubRepoName: getEnvVar('GITHUB_REPO_NAME', 'exam-seat-alert-bot'),

        // Donations
        donationWalletAddress: getEnvVar('DONATION_WALLET_ADDRESS', ''),

        // Alerts
        bookingUrl: getEnvVar('BOOKING_URL', 'https://testcisia.it/studenti_tolc/login_sso.php'),

        // Storage
        subscribersFile: getEnvVar('SUBSCRIBERS_FILE', 'data/subscribers.json'),
        donatorsFile: getEnvVar('DONATORS_FILE', 'data/donators.json'),

        // Admin HTTP surface
        adminApiToken: getEnvVar('ADMIN_API_TOKEN', ''),
    };
}

/**
 * Validates that the settings needed by the enabled features are present.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.telegramBotToken) {
        errors.push('TELEGRAM_BOT_TOKEN is required');
    }
    if (config.multiUser && !config.adminChatId) {
        errors.push('TELEGRAM_ADMIN_CHAT_ID is required when TELEGRAM_MULTI_USER is enabled');
    }
    if (!SUPPORTED_LANGUAGES.includes(config.language)) {
        errors.push(`LANGUAGE must be one of ${SUPPORTED_LANGUAGES.join(', ')}, got: ${config.language}`);
    }
    const unknownTopics = Object.keys(config.topicGroupIds).filter((topic) => !isKnownTopic(topic));
    if (unknownTopics.length > 0) {
        errors.push(`TOPIC_GROUP_IDS contains unknown topics: ${unknownTopics.join(', ')}`);
    }

    return errors;
}

/**
 * Freezes the destination part of the configuration.
 */
export function buildTopicGroupConfig(config: Config): TopicGroupConfig {
    return Object.freeze({
        topicGroups: Object.freeze({ ...config.topicGroupIds }),
        premiumGroupId: config.premiumGroupId || null,
    });
}
