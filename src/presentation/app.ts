import express, { Application, Request, Response, NextFunction } from 'express';
import { Config, buildTopicGroupConfig } from '../config';
import { SeatAlertBot } from '../application/SeatAlertBot';
import { isDonationClaimRecord } from '../domain/entities/DonationClaim';
import { isSubscriberRecord } from '../domain/entities/Subscriber';
import { GitHubStarChecker } from '../infrastructure/github/GitHubStarChecker';
import { Translator } from '../infrastructure/i18n/Translator';
import { JsonFileRecordStore } from '../infrastructure/storage/JsonFileRecordStore';
import { TelegramApiClient } from '../infrastructure/telegram/TelegramApiClient';
import { TelegramPlatformClient } from '../infrastructure/telegram/TelegramPlatformClient';
import { createAdminRoutes } from './routes/adminRoutes';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

/**
 * Creates and configures the Express application.
 */
export function createApp(bot: SeatAlertBot, config: Pick<Config, 'adminApiToken'>): Application {
    const app = express();

    app.use(express.json());

    // Health check
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            polling: bot.poller.isRunning,
        });
    });

    // Routes
    app.use('/admin', createAdminRoutes(bot, config.adminApiToken));

    app.use((req: Request, _res: Response, next: NextFunction) => {
        next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates the bot with its Telegram, GitHub and file-backed dependencies.
 */
export function createBot(config: Config): SeatAlertBot {
    const api = new TelegramApiClient(config.telegramBotToken);

    return new SeatAlertBot({
        platform: new TelegramPlatformClient(api),
        endorsements: new GitHubStarChecker({
            owner: config.githubRepoOwner,
            repo: config.githubRepoName,
            token: config.githubToken,
        }),
        translator: new Translator(config.language),
        groups: buildTopicGroupConfig(config),
        subscriberStore: new JsonFileRecordStore(config.subscribersFile, isSubscriberRecord),
        donationStore: new JsonFileRecordStore(config.donatorsFile, isDonationClaimRecord),
        adminChatId: config.adminChatId,
        multiUser: config.multiUser,
        donationWalletAddress: config.donationWalletAddress,
        bookingUrl: config.bookingUrl,
    });
}
