import { Router, Request, Response, NextFunction } from 'express';
import { SeatAlertBot } from '../../application/SeatAlertBot';
import { asyncHandler, UnauthorizedError } from '../middleware/errorHandler';

export const ADMIN_TOKEN_HEADER = 'x-admin-token';

/**
 * Rejects requests without the admin token. With no token configured the
 * routes are open, for local use.
 */
export function requireAdminToken(expected: string) {
    return (req: Request, _res: Response, next: NextFunction): void => {
        if (expected && req.get(ADMIN_TOKEN_HEADER) !== expected) {
            next(new UnauthorizedError('Missing or invalid admin token'));
            return;
        }
        next();
    };
}

/**
 * Creates the operator routes with dependency injection. Mounted under /admin.
 */
export function createAdminRoutes(bot: SeatAlertBot, adminApiToken: string): Router {
    const router = Router();
    router.use(requireAdminToken(adminApiToken));

    /**
     * POST /admin/test-connection
     *
     * Sends the test message to the admin chat.
     */
    router.post(
        '/test-connection',
        asyncHandler(async (_req: Request, res: Response) => {
            const ok = await bot.testConnection();
            res.json({ ok });
        })
    );

    /**
     * GET /admin/stats
     */
    router.get(
        '/stats',
        asyncHandler(async (_req: Request, res: Response) => {
            res.json(await bot.getStats());
        })
    );

    return router;
}
