import { AutoRouter, cors } from 'itty-router';
import { router as userRouter } from './handlers/user';
import { router as submissionRouter } from './handlers/submission';
import { router as documentRouter } from './handlers/document';
import { router as commentRouter } from './handlers/comment';
import { router as workingGroupRouter } from './handlers/workingGroup';
import { Env } from './utils/sessionManager';
import { errorResponse } from './errors';
import { GovernanceRequest } from './types';
import { logger } from './utils/logger';

export function createRouter(allowedOrigins: string[]) {
    const { preflight, corsify } = cors({
        origin: allowedOrigins,
        allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
        allowHeaders: [
            'Content-Type',
            'Authorization',
            'X-Requested-With',
            'Accept',
            'Origin'
        ],
        credentials: true,
        maxAge: 84600,
    });

    const router = AutoRouter<GovernanceRequest, [Env]>({
        before: [preflight],
        catch: errorResponse,
        finally: [corsify]
    });

    router
        .get('/api', () => new Response('API is running'))
        .all('/api/users/*', userRouter.fetch) // Handle all user routes
        .all('/api/submissions/*', submissionRouter.fetch) // Handle all submission routes
        .all('/api/documents/*', documentRouter.fetch) // Handle all document, follow and comment-listing routes
        .all('/api/comments/*', commentRouter.fetch) // Handle edits, deletes and likes on single comments
        .all('/api/groups/*', workingGroupRouter.fetch) // Handle the working group registry
        .all('*', (request: GovernanceRequest) => {
            logger.debug('Unmatched request in main router:', request.url);
            return new Response('Not Found', { status: 404 });
        });

    return router;
}
