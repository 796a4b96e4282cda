import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ApiKeyRegistry, maskKey, ownerIdForKey } from '../../application/ApiKeyRegistry';
import { UnauthorizedError, asyncHandler } from './errorHandler';

/**
 * Requires `Authorization: Bearer <api key>` and stores the caller's owner id
 * in `res.locals.ownerId`.
 */
export function requireApiKey(registry: ApiKeyRegistry): RequestHandler {
    return asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
        const header = req.headers.authorization;
        if (!header || !/^Bearer\s+/i.test(header)) {
            res.setHeader('WWW-Authenticate', 'Bearer');
            throw new UnauthorizedError('Missing authorization header');
        }

        const apiKey = header.replace(/^Bearer\s+/i, '').trim();
        if (!(await registry.isValid(apiKey))) {
            console.warn(`[Auth] Invalid API key attempted: ${maskKey(apiKey)}`);
            res.setHeader('WWW-Authenticate', 'Bearer');
            throw new UnauthorizedError('Invalid API key');
        }

        res.locals.ownerId = ownerIdForKey(apiKey);
        next();
    });
}

/**
 * Owner id set by `requireApiKey`.
 */
export function getOwnerId(res: Response): string {
    const ownerId: unknown = res.locals.ownerId;
    if (typeof ownerId !== 'string' || !ownerId) {
        throw new UnauthorizedError('Request is not authenticated');
    }
    return ownerId;
}
