import { NextFunction, Request, RequestHandler, Response } from 'express';
import jwt from 'jsonwebtoken';

export interface AuthUser {
    id: string;
    email: string | null;
    role: string;
}

/**
 * Bearer-JWT guard. The verified user is left on res.locals.user.
 * Without a secret every request passes through.
 */
export function createAuthMiddleware(secret: string | undefined): RequestHandler {
    if (!secret) {
        return (_req: Request, _res: Response, next: NextFunction) => next();
    }

    return (req: Request, res: Response, next: NextFunction) => {
        const authHeader = req.headers.authorization;
        if (!authHeader || !authHeader.startsWith('Bearer ')) {
            console.warn(`[AuthMiddleware] Unauthorized access attempt to ${req.originalUrl}`);
            res.status(401).json({ error: 'Unauthorized. Missing or invalid Authorization header.' });
            return;
        }

        const token = authHeader.slice('Bearer '.length).trim();

        try {
            const decoded = jwt.verify(token, secret);
            if (typeof decoded === 'string') {
                res.status(403).json({ error: 'Forbidden. Unexpected token payload.' });
                return;
            }

            const id = typeof decoded.id === 'string' ? decoded.id : decoded.sub;
            if (!id) {
                res.status(403).json({ error: 'Forbidden. Token has no subject.' });
                return;
            }

            const user: AuthUser = {
                id,
                email: typeof decoded.email === 'string' ? decoded.email : null,
                role: typeof decoded.role === 'string' ? decoded.role : 'user'
            };
            res.locals.user = user;
            next();
        } catch (error: unknown) {
            console.warn(`[AuthMiddleware] Verification failed: ${error instanceof Error ? error.message : String(error)}`);
            res.status(403).json({ error: 'Forbidden. Invalid or expired token.' });
        }
    };
}
