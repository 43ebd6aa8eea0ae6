import { Router } from 'express';
import { ObserverDeps } from '../types';

const MAX_LIMIT = 1000;

export function auditRoutes(deps: ObserverDeps): Router {
    const router = Router();

    // GET /audit?limit=N
    router.get('/', async (req, res) => {
        const raw = typeof req.query.limit === 'string' ? req.query.limit : '100';
        if (!/^\d+$/.test(raw)) {
            return res.status(400).json({ error: 'INVALID_LIMIT', message: 'limit must be a positive integer' });
        }
        const limit = Math.min(Math.max(Number(raw), 1), MAX_LIMIT);

        try {
            const records = await deps.audit.readRecent(limit);
            res.locals.resultCount = records.length;
            return res.json({ count: records.length, records });
        } catch (err) {
            console.error('[Observer] Audit read failed:', err);
            return res.status(500).json({ error: 'AUDIT_UNAVAILABLE' });
        }
    });

    return router;
}
