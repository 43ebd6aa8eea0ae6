import { Router, Request } from 'express';
import { errorMessage } from '../../domain/failures';
import { ObserverDeps } from '../types';

function bodyString(req: Request, key: string): string | null {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || !(key in body)) return null;
    const value: unknown = Reflect.get(body, key);
    return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

export function controlRoutes(deps: ObserverDeps): Router {
    const router = Router();

    // POST /v1/reconcile {operator}
    router.post('/reconcile', async (req, res) => {
        const operator = bodyString(req, 'operator');
        if (!operator) {
            return res.status(400).json({ error: 'OPERATOR_REQUIRED' });
        }
        if (deps.coordinator.state !== 'HALTED') {
            return res.status(409).json({ error: 'NOT_HALTED', state: deps.coordinator.state });
        }

        try {
            const report = await deps.coordinator.reconcile(operator);
            return res.json({
                state: deps.coordinator.state,
                verdict: report.verdict,
                positions: report.exchangePositions,
                position: deps.coordinator.position
            });
        } catch (err) {
            console.error(`[Observer] Reconcile by ${operator} failed:`, err);
            return res.status(502).json({ error: 'RECONCILE_FAILED', message: errorMessage(err) });
        }
    });

    // POST /v1/kill {reason}
    router.post('/kill', (req, res) => {
        const reason = bodyString(req, 'reason') ?? 'operator kill';
        deps.killSignal.engage(reason);
        return res.json({ killed: true, reason });
    });

    // DELETE /v1/kill
    router.delete('/kill', (req, res) => {
        deps.killSignal.clear();
        const current = deps.killSignal.evaluate();
        // The environment kill cannot be cleared from here
        return res.json({ killed: current.killed, reason: current.killed ? current.reason : null });
    });

    // POST /v1/stop
    router.post('/stop', async (req, res) => {
        const by = bodyString(req, 'operator') ?? 'operator';
        try {
            await deps.coordinator.requestStop(by);
            return res.json({ stopRequested: true });
        } catch (err) {
            console.error('[Observer] Stop request failed:', err);
            return res.status(500).json({ error: 'STOP_FAILED', message: errorMessage(err) });
        }
    });

    // POST /v1/resume
    router.post('/resume', async (req, res) => {
        const by = bodyString(req, 'operator') ?? 'operator';
        try {
            await deps.coordinator.resume(by);
            return res.json({ stopRequested: false });
        } catch (err) {
            console.error('[Observer] Resume request failed:', err);
            return res.status(500).json({ error: 'RESUME_FAILED', message: errorMessage(err) });
        }
    });

    return router;
}
