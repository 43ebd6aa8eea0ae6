import { Router } from 'express';
import { ObserverDeps } from '../types';

export function stateRoutes(deps: ObserverDeps): Router {
    const router = Router();

    // GET /state
    router.get('/', (req, res) => {
        const { coordinator, interlock, killSignal, health } = deps;
        const kill = killSignal.evaluate();
        const cooldownUntil = interlock.cooldownUntil;
        const status = health?.getLastStatus();

        res.json({
            pair: deps.pair,
            state: coordinator.state,
            position: coordinator.position,
            haltReason: coordinator.haltReason,
            stopRequested: coordinator.stopRequested,
            lock: interlock.readLockState(),
            kill: {
                killed: kill.killed,
                reason: kill.killed ? kill.reason : null,
                cooldownUntil: cooldownUntil === null ? null : new Date(cooldownUntil).toISOString()
            },
            exchange: status
                ? {
                    healthy: status.healthy,
                    marketStatus: status.marketStatus ?? null,
                    consecutiveFailures: status.consecutiveFailures,
                    checkedAt: new Date(status.checkedAt).toISOString()
                }
                : null
        });
    });

    return router;
}
