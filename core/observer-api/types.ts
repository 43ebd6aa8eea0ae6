import { AuditLog } from '../audit/AuditLog';
import { ExchangeHealthMonitor } from '../exchange/monitoring/ExchangeHealthMonitor';
import { ExecutionCoordinator } from '../execution/ExecutionCoordinator';
import { ExternalKillSignal } from '../safety/kill_switch';
import { SafetyInterlock } from '../safety/SafetyInterlock';

export interface ObserverDeps {
    readonly pair: string;
    readonly coordinator: ExecutionCoordinator;
    readonly interlock: SafetyInterlock;
    readonly killSignal: ExternalKillSignal;
    readonly audit: AuditLog;
    readonly health?: ExchangeHealthMonitor | null;
    /** Bearer token for /v1; empty disables every /v1 route */
    readonly token: string;
}
