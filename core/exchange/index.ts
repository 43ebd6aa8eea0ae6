/**
 * Exchange Module - Public Exports
 */

// Base adapter types
export { ExchangeAdapter } from "./adapters/base/ExchangeAdapter";
export type {
    Ticker,
    AccountAssets,
    ExchangePosition,
    MarketOrderParams,
    ClosePositionParams,
    OrderAck,
    ExecutionFill,
    MarketStatus,
    OrderSide
} from "./adapters/base/ExchangeAdapter";

export {
    loadGmoCredentials,
    validateCredentials,
    maskCredentials
} from "./adapters/base/ExchangeCredentials";
export type { ExchangeCredentials } from "./adapters/base/ExchangeCredentials";

export {
    ExchangeError,
    ExchangeErrorCode,
    createExchangeError,
    isRetryableError,
    isDefiniteRejection
} from "./adapters/base/ExchangeError";
export type { ExchangeErrorDetail } from "./adapters/base/ExchangeError";

// GMO FX adapter
export { GmoFxAdapter } from "./adapters/gmo/GmoFxAdapter";
export type { GmoFxAdapterOptions } from "./adapters/gmo/GmoFxAdapter";
export { GmoSigner } from "./adapters/gmo/GmoSigner";

// Paper adapter
export { PaperFxAdapter } from "./adapters/paper/PaperFxAdapter";

// Rate limiting
export { TokenBucket, SYSTEM_CLOCK } from "./ratelimit/TokenBucket";
export type { TokenBucketConfig, TokenBucketClock } from "./ratelimit/TokenBucket";
export { withReadRetry, computeBackoffDelay, DEFAULT_BACKOFF_POLICY } from "./ratelimit/backoff";
export type { BackoffPolicy } from "./ratelimit/backoff";

// Gateway
export { ExchangeGateway } from "./gateway/ExchangeGateway";
export type { GatewayConfig, GatewayDeps } from "./gateway/ExchangeGateway";

// Reconciliation
export { PositionReconciler } from "./reconciliation/PositionReconciler";
export {
    createReconciliationReport,
    formatReportSummary,
    classifyPositions
} from "./reconciliation/ReconciliationReport";
export type { ReconciliationReport, ExchangeVerdict } from "./reconciliation/ReconciliationReport";

// Monitoring
export { ExchangeHealthMonitor } from "./monitoring/ExchangeHealthMonitor";
export type { HealthStatus, HealthMonitorConfig } from "./monitoring/ExchangeHealthMonitor";
