/**
 * SafetyReasonCode — every Hold / ForceClose carries one.
 */

export enum SafetyReasonCode {
    /** Config flag and env flag are not both set */
    NOT_ARMED = "NOT_ARMED",

    /** An open position already exists */
    POSITION_CAP = "POSITION_CAP",

    /** Margin ratio below the configured floor */
    MARGIN_KILL = "MARGIN_KILL",

    /** Operator or environment kill signal */
    EXTERNAL_KILL = "EXTERNAL_KILL",

    /** Entries blocked after a margin kill */
    KILL_COOLDOWN = "KILL_COOLDOWN",

    /** Proposal failed validation */
    INVALID_PROPOSAL = "INVALID_PROPOSAL",

    /** Oracle itself proposed HOLD */
    PROPOSAL_HOLD = "PROPOSAL_HOLD",

    /** EXIT proposed while flat */
    NO_POSITION = "NO_POSITION",

    /** Oracle timed out or failed */
    ORACLE_UNAVAILABLE = "ORACLE_UNAVAILABLE",

    /** Oracle throttled by aiIntervalMinutes */
    AI_INTERVAL = "AI_INTERVAL",

    /** Venue reports the market is not open */
    MARKET_CLOSED = "MARKET_CLOSED",

    /** Coordinator is HALTED */
    HALTED = "HALTED",

    /** Manual stop requested */
    STOPPED = "STOPPED",

    /** Computed order size rounds to zero lots */
    ZERO_SIZE = "ZERO_SIZE",

    /** Snapshot or quote could not be read */
    MARKET_DATA_UNAVAILABLE = "MARKET_DATA_UNAVAILABLE"
}
