/**
 * Two-factor arming.
 *
 * Factor 1: `enableLiveTrading` in the settings file, re-read from disk on
 *           every check so an operator can disarm without a restart.
 * Factor 2: LIVE_TRADING_ARMED=YES in the process environment.
 *
 * Nothing here is cached; a read failure counts as disarmed.
 */

import fs from "fs";
import { LockState, deriveLockState } from "../domain/types";

export const ARMED_ENV_VAR = "LIVE_TRADING_ARMED";
export const ARMED_ENV_VALUE = "YES";

export type LockStateSource = () => LockState;

export function readEnvFlag(env: NodeJS.ProcessEnv = process.env): boolean {
    return env[ARMED_ENV_VAR] === ARMED_ENV_VALUE;
}

export function readConfigFlag(settingsPath: string): boolean {
    try {
        const raw: unknown = JSON.parse(fs.readFileSync(settingsPath, "utf-8"));
        return typeof raw === "object" && raw !== null && "enableLiveTrading" in raw && raw.enableLiveTrading === true;
    } catch (error) {
        console.warn(
            `[LockState] Cannot read ${settingsPath}, treating as disarmed: ` +
            `${error instanceof Error ? error.message : String(error)}`
        );
        return false;
    }
}

/**
 * Lock state backed by the settings file and the live environment.
 */
export function fileLockStateSource(settingsPath: string, env: NodeJS.ProcessEnv = process.env): LockStateSource {
    return () => deriveLockState(readConfigFlag(settingsPath), readEnvFlag(env));
}

