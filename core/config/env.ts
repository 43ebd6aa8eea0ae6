import path from "path";
import fs from "fs";
import dotenv from "dotenv";

// Paths in settings are resolved against the working directory
export const REPO_ROOT = process.cwd();

export const DEFAULT_ENV_PATH = path.resolve(REPO_ROOT, ".env");
export const DEFAULT_SETTINGS_PATH = path.resolve(REPO_ROOT, "config/settings.json");

/**
 * Load environment variables from the repo root .env (if present).
 * Variables already set in the process environment win.
 */
export function loadEnv(envPath: string = process.env.ENV_PATH || DEFAULT_ENV_PATH): void {
    if (fs.existsSync(envPath)) {
        dotenv.config({ path: envPath });
        console.log(`[CONFIG] Loaded .env from: ${envPath}`);
    } else {
        console.log(`[CONFIG] No .env found at: ${envPath}`);
    }
}

export function resolveSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
    return env.SETTINGS_PATH ? path.resolve(REPO_ROOT, env.SETTINGS_PATH) : DEFAULT_SETTINGS_PATH;
}

export function resolveRepoPath(p: string): string {
    return path.isAbsolute(p) ? p : path.resolve(REPO_ROOT, p);
}
