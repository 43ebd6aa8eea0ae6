/**
 * Venue API credentials. Read from the environment only; the settings
 * file never holds secrets.
 */

export interface ExchangeCredentials {
    readonly exchange: string;
    readonly apiKey: string;
    readonly secretKey: string;
}

export interface CredentialValidationResult {
    readonly valid: boolean;
    readonly errors: string[];
}

export const GMO_KEY_ENV = "GMO_API_KEY";
export const GMO_SECRET_ENV = "GMO_API_SECRET";

const MIN_LENGTH = 16;
const TEMPLATE_VALUES = /^(changeme|your[_-].*|x+|\.\.\.|<.*>)$/i;

export function loadGmoCredentials(env: NodeJS.ProcessEnv = process.env): ExchangeCredentials | null {
    const apiKey = env[GMO_KEY_ENV]?.trim();
    const secretKey = env[GMO_SECRET_ENV]?.trim();
    if (!apiKey || !secretKey) return null;
    return { exchange: "gmo", apiKey, secretKey };
}

/**
 * Shape check only; a well-formed key can still be revoked.
 */
export function validateCredentials(creds: ExchangeCredentials): CredentialValidationResult {
    const errors: string[] = [];
    const fields: Array<[string, string]> = [
        [GMO_KEY_ENV, creds.apiKey],
        [GMO_SECRET_ENV, creds.secretKey]
    ];

    for (const [name, value] of fields) {
        if (TEMPLATE_VALUES.test(value)) {
            errors.push(`${name} still holds the template value`);
        } else if (value.length < MIN_LENGTH) {
            errors.push(`${name} is shorter than ${MIN_LENGTH} characters`);
        } else if (/\s/.test(value)) {
            errors.push(`${name} contains whitespace`);
        }
    }
    if (creds.apiKey === creds.secretKey) {
        errors.push(`${GMO_KEY_ENV} and ${GMO_SECRET_ENV} are identical`);
    }

    return { valid: errors.length === 0, errors };
}

/** Loggable view: the secret is dropped and the key reduced to its tail. */
export function maskCredentials(creds: ExchangeCredentials): { exchange: string; apiKey: string } {
    const tail = creds.apiKey.length >= MIN_LENGTH ? creds.apiKey.slice(-4) : "";
    return { exchange: creds.exchange, apiKey: `****${tail}` };
}
