/**
 * GMO Coin FX API Request Signer
 *
 * Implements HMAC-SHA256 signature generation for private endpoints.
 * GMO requires:
 * - API-KEY header
 * - API-TIMESTAMP header (Unix ms)
 * - API-SIGN header: HMAC-SHA256(secret, timestamp + method + path + body)
 *
 * The signed path excludes the base URL prefix and the query string.
 */

import crypto from "node:crypto";

export class GmoSigner {
    readonly #apiKey: string;
    readonly #secretKey: string;

    constructor(apiKey: string, secretKey: string) {
        this.#apiKey = apiKey;
        this.#secretKey = secretKey;
    }

    get apiKey(): string {
        return this.#apiKey;
    }

    sign(timestamp: number, method: "GET" | "POST", path: string, body: string = ""): string {
        const preSign = `${timestamp}${method}${path}${body}`;
        return crypto
            .createHmac("sha256", this.#secretKey)
            .update(preSign)
            .digest("hex");
    }

    /**
     * Build query string from parameters.
     */
    buildQueryString(params: Record<string, string | number | undefined>): string {
        const entries: string[] = [];

        for (const [key, value] of Object.entries(params)) {
            if (value !== undefined) {
                entries.push(`${key}=${encodeURIComponent(String(value))}`);
            }
        }

        return entries.join("&");
    }

    getHeaders(timestamp: number, signature: string, withBody: boolean): Record<string, string> {
        const headers: Record<string, string> = {
            "API-KEY": this.#apiKey,
            "API-TIMESTAMP": String(timestamp),
            "API-SIGN": signature
        };
        if (withBody) {
            headers["Content-Type"] = "application/json";
        }
        return headers;
    }

    signGetRequest(
        baseUrl: string,
        path: string,
        params: Record<string, string | number | undefined>,
        timestamp: number = Date.now()
    ): { url: string; headers: Record<string, string> } {
        const queryString = this.buildQueryString(params);
        const signature = this.sign(timestamp, "GET", path);

        return {
            url: `${baseUrl}${path}${queryString ? `?${queryString}` : ""}`,
            headers: this.getHeaders(timestamp, signature, false)
        };
    }

    signPostRequest(
        path: string,
        body: object,
        timestamp: number = Date.now()
    ): { body: string; headers: Record<string, string> } {
        const bodyString = JSON.stringify(body);
        const signature = this.sign(timestamp, "POST", path, bodyString);

        return {
            body: bodyString,
            headers: this.getHeaders(timestamp, signature, true)
        };
    }
}
