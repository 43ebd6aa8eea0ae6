import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { loadGmoCredentials, maskCredentials, validateCredentials } from "./ExchangeCredentials";
import {
    ExchangeError,
    ExchangeErrorCode,
    createExchangeError,
    isDefiniteRejection,
    isRetryableError
} from "./ExchangeError";

const KEY = "test-key-0123456789";
const SECRET = "test-secret-0123456789";

describe("GMO credentials", () => {
    it("loads trimmed values from the environment", () => {
        assert.deepEqual(
            loadGmoCredentials({ GMO_API_KEY: ` ${KEY} `, GMO_API_SECRET: SECRET }),
            { exchange: "gmo", apiKey: KEY, secretKey: SECRET }
        );
        assert.equal(loadGmoCredentials({ GMO_API_KEY: KEY }), null);
        assert.equal(loadGmoCredentials({ GMO_API_KEY: "  ", GMO_API_SECRET: SECRET }), null);
    });

    it("accepts well-formed credentials", () => {
        assert.deepEqual(validateCredentials({ exchange: "gmo", apiKey: KEY, secretKey: SECRET }), { valid: true, errors: [] });
    });

    it("reports template, short, whitespace and duplicate values", () => {
        assert.deepEqual(
            validateCredentials({ exchange: "gmo", apiKey: "your_api_key", secretKey: "short" }).errors,
            ["GMO_API_KEY still holds the template value", "GMO_API_SECRET is shorter than 16 characters"]
        );
        assert.deepEqual(
            validateCredentials({ exchange: "gmo", apiKey: "test key 0123456789", secretKey: SECRET }).errors,
            ["GMO_API_KEY contains whitespace"]
        );
        assert.deepEqual(
            validateCredentials({ exchange: "gmo", apiKey: SECRET, secretKey: SECRET }),
            { valid: false, errors: ["GMO_API_KEY and GMO_API_SECRET are identical"] }
        );
    });

    it("masks everything but the key's tail", () => {
        assert.deepEqual(maskCredentials({ exchange: "gmo", apiKey: KEY, secretKey: SECRET }), { exchange: "gmo", apiKey: "****6789" });
        assert.deepEqual(maskCredentials({ exchange: "gmo", apiKey: "abc", secretKey: SECRET }), { exchange: "gmo", apiKey: "****" });
    });
});

describe("exchange error traits", () => {
    it("separates transient failures from definite rejections", () => {
        assert.equal(isRetryableError(ExchangeErrorCode.TIMEOUT), true);
        assert.equal(isDefiniteRejection(ExchangeErrorCode.TIMEOUT), false);
        assert.equal(isRetryableError(ExchangeErrorCode.INSUFFICIENT_MARGIN), false);
        assert.equal(isDefiniteRejection(ExchangeErrorCode.INSUFFICIENT_MARGIN), true);
        assert.equal(isRetryableError(ExchangeErrorCode.RATE_LIMIT_EXCEEDED), true);
        assert.equal(isDefiniteRejection(ExchangeErrorCode.RATE_LIMIT_EXCEEDED), true);
        assert.equal(isRetryableError(ExchangeErrorCode.MALFORMED_RESPONSE), false);
        assert.equal(isDefiniteRejection(ExchangeErrorCode.MALFORMED_RESPONSE), false);
    });

    it("classifies transport failures", () => {
        const refused = createExchangeError("gmo", new Error("connect ECONNREFUSED 127.0.0.1:443"), ExchangeErrorCode.UNKNOWN, () => 42);
        assert.equal(refused.code, ExchangeErrorCode.NETWORK_ERROR);
        assert.equal(refused.message, "gmo: connect ECONNREFUSED 127.0.0.1:443");
        assert.equal(refused.timestamp, 42);
        assert.equal(refused.retryable, true);

        assert.equal(createExchangeError("gmo", new Error("socket timeout")).code, ExchangeErrorCode.TIMEOUT);
        assert.equal(createExchangeError("gmo", new TypeError("fetch failed")).code, ExchangeErrorCode.NETWORK_ERROR);

        const odd = createExchangeError("gmo", "weird");
        assert.equal(odd.code, ExchangeErrorCode.UNKNOWN);
        assert.equal(odd.retryable, false);
    });

    it("passes an ExchangeError through unchanged", () => {
        const original = new ExchangeError({
            code: ExchangeErrorCode.MARKET_CLOSED,
            message: "closed",
            exchange: "gmo",
            timestamp: 0,
            retryable: false
        });
        assert.equal(createExchangeError("gmo", original), original);
    });
});
