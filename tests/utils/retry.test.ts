import { AxiosError, AxiosHeaders } from "axios";
import { isRetryableFetchError, isTransientError, withRetries } from "src/utils/retry";

const responseError = (status: number) =>
    new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_RESPONSE", undefined, undefined, {
        data: null,
        status,
        statusText: "",
        headers: {},
        config: { headers: new AxiosHeaders() },
    });

describe("isTransientError", () => {
    test("retries network failures, rate limits and server errors", () => {
        expect(isTransientError(new AxiosError("socket hang up", "ECONNRESET"))).toBe(true);
        expect(isTransientError(responseError(429))).toBe(true);
        expect(isTransientError(responseError(503))).toBe(true);
    });

    test("does not retry client errors or non-HTTP failures", () => {
        expect(isTransientError(responseError(404))).toBe(false);
        expect(isTransientError(new Error("boom"))).toBe(false);
    });
});

describe("isRetryableFetchError", () => {
    test("also retries a forbidden listings page", () => {
        expect(isRetryableFetchError(responseError(403))).toBe(true);
        expect(isRetryableFetchError(responseError(503))).toBe(true);
        expect(isRetryableFetchError(responseError(404))).toBe(false);
        expect(isRetryableFetchError(new Error("boom"))).toBe(false);
    });
});

describe("withRetries", () => {
    test("returns once an attempt succeeds", async () => {
        const task = jest
            .fn<Promise<string>, []>()
            .mockRejectedValueOnce(new Error("first"))
            .mockRejectedValueOnce(new Error("second"))
            .mockResolvedValue("ok");

        await expect(withRetries(task, { delayMs: 0, shouldRetry: () => true })).resolves.toBe("ok");
        expect(task).toHaveBeenCalledTimes(3);
    });

    test("gives up after the last attempt", async () => {
        const task = jest.fn<Promise<string>, []>().mockRejectedValue(new Error("down"));

        await expect(withRetries(task, { attempts: 2, delayMs: 0, shouldRetry: () => true })).rejects.toThrow("down");
        expect(task).toHaveBeenCalledTimes(2);
    });

    test("does not retry errors that are not transient", async () => {
        const task = jest.fn<Promise<string>, []>().mockRejectedValue(new Error("bad request"));

        await expect(withRetries(task, { delayMs: 0 })).rejects.toThrow("bad request");
        expect(task).toHaveBeenCalledTimes(1);
    });
});
