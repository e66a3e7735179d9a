import axios from "axios";
import { errorMessage } from "src/utils/errors";
import { warnLogger } from "src/utils/logger";

export const MAX_ATTEMPTS = 3;
export const RETRY_DELAY_MS = 1000;

export interface RetryOptions {
    attempts?: number;
    delayMs?: number;
    label?: string;
    shouldRetry?: (error: unknown) => boolean;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const responseStatus = (error: unknown) => (axios.isAxiosError(error) ? error.response?.status : undefined);

export const isTransientError = (error: unknown) => {
    if (!axios.isAxiosError(error)) return false;
    const status = responseStatus(error);
    if (status === undefined) return true;
    return status === 429 || status >= 500;
};

export const isRetryableFetchError = (error: unknown) => isTransientError(error) || responseStatus(error) === 403;

export const withRetries = async <T>(task: () => Promise<T>, options: RetryOptions = {}): Promise<T> => {
    const attempts = options.attempts ?? MAX_ATTEMPTS;
    const delayMs = options.delayMs ?? RETRY_DELAY_MS;
    const shouldRetry = options.shouldRetry ?? isTransientError;

    for (let attempt = 1; ; attempt++) {
        try {
            return await task();
        } catch (error) {
            if (attempt >= attempts || !shouldRetry(error)) throw error;
            warnLogger(`${options.label ?? "Request"} failed (${errorMessage(error)}). Retrying... Attempt ${attempt}/${attempts - 1}`);
            await sleep(delayMs * attempt);
        }
    }
};
