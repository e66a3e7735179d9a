import { isObject } from "src/utils/guards";

export class ScrapeError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ScrapeError";
    }
}

export const errorMessage = (error: unknown) => {
    if (error instanceof Error) return error.message;
    return isObject(error) && typeof error.message === "string" ? error.message : String(error);
};

export const isFileNotFound = (error: unknown) => {
    return isObject(error) && error.code === "ENOENT";
};
