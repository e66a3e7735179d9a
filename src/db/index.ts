import fs from "fs/promises";
import path from "path";
import { parseScoreRecord, parseShowing } from "src/db/schema";
import { errorMessage, isFileNotFound } from "src/utils/errors";
import { isObject } from "src/utils/guards";
import { warnLogger } from "src/utils/logger";
import { ScoreRecord, Showing, ShowingsStore } from "src/utils/types";

export const emptyStore = (cinema = ""): ShowingsStore => ({
    lastUpdated: "",
    cinema,
    showings: [],
    scores: {},
});

export const parseStore = (value: unknown): ShowingsStore | null => {
    if (!isObject(value) || !Array.isArray(value.showings)) return null;

    const showings = value.showings.map(parseShowing).filter((showing): showing is Showing => showing !== null);
    const dropped = value.showings.length - showings.length;
    if (dropped > 0) {
        warnLogger(`Dropped ${dropped} malformed showings from the store`);
    }

    const scores: Record<string, ScoreRecord> = {};
    if (isObject(value.scores)) {
        for (const [title, entry] of Object.entries(value.scores)) {
            const record = parseScoreRecord(entry);
            if (record) scores[title] = record;
        }
    }

    return {
        lastUpdated: typeof value.lastUpdated === "string" ? value.lastUpdated : "",
        cinema: typeof value.cinema === "string" ? value.cinema : "",
        showings,
        scores,
    };
};

export const readStore = async (filePath: string): Promise<ShowingsStore> => {
    let raw: string;
    try {
        raw = await fs.readFile(filePath, "utf-8");
    } catch (error) {
        if (isFileNotFound(error)) return emptyStore();
        throw error;
    }

    try {
        const store = parseStore(JSON.parse(raw));
        if (store) return store;
        warnLogger(`${filePath} does not contain a showings store, starting fresh`);
    } catch (error) {
        warnLogger(`Invalid JSON in ${filePath}, starting fresh:`, errorMessage(error));
    }
    return emptyStore();
};

/** Writes to a temporary sibling and renames it over the target. */
export const writeStore = async (filePath: string, store: ShowingsStore) => {
    const directory = path.dirname(path.resolve(filePath));
    await fs.mkdir(directory, { recursive: true });

    const tempPath = path.join(directory, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);
    try {
        await fs.writeFile(tempPath, `${JSON.stringify(store, null, 2)}\n`, "utf-8");
        await fs.rename(tempPath, filePath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
    }
};

export const buildStore = (
    cinema: string,
    showings: Showing[],
    scores: Map<string, ScoreRecord> | Record<string, ScoreRecord>,
    now: Date = new Date()
): ShowingsStore => {
    const entries = scores instanceof Map ? scores : new Map(Object.entries(scores));
    const titles = new Set(showings.map((showing) => showing.title));

    const kept: Record<string, ScoreRecord> = {};
    for (const title of Array.from(titles).sort()) {
        const record = entries.get(title);
        if (record) kept[title] = record;
    }

    return {
        lastUpdated: now.toISOString(),
        cinema,
        showings,
        scores: kept,
    };
};
