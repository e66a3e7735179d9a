import { AppConfig } from "src/config";
import { buildStore, readStore, writeStore } from "src/db";
import { writeCalendar } from "src/jobs/calendar";
import { attachScores, collectScores } from "src/jobs/scores";
import { scrapeShowings } from "src/jobs/scrape";
import { writeViewer } from "src/jobs/viewer";
import { customLogger, warnLogger } from "src/utils/logger";
import { cleanShowingTitles } from "src/utils/title";
import { ScoreRecord, Showing, ShowingsStore } from "src/utils/types";

export interface RunSummary {
    showings: number;
    titles: number;
    scoredTitles: number;
    fetchedTitles: number;
    failedLookups: number;
    files: string[];
}

type ScoreConfig = Pick<AppConfig, "apiKey" | "skipScores" | "forceRefresh" | "limit" | "requestDelayMs">;

const countScored = (showings: Showing[]) => {
    const titles = new Set(
        showings.filter((showing) => showing.scores?.compositeScore != null).map((showing) => showing.title)
    );
    return titles.size;
};

/** Looks up scores for the showings' titles; a missing key or `skipScores` falls back to cached scores. */
export const scoreShowings = async (showings: Showing[], cache: Record<string, ScoreRecord>, config: ScoreConfig) => {
    const cached = new Map(Object.entries(cache));
    if (config.skipScores) {
        customLogger("Score fetching skipped, using cached scores only");
        return { showings: attachScores(showings, cached), scores: cached, fetched: 0, failed: 0 };
    }
    if (!config.apiKey) {
        warnLogger("No OMDb API key configured (OMDB_API_KEY or --api-key), score fetching disabled");
        return { showings: attachScores(showings, cached), scores: cached, fetched: 0, failed: 0 };
    }

    const result = await collectScores(
        showings.map((showing) => showing.title),
        cache,
        {
            apiKey: config.apiKey,
            forceRefresh: config.forceRefresh,
            limit: config.limit,
            requestDelayMs: config.requestDelayMs,
        }
    );
    return {
        showings: attachScores(showings, result.scores),
        scores: result.scores,
        fetched: result.fetched,
        failed: result.failed,
    };
};

const writeExtras = async (store: ShowingsStore, config: AppConfig) => {
    const files: string[] = [];
    if (config.icalFile && (await writeCalendar(config.icalFile, store.showings, { location: config.cinemaLocation }))) {
        files.push(config.icalFile);
    }
    if (config.htmlFile) {
        await writeViewer(config.htmlFile, store);
        files.push(config.htmlFile);
    }
    return files;
};

export const runPipeline = async (config: AppConfig): Promise<RunSummary> => {
    const startTime = performance.now();

    const scraped = await scrapeShowings({ cinemaUrl: config.cinemaUrl, cinemaName: config.cinemaName });
    const previous = await readStore(config.outputFile);
    const scored = await scoreShowings(scraped, previous.scores, config);

    const store = buildStore(config.cinemaName, scored.showings, scored.scores);
    await writeStore(config.outputFile, store);
    customLogger(`Saved ${store.showings.length} showings to ${config.outputFile}`);

    const files = [config.outputFile, ...(await writeExtras(store, config))];
    customLogger(`Run completed in ${(performance.now() - startTime).toFixed(0)} milliseconds.`);

    return {
        showings: store.showings.length,
        titles: new Set(store.showings.map((showing) => showing.title)).size,
        scoredTitles: countScored(store.showings),
        fetchedTitles: scored.fetched,
        failedLookups: scored.failed,
        files,
    };
};

export const runClean = async (filePath: string) => {
    const store = await readStore(filePath);
    const { showings, changes } = cleanShowingTitles(store.showings);

    for (const change of changes) {
        const tags = change.tags.map((tag) => `${tag.type}: ${tag.text}`).join(", ");
        customLogger(`'${change.rawTitle}' -> '${change.title}'${tags ? ` [${tags}]` : ""} (${change.count} showings)`);
    }

    const updated = buildStore(store.cinema, showings, store.scores);
    await writeStore(filePath, { ...updated, lastUpdated: store.lastUpdated || updated.lastUpdated });
    customLogger(`Cleaned ${changes.length} unique titles in ${filePath}`);
    return changes;
};

export const runScores = async (filePath: string, config: ScoreConfig) => {
    const store = await readStore(filePath);
    if (store.showings.length === 0) {
        warnLogger(`No showings found in ${filePath}`);
        return store;
    }
    const scored = await scoreShowings(store.showings, store.scores, config);
    const updated = buildStore(store.cinema, scored.showings, scored.scores);
    await writeStore(filePath, updated);
    customLogger(`Updated ${countScored(updated.showings)} titles with scores in ${filePath}`);
    return updated;
};

export const runCalendar = async (filePath: string, outputFile: string, location: string | null) => {
    const store = await readStore(filePath);
    return writeCalendar(outputFile, store.showings, { location });
};

export const runViewer = async (filePath: string, outputFile: string) => {
    const store = await readStore(filePath);
    await writeViewer(outputFile, store);
};
