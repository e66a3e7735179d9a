import axios from "axios";
import { errorMessage } from "src/utils/errors";
import { customLogger, errorLogger } from "src/utils/logger";
import { sleep, withRetries } from "src/utils/retry";
import { availableScoreSources, computeCompositeScore } from "src/utils/score";
import { ScoreRecord, Showing } from "src/utils/types";

export const OMDB_BASE_URL = "https://www.omdbapi.com/";
export const NOT_FOUND_RETRY_DAYS = 3;

interface OmdbRating {
    Source: string;
    Value: string;
}

export interface OmdbResponse {
    Response: "True" | "False";
    Error?: string;
    Title?: string;
    Year?: string;
    imdbID?: string;
    imdbRating?: string;
    Metascore?: string;
    Ratings?: OmdbRating[];
}

export interface CollectScoresOptions {
    apiKey: string;
    forceRefresh?: boolean;
    limit?: number | null;
    requestDelayMs?: number;
    now?: Date;
}

export interface CollectScoresResult {
    scores: Map<string, ScoreRecord>;
    fetched: number;
    reused: number;
    failed: number;
}

const parseScore = (value: string | undefined, max: number): number | null => {
    if (!value || value === "N/A") return null;
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) && parsed >= 0 && parsed <= max ? parsed : null;
};

const findRating = (ratings: OmdbRating[], source: string) => {
    return ratings.find((rating) => rating.Source.includes(source))?.Value;
};

export const emptyScoreRecord = (title: string, now: Date = new Date()): ScoreRecord => ({
    title,
    found: false,
    rottenTomatoes: null,
    metacritic: null,
    imdb: null,
    compositeScore: null,
    availableScores: [],
    omdbTitle: "",
    omdbYear: "",
    imdbId: "",
    fetchedAt: now.toISOString(),
});

export const parseOmdbResponse = (title: string, data: OmdbResponse, now: Date = new Date()): ScoreRecord => {
    if (data.Response !== "True") {
        return emptyScoreRecord(title, now);
    }

    const ratings = Array.isArray(data.Ratings) ? data.Ratings : [];
    const rottenTomatoes = parseScore(findRating(ratings, "Rotten Tomatoes")?.replace("%", ""), 100);
    const metacritic = parseScore(findRating(ratings, "Metacritic")?.split("/")[0], 100) ?? parseScore(data.Metascore, 100);
    const imdb = parseScore(data.imdbRating, 10);
    const sources = { rottenTomatoes, metacritic, imdb };

    return {
        title,
        found: true,
        rottenTomatoes,
        metacritic,
        imdb,
        compositeScore: computeCompositeScore(sources),
        availableScores: availableScoreSources(sources),
        omdbTitle: data.Title ?? "",
        omdbYear: data.Year ?? "",
        imdbId: data.imdbID ?? "",
        fetchedAt: now.toISOString(),
    };
};

export const fetchOmdbScores = async (title: string, apiKey: string, now: Date = new Date()) => {
    const response = await withRetries(
        () =>
            axios.get<OmdbResponse>(OMDB_BASE_URL, {
                params: { apikey: apiKey, t: title, type: "movie" },
                timeout: 10000,
            }),
        { label: `OMDb lookup for "${title}"` }
    );
    if (response.status !== 200) {
        throw new Error(`OMDb returned ${response.status}`);
    }

    const data = response.data;
    if (data.Response === "False" && /api key|limit/i.test(data.Error ?? "")) {
        throw new Error(`OMDb refused the request: ${data.Error}`);
    }
    return parseOmdbResponse(title, data, now);
};

/** Misses are looked up again once they are a few days old; films appear in OMDb late. */
const isStale = (record: ScoreRecord, now: Date) => {
    if (record.found) return false;
    const fetchedAt = Date.parse(record.fetchedAt);
    if (Number.isNaN(fetchedAt)) return true;
    return now.getTime() - fetchedAt > NOT_FOUND_RETRY_DAYS * 24 * 60 * 60 * 1000;
};

const summarize = (record: ScoreRecord) => {
    if (!record.found) return "not found";
    const parts = [
        record.rottenTomatoes !== null && `RT: ${record.rottenTomatoes}`,
        record.metacritic !== null && `MC: ${record.metacritic}`,
        record.imdb !== null && `IMDb: ${record.imdb}`,
    ].filter((part) => part !== false);
    const composite = record.compositeScore === null ? "no score" : `composite ${record.compositeScore}`;
    return `'${record.omdbTitle}' (${record.omdbYear}) ${parts.join(", ")} - ${composite}`;
};

export const collectScores = async (
    titles: string[],
    cache: Record<string, ScoreRecord>,
    options: CollectScoresOptions
): Promise<CollectScoresResult> => {
    const now = options.now ?? new Date();
    const cached = new Map(Object.entries(cache));
    const scores = new Map(cached);

    const unique = Array.from(new Set(titles.filter((title) => title.trim().length > 0))).sort();
    const selected = options.limit ? unique.slice(0, options.limit) : unique;
    if (options.limit) {
        customLogger(`Limited to the first ${selected.length} of ${unique.length} titles`);
    }

    let fetched = 0;
    let reused = 0;
    let failed = 0;
    let requests = 0;

    for (const [index, title] of selected.entries()) {
        const prefix = `[${index + 1}/${selected.length}] ${title}`;
        const previous = cached.get(title);
        if (previous && !options.forceRefresh && !isStale(previous, now)) {
            customLogger(`${prefix}: using cached scores`);
            reused++;
            continue;
        }

        if (requests > 0 && options.requestDelayMs) {
            await sleep(options.requestDelayMs);
        }
        requests++;

        try {
            const record = await fetchOmdbScores(title, options.apiKey, now);
            scores.set(title, record);
            customLogger(`${prefix}: ${summarize(record)}`);
            fetched++;
        } catch (error) {
            errorLogger(`${prefix}: lookup failed, skipping (${errorMessage(error)})`);
            failed++;
        }
    }

    return { scores, fetched, reused, failed };
};

export const attachScores = (showings: Showing[], scores: Map<string, ScoreRecord>): Showing[] => {
    return showings.map((showing) => {
        const { scores: _previous, ...rest } = showing;
        const record = scores.get(showing.title);
        return record ? { ...rest, scores: record } : rest;
    });
};
