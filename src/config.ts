import "dotenv/config";

export const DEFAULT_CINEMA_URL = "https://sheffield.thelight.co.uk/cinema/guide";
export const DEFAULT_CINEMA_NAME = "The Light Cinema Sheffield";
export const DEFAULT_CINEMA_LOCATION = "The Light Cinema Sheffield, The Moor, Sheffield S1 4PF, UK";
export const DEFAULT_OUTPUT_FILE = "cinema-times.json";
export const DEFAULT_ICAL_FILE = "cinema-times.ics";
export const DEFAULT_HTML_FILE = "index.html";
export const DEFAULT_REQUEST_DELAY_MS = 1000;

export interface AppConfig {
    cinemaUrl: string;
    cinemaName: string;
    cinemaLocation: string | null;
    outputFile: string;
    icalFile: string | null;
    htmlFile: string | null;
    apiKey: string | null;
    skipScores: boolean;
    forceRefresh: boolean;
    limit: number | null;
    requestDelayMs: number;
}

type Env = Record<string, string | undefined>;

const nonEmpty = (value: string | undefined) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
};

const parseDelay = (value: string | undefined) => {
    const parsed = Number(value);
    return value !== undefined && Number.isInteger(parsed) && parsed >= 0 ? parsed : DEFAULT_REQUEST_DELAY_MS;
};

export const loadConfig = (overrides: Partial<AppConfig> = {}, env: Env = process.env): AppConfig => {
    const cinemaName = overrides.cinemaName ?? nonEmpty(env.CINEMA_NAME) ?? DEFAULT_CINEMA_NAME;
    const defaultLocation = cinemaName === DEFAULT_CINEMA_NAME ? DEFAULT_CINEMA_LOCATION : null;

    return {
        cinemaUrl: overrides.cinemaUrl ?? nonEmpty(env.CINEMA_URL) ?? DEFAULT_CINEMA_URL,
        cinemaName,
        cinemaLocation: overrides.cinemaLocation ?? nonEmpty(env.CINEMA_LOCATION) ?? defaultLocation,
        outputFile: overrides.outputFile ?? nonEmpty(env.OUTPUT_FILE) ?? DEFAULT_OUTPUT_FILE,
        icalFile: overrides.icalFile !== undefined ? overrides.icalFile : nonEmpty(env.ICAL_FILE),
        htmlFile: overrides.htmlFile !== undefined ? overrides.htmlFile : nonEmpty(env.HTML_FILE),
        apiKey: overrides.apiKey ?? nonEmpty(env.OMDB_API_KEY),
        skipScores: overrides.skipScores ?? false,
        forceRefresh: overrides.forceRefresh ?? false,
        limit: overrides.limit ?? null,
        requestDelayMs: overrides.requestDelayMs ?? parseDelay(env.OMDB_REQUEST_DELAY_MS),
    };
};
