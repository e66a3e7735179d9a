import fs from "fs";
import path from "path";
import { AxiosHeaders, AxiosResponse } from "axios";
import { ScoreRecord, Showing } from "src/utils/types";

export const readFixture = (name: string) => fs.readFileSync(path.join(__dirname, "fixtures", name), "utf-8");

export const axiosResponse = <T>(data: T, status = 200): AxiosResponse<T> => ({
    data,
    status,
    statusText: status === 200 ? "OK" : "",
    headers: {},
    config: { headers: new AxiosHeaders() },
});

export const makeShowing = (overrides: Partial<Showing> = {}): Showing => ({
    cinema: "Test Cinema",
    rawTitle: "Dune: Part Two (12A)",
    title: "Dune: Part Two",
    titleTags: [{ type: "certificate", text: "12A" }],
    date: "2025-10-19",
    dateDisplay: "Sun 19 Oct",
    time: "14:00",
    startTime: "2025-10-19T14:00",
    screenInfo: "2D",
    cert: "12A",
    runtime: "166",
    availability: "available",
    source: "guide_data",
    ...overrides,
});

export const makeScoreRecord = (overrides: Partial<ScoreRecord> = {}): ScoreRecord => ({
    title: "Dune: Part Two",
    found: true,
    rottenTomatoes: 80,
    metacritic: null,
    imdb: 7,
    compositeScore: 77.5,
    availableScores: ["rottenTomatoes", "imdb"],
    omdbTitle: "Dune: Part Two",
    omdbYear: "2024",
    imdbId: "tt0000001",
    fetchedAt: "2025-10-18T08:00:00.000Z",
    ...overrides,
});
