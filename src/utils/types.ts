export type TitleTagType =
    | "anniversary"
    | "rerelease"
    | "remaster"
    | "language"
    | "version"
    | "collection"
    | "certificate"
    | "format"
    | "note";

export interface TitleTag {
    type: TitleTagType;
    text: string;
}

export type ShowingSource = "guide_data" | "html";

export type ScoreSource = "rottenTomatoes" | "metacritic" | "imdb";

export interface ScoreRecord {
    title: string;
    found: boolean;
    rottenTomatoes: number | null;
    metacritic: number | null;
    /** IMDb user rating on its native 0-10 scale. */
    imdb: number | null;
    compositeScore: number | null;
    availableScores: ScoreSource[];
    omdbTitle: string;
    omdbYear: string;
    imdbId: string;
    fetchedAt: string;
}

export interface Showing {
    cinema: string;
    rawTitle: string;
    title: string;
    titleTags: TitleTag[];
    date: string;
    dateDisplay: string;
    time: string;
    startTime: string;
    screenInfo: string;
    cert: string;
    runtime: string;
    availability: string;
    source: ShowingSource;
    scores?: ScoreRecord;
}

export interface ShowingsStore {
    lastUpdated: string;
    cinema: string;
    showings: Showing[];
    scores: Record<string, ScoreRecord>;
}
