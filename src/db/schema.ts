import { isObject, stringField } from "src/utils/guards";
import { ScoreRecord, ScoreSource, Showing, ShowingSource, TitleTag, TitleTagType } from "src/utils/types";

const TAG_TYPES: readonly TitleTagType[] = [
    "anniversary",
    "rerelease",
    "remaster",
    "language",
    "version",
    "collection",
    "certificate",
    "format",
    "note",
];
const SCORE_SOURCES: readonly ScoreSource[] = ["rottenTomatoes", "metacritic", "imdb"];
const SHOWING_SOURCES: readonly ShowingSource[] = ["guide_data", "html"];

const isOneOf = <T extends string>(values: readonly T[], value: unknown): value is T => {
    return values.some((candidate) => candidate === value);
};

const nullableNumber = (value: unknown) => (typeof value === "number" && Number.isFinite(value) ? value : null);

const parseTitleTag = (value: unknown): TitleTag | null => {
    if (!isObject(value) || typeof value.text !== "string" || !isOneOf(TAG_TYPES, value.type)) return null;
    return { type: value.type, text: value.text };
};

export const parseScoreRecord = (value: unknown): ScoreRecord | null => {
    if (!isObject(value) || typeof value.title !== "string" || typeof value.found !== "boolean") return null;
    const availableScores = Array.isArray(value.availableScores)
        ? value.availableScores.filter((source): source is ScoreSource => isOneOf(SCORE_SOURCES, source))
        : [];

    return {
        title: value.title,
        found: value.found,
        rottenTomatoes: nullableNumber(value.rottenTomatoes),
        metacritic: nullableNumber(value.metacritic),
        imdb: nullableNumber(value.imdb),
        compositeScore: nullableNumber(value.compositeScore),
        availableScores,
        omdbTitle: stringField(value, "omdbTitle"),
        omdbYear: stringField(value, "omdbYear"),
        imdbId: stringField(value, "imdbId"),
        fetchedAt: stringField(value, "fetchedAt"),
    };
};

export const parseShowing = (value: unknown): Showing | null => {
    if (!isObject(value)) return null;
    const { title, date, time, startTime } = value;
    if (typeof title !== "string" || typeof date !== "string" || typeof time !== "string") return null;
    if (typeof startTime !== "string") return null;

    const titleTags = Array.isArray(value.titleTags)
        ? value.titleTags.map(parseTitleTag).filter((tag): tag is TitleTag => tag !== null)
        : [];
    const scores = parseScoreRecord(value.scores);

    const showing: Showing = {
        cinema: stringField(value, "cinema"),
        rawTitle: stringField(value, "rawTitle") || title,
        title,
        titleTags,
        date,
        dateDisplay: stringField(value, "dateDisplay"),
        time,
        startTime,
        screenInfo: stringField(value, "screenInfo"),
        cert: stringField(value, "cert"),
        runtime: stringField(value, "runtime"),
        availability: stringField(value, "availability"),
        source: isOneOf(SHOWING_SOURCES, value.source) ? value.source : "html",
    };
    return scores ? { ...showing, scores } : showing;
};
