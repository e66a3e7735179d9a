import axios from "axios";
import * as cheerio from "cheerio";
import { formatDateDisplay, formatIsoDate, formatLocalDate, parseDateKey, parseIsoDate, parseShowTime } from "src/utils/date";
import { errorMessage, ScrapeError } from "src/utils/errors";
import { isObject, stringField } from "src/utils/guards";
import { generateHeaders } from "src/utils/headers";
import { customLogger, warnLogger } from "src/utils/logger";
import { isRetryableFetchError, withRetries } from "src/utils/retry";
import { extractTitleAndTags } from "src/utils/title";
import { Showing, ShowingSource } from "src/utils/types";

export interface ScrapeTarget {
    cinemaUrl: string;
    cinemaName: string;
}

interface ShowingInput {
    cinema: string;
    rawTitle: string;
    date: string;
    dateDisplay: string;
    time: string;
    screenInfo?: string;
    cert?: string;
    runtime?: string;
    availability?: string;
    source: ShowingSource;
}

const GUIDE_DATA_PATTERN = /__guideData\s*=\s*\[/g;
const UNAVAILABLE_CLASSES = ["unavailable", "soldout"];
const TITLE_SELECTOR = "h1, h2, h3, h4, h5, strong, b";
const TIME_PATTERN = /(?<![\d£$€]|[£$€]\s)(\d{1,2}[:.]\d{2})(?:\s*([ap]m))?(?!\d)/gi;
const IGNORED_LABELS = ["captioned", "rewind", "explore", "iconic"];
const EXCLUDED_PHRASES = [
    "stay in touch",
    "contact us",
    "newsletter",
    "subscribe",
    "follow us",
    "social media",
    "coming soon",
    "book now",
    "buy tickets",
    "gift cards",
    "membership",
    "accessibility",
];

const createShowing = (input: ShowingInput): Showing => {
    const { title, tags } = extractTitleAndTags(input.rawTitle);
    return {
        cinema: input.cinema,
        rawTitle: input.rawTitle,
        title,
        titleTags: tags,
        date: input.date,
        dateDisplay: input.dateDisplay,
        time: input.time,
        startTime: `${input.date}T${input.time}`,
        screenInfo: input.screenInfo ?? "",
        cert: input.cert ?? "",
        runtime: input.runtime ?? "",
        availability: input.availability ?? "",
        source: input.source,
    };
};

export const sliceJsonArray = (source: string, start: number): string | null => {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < source.length; i++) {
        const char = source[i];
        if (inString) {
            if (escaped) escaped = false;
            else if (char === "\\") escaped = true;
            else if (char === '"') inString = false;
            continue;
        }
        if (char === '"') inString = true;
        else if (char === "[") depth++;
        else if (char === "]") {
            depth--;
            if (depth === 0) return source.slice(start, i + 1);
        }
    }
    return null;
};

export const extractGuideData = (html: string): unknown[] | null => {
    const $ = cheerio.load(html);

    for (const script of $("script").toArray()) {
        const content = $(script).html() ?? "";
        if (!content.includes("__guideData")) continue;

        for (const match of content.matchAll(GUIDE_DATA_PATTERN)) {
            const start = (match.index ?? 0) + match[0].length - 1;
            const json = sliceJsonArray(content, start);
            if (!json) continue;
            try {
                const parsed: unknown = JSON.parse(json);
                if (Array.isArray(parsed)) {
                    customLogger(`Parsed guide data with ${parsed.length} movies`);
                    return parsed;
                }
            } catch (error) {
                warnLogger(`Could not parse guide data: ${errorMessage(error)}`, json.slice(0, 200));
            }
        }
    }
    return null;
};

export const parseGuideData = (movies: unknown[], cinemaName: string): Showing[] => {
    const showings: Showing[] = [];

    for (const movie of movies) {
        if (!isObject(movie) || !stringField(movie, "Title")) {
            warnLogger("Skipping guide entry without a title");
            continue;
        }
        const rawTitle = stringField(movie, "Title");
        const cert = stringField(movie, "Cert");
        const runtime = stringField(movie, "Runtime");
        const dates = Array.isArray(movie.Dates) ? movie.Dates : [];

        for (const dateInfo of dates) {
            if (!isObject(dateInfo)) continue;
            const day = parseDateKey(stringField(dateInfo, "Key"));
            if (!day) {
                warnLogger(`Skipping "${rawTitle}" date with key "${stringField(dateInfo, "Key")}"`);
                continue;
            }
            const sessions = Array.isArray(dateInfo.Sessions) ? dateInfo.Sessions : [];

            for (const session of sessions) {
                if (!isObject(session)) continue;
                const availability = stringField(session, "CssClass");
                if (UNAVAILABLE_CLASSES.some((name) => availability.toLowerCase().includes(name))) continue;

                const time = parseShowTime(stringField(session, "Display"));
                if (!time) {
                    warnLogger(`Skipping "${rawTitle}" session with time "${stringField(session, "Display")}"`);
                    continue;
                }

                showings.push(
                    createShowing({
                        cinema: cinemaName,
                        rawTitle,
                        date: formatIsoDate(day),
                        dateDisplay: stringField(dateInfo, "Display") || formatDateDisplay(day),
                        time,
                        screenInfo: stringField(session, "Format"),
                        cert,
                        runtime,
                        availability,
                        source: "guide_data",
                    })
                );
            }
        }
    }

    customLogger(`Parsed ${showings.length} showings from guide data`);
    return showings;
};

const normalizeText = (text: string) => text.replace(/\s+/g, " ").replace(/\|/g, "").trim();

const isTitleCandidate = (text: string) => {
    return text.length > 3 && !/^\d{1,2}[:.]?\d{2}/.test(text) && !IGNORED_LABELS.includes(text.toLowerCase());
};

const findTimes = (text: string) => {
    return Array.from(text.matchAll(TIME_PATTERN))
        .map((match) => parseShowTime(match[2] ? `${match[1]} ${match[2]}` : match[1]))
        .filter((time): time is string => time !== null);
};

/**
 * Reads today's listings from the page markup. Each film is taken from the innermost
 * container holding both a title element and at least one time.
 */
export const scrapeShowingsFromHtml = (html: string, cinemaName: string, today: Date = new Date()): Showing[] => {
    const $ = cheerio.load(html);
    // keeps adjacent elements' text apart, e.g. "<a>14:00</a><a>19:30</a>"
    $("body *").append(" ");
    const date = formatLocalDate(today);
    const day = parseIsoDate(date);
    const dateDisplay = day ? formatDateDisplay(day) : date;

    const containers = $("article, section, div")
        .toArray()
        .filter((element) => {
            const $element = $(element);
            if (($element.attr("class") ?? "").includes("sessions")) return false;
            if (findTimes($element.text()).length === 0) return false;
            return $element
                .find(TITLE_SELECTOR)
                .toArray()
                .some((candidate) => isTitleCandidate(normalizeText($(candidate).text())));
        });

    const ancestors = new Set<unknown>();
    for (const container of containers) {
        $(container)
            .parents()
            .each((_, parent) => {
                ancestors.add(parent);
            });
    }

    const seen = new Set<string>();
    const showings: Showing[] = [];
    for (const container of containers.filter((element) => !ancestors.has(element))) {
        const $container = $(container);
        const rawTitle = $container
            .find(TITLE_SELECTOR)
            .toArray()
            .map((candidate) => normalizeText($(candidate).text()))
            .find(isTitleCandidate);
        if (!rawTitle) continue;
        if (EXCLUDED_PHRASES.some((phrase) => rawTitle.toLowerCase().includes(phrase))) continue;

        for (const time of findTimes($container.text())) {
            const key = `${rawTitle.toLowerCase()}_${time}_${date}`;
            if (seen.has(key)) continue;
            seen.add(key);
            showings.push(createShowing({ cinema: cinemaName, rawTitle, date, dateDisplay, time, source: "html" }));
        }
    }

    customLogger(`Extracted ${showings.length} showings for ${dateDisplay} from page markup`);
    return showings;
};

export const scrapeShowings = async (target: ScrapeTarget, today: Date = new Date()): Promise<Showing[]> => {
    const response = await withRetries(
        () =>
            axios.get<string>(target.cinemaUrl, {
                headers: generateHeaders(target.cinemaUrl),
                responseType: "text",
                timeout: 15000,
            }),
        { label: `Fetching ${target.cinemaUrl}`, shouldRetry: isRetryableFetchError }
    ).catch((error) => {
        throw new ScrapeError(`Failed to fetch ${target.cinemaUrl}: ${errorMessage(error)}`, { cause: error });
    });
    if (response.status !== 200) {
        throw new ScrapeError(`Failed to fetch ${target.cinemaUrl}: ${response.status}`);
    }

    const html = String(response.data);
    const guideData = extractGuideData(html);
    if (guideData) {
        return parseGuideData(guideData, target.cinemaName);
    }

    warnLogger("No guide data found on the page, falling back to HTML parsing for today only");
    return scrapeShowingsFromHtml(html, target.cinemaName, today);
};
