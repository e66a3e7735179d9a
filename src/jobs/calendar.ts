import { createHash } from "crypto";
import fs from "fs/promises";
import { ICalCalendar, ICalCalendarMethod } from "ical-generator";
import { toShowDateTime } from "src/utils/date";
import { customLogger, warnLogger } from "src/utils/logger";
import { ScoreRecord, Showing } from "src/utils/types";

export const DEFAULT_DURATION_MINUTES = 120;

export interface CalendarOptions {
    location?: string | null;
    now?: Date;
}

/** Minutes from "118 mins", "118" or "1h 58m"; `null` when there is nothing to read. */
export const parseRuntimeMinutes = (runtime: string): number | null => {
    const value = runtime.trim().toLowerCase();
    const hoursAndMinutes = value.match(/^(\d+)\s*h(?:rs?|ours?)?\s*(?:(\d+)\s*m(?:ins?|inutes?)?)?$/);
    if (hoursAndMinutes) {
        return Number(hoursAndMinutes[1]) * 60 + Number(hoursAndMinutes[2] ?? 0);
    }
    const minutes = value.match(/^(\d+)\s*(?:m|mins?|minutes?)?$/);
    if (minutes && Number(minutes[1]) > 0) {
        return Number(minutes[1]);
    }
    return null;
};

const describeScores = (scores: ScoreRecord) => {
    const sources = [
        scores.rottenTomatoes !== null ? `RT ${scores.rottenTomatoes}%` : null,
        scores.metacritic !== null ? `Metacritic ${scores.metacritic}` : null,
        scores.imdb !== null ? `IMDb ${scores.imdb.toFixed(1)}` : null,
    ].filter((source): source is string => source !== null);
    return `Rating: ${scores.compositeScore}/100 (${sources.join(", ")})`;
};

export const eventUid = (showing: Showing) => {
    const hash = createHash("sha1").update(`${showing.cinema}|${showing.title}|${showing.startTime}`).digest("hex");
    return `${hash.slice(0, 24)}@cinema-times`;
};

export const buildCalendar = (showings: Showing[], options: CalendarOptions = {}) => {
    const calendar = new ICalCalendar({
        name: "Cinema Times",
        description: "Movie showtimes from local cinema",
        prodId: { company: "Cinema Times Scraper", product: "Cinema Times", language: "EN" },
        method: ICalCalendarMethod.PUBLISH,
    });
    const stamp = options.now ?? new Date();

    for (const showing of showings) {
        const start = toShowDateTime(showing.date, showing.time);
        if (!start) {
            warnLogger(`Skipping calendar event for "${showing.title}" with start ${showing.date} ${showing.time}`);
            continue;
        }
        const duration = parseRuntimeMinutes(showing.runtime) ?? DEFAULT_DURATION_MINUTES;
        const end = new Date(start.getTime() + duration * 60 * 1000);

        const description = [
            `Movie: ${showing.title}`,
            `Cinema: ${showing.cinema}`,
            `Showtime: ${showing.time}`,
            showing.screenInfo && `Screen: ${showing.screenInfo}`,
            showing.runtime && `Runtime: ${showing.runtime}`,
            showing.scores && showing.scores.compositeScore !== null ? describeScores(showing.scores) : "",
        ].filter((line): line is string => typeof line === "string" && line.length > 0);

        calendar.createEvent({
            id: eventUid(showing),
            start,
            end,
            floating: true,
            stamp,
            summary: `${showing.title} - ${showing.cinema}`,
            description: description.join("\n"),
            location: options.location || showing.cinema,
        });
    }

    return calendar.toString();
};

export const writeCalendar = async (filePath: string, showings: Showing[], options: CalendarOptions = {}) => {
    if (showings.length === 0) {
        customLogger("No showings found to generate an iCal file");
        return false;
    }
    await fs.writeFile(filePath, buildCalendar(showings, options), "utf-8");
    customLogger(`Generated iCal file ${filePath} with ${showings.length} events`);
    return true;
};
