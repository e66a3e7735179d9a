import fs from "fs/promises";
import { html, raw } from "hono/html";
import { parseIsoDate, formatDateDisplay } from "src/utils/date";
import { customLogger } from "src/utils/logger";
import { ScoreRecord, Showing, ShowingsStore, TitleTag } from "src/utils/types";

interface FilmListing {
    title: string;
    tags: TitleTag[];
    cert: string;
    runtime: string;
    times: { time: string; screenInfo: string }[];
    scores?: ScoreRecord;
}

interface DayListing {
    date: string;
    label: string;
    films: FilmListing[];
}

const STYLES = `
body { font-family: system-ui, sans-serif; margin: 0 auto; max-width: 960px; padding: 1rem; color: #222; }
h1 { margin-bottom: 0; }
.updated { color: #666; margin-top: 0.25rem; }
.day { margin-top: 2rem; }
.film { border-bottom: 1px solid #ddd; padding: 0.75rem 0; display: flex; gap: 1rem; align-items: baseline; }
.film .score { font-weight: bold; min-width: 3.5rem; text-align: right; }
.film .score.none { color: #999; font-weight: normal; }
.tag { background: #eee; border-radius: 3px; font-size: 0.8rem; margin-left: 0.25rem; padding: 0 0.3rem; }
.times { color: #333; }
.sources { color: #666; font-size: 0.85rem; }
`;

const compareFilms = (a: FilmListing, b: FilmListing) => {
    const scoreA = a.scores?.compositeScore ?? null;
    const scoreB = b.scores?.compositeScore ?? null;
    if (scoreA !== null && scoreB !== null && scoreA !== scoreB) return scoreB - scoreA;
    if (scoreA !== null && scoreB === null) return -1;
    if (scoreA === null && scoreB !== null) return 1;
    return a.title.localeCompare(b.title);
};

export const groupShowings = (showings: Showing[]): DayListing[] => {
    const days = new Map<string, Map<string, FilmListing>>();

    for (const showing of showings) {
        const films = days.get(showing.date) ?? new Map<string, FilmListing>();
        days.set(showing.date, films);

        const film = films.get(showing.title) ?? {
            title: showing.title,
            tags: showing.titleTags,
            cert: showing.cert,
            runtime: showing.runtime,
            times: [],
            scores: showing.scores,
        };
        films.set(showing.title, film);
        film.times.push({ time: showing.time, screenInfo: showing.screenInfo });
    }

    return Array.from(days.entries())
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([date, films]) => {
            const day = parseIsoDate(date);
            return {
                date,
                label: day ? formatDateDisplay(day) : date,
                films: Array.from(films.values())
                    .map((film) => ({ ...film, times: [...film.times].sort((a, b) => a.time.localeCompare(b.time)) }))
                    .sort(compareFilms),
            };
        });
};

const renderSources = (scores: ScoreRecord | undefined) => {
    if (!scores) return "";
    const parts = [
        scores.rottenTomatoes !== null ? `RT ${scores.rottenTomatoes}%` : null,
        scores.metacritic !== null ? `Metacritic ${scores.metacritic}` : null,
        scores.imdb !== null ? `IMDb ${scores.imdb.toFixed(1)}` : null,
    ].filter((part): part is string => part !== null);
    return parts.length ? html`<div class="sources">${parts.join(" · ")}</div>` : "";
};

const renderFilm = (film: FilmListing) => {
    const score = film.scores?.compositeScore ?? null;
    return html`<li class="film">
        ${score === null ? html`<span class="score none">–</span>` : html`<span class="score">${score}</span>`}
        <div>
            <strong>${film.title}</strong>${film.tags.map((tag) => html`<span class="tag">${tag.text}</span>`)}
            ${film.cert ? html`<span class="tag">${film.cert}</span>` : ""}
            <div class="times">
                ${film.times.map(({ time, screenInfo }) => (screenInfo ? `${time} (${screenInfo})` : time)).join(", ")}
            </div>
            ${renderSources(film.scores)}
        </div>
    </li>`;
};

export const renderViewer = async (store: ShowingsStore): Promise<string> => {
    const days = groupShowings(store.showings);
    const title = store.cinema ? `${store.cinema} - Cinema Times` : "Cinema Times";

    const page = await html`<!doctype html>
<html lang="en">
    <head>
        <meta charset="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>${title}</title>
        <style>
            ${raw(STYLES)}
        </style>
    </head>
    <body>
        <h1>${store.cinema || "Cinema Times"}</h1>
        <p class="updated">Last updated ${store.lastUpdated || "never"}</p>
        ${days.length === 0 ? html`<p>No showings found.</p>` : ""}
        ${days.map(
            (day) => html`<section class="day" id="day-${day.date}">
                <h2>${day.label}</h2>
                <ul>
                    ${day.films.map(renderFilm)}
                </ul>
            </section>`
        )}
    </body>
</html>
`;
    return page.toString();
};

export const writeViewer = async (filePath: string, store: ShowingsStore) => {
    await fs.writeFile(filePath, await renderViewer(store), "utf-8");
    customLogger(`Wrote viewer with ${store.showings.length} showings to ${filePath}`);
};
