import { Command, InvalidArgumentError } from "commander";
import { DEFAULT_HTML_FILE, DEFAULT_ICAL_FILE, DEFAULT_OUTPUT_FILE, loadConfig } from "src/config";
import { runCalendar, runClean, runPipeline, runScores, runViewer } from "src/jobs/run";
import { customLogger } from "src/utils/logger";

type Env = Record<string, string | undefined>;

interface ScoreOptions {
    apiKey?: string;
    skipScores?: boolean;
    forceRefresh?: boolean;
    limit?: number;
}

interface RunOptions extends ScoreOptions {
    url?: string;
    name?: string;
    output?: string;
    location?: string;
    ical?: string | boolean;
    html?: string | boolean;
}

const parseLimit = (value: string) => {
    const limit = Number(value);
    if (!Number.isInteger(limit) || limit <= 0) {
        throw new InvalidArgumentError("Must be a positive integer.");
    }
    return limit;
};

/** `--ical` alone means the default file; leaving the flag out defers to the environment. */
export const optionalFile = (value: string | boolean | undefined, fallback: string) => {
    if (value === undefined) return undefined;
    if (value === true) return fallback;
    if (value === false) return null;
    return value;
};

const scoreOverrides = (options: ScoreOptions) => ({
    apiKey: options.apiKey,
    skipScores: options.skipScores,
    forceRefresh: options.forceRefresh,
    limit: options.limit,
});

const withScoreOptions = (command: Command) =>
    command
        .option("-k, --api-key <key>", "OMDb API key (or set OMDB_API_KEY)")
        .option("--skip-scores", "do not query OMDb, keep cached scores only")
        .option("-f, --force-refresh", "look up every title again, ignoring cached scores")
        .option("-l, --limit <count>", "only look up the first <count> titles", parseLimit);

export const createProgram = (env: Env = process.env) => {
    const program = new Command()
        .name("cinema-times")
        .description("Scrape cinema showtimes, rate the films and publish JSON, iCal and HTML outputs");

    withScoreOptions(
        program
            .command("run", { isDefault: true })
            .description("scrape, score and write every output")
            .option("--url <url>", "cinema listings page")
            .option("--name <name>", "cinema name")
            .option("-o, --output <file>", `JSON output file (default: ${DEFAULT_OUTPUT_FILE})`)
            .option("--location <location>", "location used for calendar events")
            .option("--ical [file]", `also write an iCal feed (default: ${DEFAULT_ICAL_FILE})`)
            .option("--html [file]", `also write the HTML viewer (default: ${DEFAULT_HTML_FILE})`)
    ).action(async (options: RunOptions) => {
        const config = loadConfig(
            {
                ...scoreOverrides(options),
                cinemaUrl: options.url,
                cinemaName: options.name,
                cinemaLocation: options.location,
                outputFile: options.output,
                icalFile: optionalFile(options.ical, DEFAULT_ICAL_FILE),
                htmlFile: optionalFile(options.html, DEFAULT_HTML_FILE),
            },
            env
        );
        const summary = await runPipeline(config);
        customLogger(
            `${summary.showings} showings, ${summary.titles} titles, ${summary.scoredTitles} scored` +
                ` (${summary.fetchedTitles} fetched, ${summary.failedLookups} failed). Wrote ${summary.files.join(", ")}`
        );
    });

    program
        .command("clean")
        .description("re-clean the titles of a stored JSON file")
        .argument("[file]", "JSON file", DEFAULT_OUTPUT_FILE)
        .action(async (file: string) => {
            await runClean(file);
        });

    withScoreOptions(
        program.command("scores").description("look up scores for a stored JSON file").argument("[file]", "JSON file", DEFAULT_OUTPUT_FILE)
    ).action(async (file: string, options: ScoreOptions) => {
        await runScores(file, loadConfig(scoreOverrides(options), env));
    });

    program
        .command("ical")
        .description("write an iCal feed from a stored JSON file")
        .argument("[file]", "JSON file", DEFAULT_OUTPUT_FILE)
        .argument("[output]", "iCal file", DEFAULT_ICAL_FILE)
        .option("--location <location>", "location used for calendar events")
        .action(async (file: string, output: string, options: { location?: string }) => {
            await runCalendar(file, output, loadConfig({ cinemaLocation: options.location }, env).cinemaLocation);
        });

    program
        .command("viewer")
        .description("write the static HTML viewer from a stored JSON file")
        .argument("[file]", "JSON file", DEFAULT_OUTPUT_FILE)
        .argument("[output]", "HTML file", DEFAULT_HTML_FILE)
        .action(async (file: string, output: string) => {
            await runViewer(file, output);
        });

    return program;
};
