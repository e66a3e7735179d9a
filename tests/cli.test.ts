import { createProgram, optionalFile } from "src/cli";
import { runCalendar, runPipeline, runScores } from "src/jobs/run";

jest.mock("src/jobs/run");
const mockedRunPipeline = jest.mocked(runPipeline);

const parse = (args: string[], env: Record<string, string | undefined> = {}) => {
    const program = createProgram(env);
    for (const command of [program, ...program.commands]) {
        command.exitOverride().configureOutput({ writeErr: () => undefined });
    }
    return program.parseAsync(args, { from: "user" });
};

beforeEach(() => {
    jest.mocked(runPipeline).mockReset();
    jest.mocked(runScores).mockReset();
    jest.mocked(runCalendar).mockReset();
    mockedRunPipeline.mockResolvedValue({
        showings: 0,
        titles: 0,
        scoredTitles: 0,
        fetchedTitles: 0,
        failedLookups: 0,
        files: [],
    });
});

describe("optionalFile", () => {
    test("maps a bare flag to the default file and a missing flag to undefined", () => {
        expect(optionalFile(undefined, "cinema-times.ics")).toBeUndefined();
        expect(optionalFile(true, "cinema-times.ics")).toBe("cinema-times.ics");
        expect(optionalFile(false, "cinema-times.ics")).toBeNull();
        expect(optionalFile("feed.ics", "cinema-times.ics")).toBe("feed.ics");
    });
});

describe("run command", () => {
    test("is the default command and passes its options to the pipeline", async () => {
        await parse(["--ical", "--html", "viewer.html", "--skip-scores", "-l", "5", "-o", "out.json"]);

        expect(mockedRunPipeline).toHaveBeenCalledTimes(1);
        expect(mockedRunPipeline.mock.calls[0][0]).toEqual(
            expect.objectContaining({
                outputFile: "out.json",
                icalFile: "cinema-times.ics",
                htmlFile: "viewer.html",
                skipScores: true,
                forceRefresh: false,
                limit: 5,
            })
        );
    });

    test("leaves optional outputs to the environment when their flags are absent", async () => {
        await parse(["run"], { ICAL_FILE: "env.ics" });

        expect(mockedRunPipeline.mock.calls[0][0]).toEqual(
            expect.objectContaining({ icalFile: "env.ics", htmlFile: null, skipScores: false, limit: null })
        );
    });

    test("prefers the --api-key flag over OMDB_API_KEY", async () => {
        await parse(["run", "-k", "flag-key"], { OMDB_API_KEY: "env-key" });
        await parse(["run"], { OMDB_API_KEY: "env-key" });

        expect(mockedRunPipeline.mock.calls.map(([config]) => config.apiKey)).toEqual(["flag-key", "env-key"]);
    });

    test("rejects a limit that is not a positive integer", async () => {
        await expect(parse(["run", "--limit", "0"])).rejects.toThrow("Must be a positive integer.");
        expect(mockedRunPipeline).not.toHaveBeenCalled();
    });
});

describe("stored-file commands", () => {
    test("scores passes the file and score options", async () => {
        await parse(["scores", "data.json", "--force-refresh"], { OMDB_API_KEY: "test-key" });

        expect(jest.mocked(runScores)).toHaveBeenCalledWith(
            "data.json",
            expect.objectContaining({ apiKey: "test-key", forceRefresh: true, skipScores: false })
        );
    });

    test("ical takes the file, output and location", async () => {
        await parse(["ical", "data.json", "feed.ics", "--location", "Test Foyer"]);

        expect(jest.mocked(runCalendar)).toHaveBeenCalledWith("data.json", "feed.ics", "Test Foyer");
    });
});
