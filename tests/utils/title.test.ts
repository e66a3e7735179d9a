import { cleanShowingTitles, cleanTitle, extractTitleAndTags } from "src/utils/title";
import { makeScoreRecord, makeShowing } from "../helpers";

describe("cleanTitle", () => {
    test("removes every parenthetical group", () => {
        expect(cleanTitle("Movie (3D) (50th Anniversary)")).toBe("Movie");
    });

    test("removes nested groups as a whole", () => {
        expect(cleanTitle("Alien (Director's Cut (4K)) Returns")).toBe("Alien Returns");
    });

    test("trims and collapses whitespace", () => {
        expect(cleanTitle("  The   Room  (Uncut) ")).toBe("The Room");
    });

    test("decodes HTML entities before cleaning", () => {
        expect(cleanTitle("Tom &amp; Jerry (Subtitled)")).toBe("Tom & Jerry");
        expect(cleanTitle("F1 &#174;")).toBe("F1 ®");
        expect(cleanTitle("Fast &amp;amp; Furious")).toBe("Fast & Furious");
    });

    test("decodes entities however deeply they were escaped", () => {
        expect(cleanTitle("Rock &amp;amp;amp;amp;amp;amp; Roll")).toBe("Rock & Roll");
    });

    test("treats an unclosed group as running to the end", () => {
        expect(cleanTitle("Nosferatu (Silent with live score")).toBe("Nosferatu");
    });

    test("keeps a stray closing parenthesis", () => {
        expect(cleanTitle("Film) Two")).toBe("Film) Two");
    });

    test("strips the NT Live prefix", () => {
        expect(cleanTitle("NT Live: Hamlet (Encore)")).toBe("Hamlet");
    });

    test("falls back to the input when nothing would remain", () => {
        expect(cleanTitle("(Untitled)")).toBe("(Untitled)");
    });

    test("is idempotent", () => {
        const titles = [
            "Movie (3D) (50th Anniversary)",
            "Alien (Director's Cut (4K)) Returns",
            "Fast &amp;amp;amp; Furious",
            "Rock &amp;amp;amp;amp;amp;amp;amp; Roll",
            "NT Live: NT Live: Hamlet",
            "(Untitled)",
            "Film) Two (",
            "Already Clean",
        ];
        for (const title of titles) {
            const once = cleanTitle(title);
            expect(cleanTitle(once)).toBe(once);
        }
    });
});

describe("extractTitleAndTags", () => {
    test("classifies removed annotations", () => {
        expect(extractTitleAndTags("Movie (3D) (50th Anniversary)")).toEqual({
            title: "Movie",
            tags: [
                { type: "format", text: "3D" },
                { type: "anniversary", text: "50th Anniversary" },
            ],
        });
    });

    test("recognises release, language, certificate and collection annotations", () => {
        const { tags } = extractTitleAndTags(
            "Jaws (Re-Issue) (4K Re-release) (Dubbed) (12A) (Double Bill with Jaws 2) (Q&A)"
        );
        expect(tags).toEqual([
            { type: "rerelease", text: "Re-Issue" },
            { type: "remaster", text: "4K Re-release" },
            { type: "language", text: "Dubbed" },
            { type: "certificate", text: "12A" },
            { type: "collection", text: "Double Bill with Jaws 2" },
            { type: "note", text: "Q&A" },
        ]);
    });

    test("records the NT Live prefix as a format tag", () => {
        expect(extractTitleAndTags("NT Live: Hamlet (Encore)")).toEqual({
            title: "Hamlet",
            tags: [
                { type: "note", text: "Encore" },
                { type: "format", text: "NT Live" },
            ],
        });
    });

    test("skips empty groups", () => {
        expect(extractTitleAndTags("Heat ()")).toEqual({ title: "Heat", tags: [] });
    });
});

describe("cleanShowingTitles", () => {
    test("re-derives titles from raw titles and reports changes", () => {
        const stale = makeShowing({ rawTitle: "Dune (12A)", title: "Dune (12A)", titleTags: [], scores: makeScoreRecord() });
        const clean = makeShowing({ rawTitle: "Heat", title: "Heat", titleTags: [] });

        const { showings, changes } = cleanShowingTitles([stale, stale, clean]);

        expect(showings[0].title).toBe("Dune");
        expect(showings[0].titleTags).toEqual([{ type: "certificate", text: "12A" }]);
        expect(showings[0].scores).toBeUndefined();
        expect(showings[2]).toBe(clean);
        expect(changes).toEqual([
            { rawTitle: "Dune (12A)", title: "Dune", tags: [{ type: "certificate", text: "12A" }], count: 2 },
        ]);
    });
});
