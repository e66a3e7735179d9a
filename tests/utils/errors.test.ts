import { errorMessage, isFileNotFound, ScrapeError } from "src/utils/errors";

describe("isFileNotFound", () => {
    test("matches ENOENT errors by their code", () => {
        expect(isFileNotFound(Object.assign(new Error("missing"), { code: "ENOENT" }))).toBe(true);
        expect(isFileNotFound({ code: "ENOENT", message: "ENOENT: no such file or directory" })).toBe(true);
    });

    test("ignores other failures", () => {
        expect(isFileNotFound(Object.assign(new Error("denied"), { code: "EACCES" }))).toBe(false);
        expect(isFileNotFound(new Error("ENOENT"))).toBe(false);
        expect(isFileNotFound("ENOENT")).toBe(false);
        expect(isFileNotFound(null)).toBe(false);
    });
});

describe("errorMessage", () => {
    test("reads messages from errors and error-like values", () => {
        expect(errorMessage(new ScrapeError("page gone"))).toBe("page gone");
        expect(errorMessage({ message: "from another context" })).toBe("from another context");
        expect(errorMessage(42)).toBe("42");
    });
});
