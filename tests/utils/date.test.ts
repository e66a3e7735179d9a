import {
    createUTCDate,
    formatDateDisplay,
    formatIsoDate,
    formatLocalDate,
    parseDateKey,
    parseShowTime,
    toShowDateTime,
} from "src/utils/date";

describe("parseShowTime", () => {
    test.each([
        ["14:30", "14:30"],
        ["9:05", "09:05"],
        ["2:30 PM", "14:30"],
        ["12:15 am", "00:15"],
        ["12:00 PM", "12:00"],
        ["7 pm", "19:00"],
        ["11.15", "11:15"],
        ["1430", "14:30"],
    ])("parses %s", (input, expected) => {
        expect(parseShowTime(input)).toBe(expected);
    });

    test.each(["", "soon", "25:00", "13:00 PM", "14", "10:75"])("rejects %p", (input) => {
        expect(parseShowTime(input)).toBeNull();
    });
});

describe("date keys", () => {
    test("parses YYYYMMDD keys", () => {
        const date = parseDateKey("20251019");
        expect(date?.toISOString()).toBe("2025-10-19T00:00:00.000Z");
        expect(date && formatIsoDate(date)).toBe("2025-10-19");
    });

    test("rejects impossible dates", () => {
        expect(parseDateKey("20250231")).toBeNull();
        expect(parseDateKey("2025-10-19")).toBeNull();
    });

    test("formats the display label", () => {
        expect(formatDateDisplay(createUTCDate(19, 10, 2025))).toBe("Sun 19 Oct");
    });

    test("formats the local calendar day", () => {
        expect(formatLocalDate(new Date(2025, 0, 5, 23, 30))).toBe("2025-01-05");
    });
});

describe("toShowDateTime", () => {
    test("combines the date and time as wall-clock UTC", () => {
        expect(toShowDateTime("2025-10-19", "19:30")?.toISOString()).toBe("2025-10-19T19:30:00.000Z");
    });

    test("returns null for malformed input", () => {
        expect(toShowDateTime("19/10/2025", "19:30")).toBeNull();
        expect(toShowDateTime("2025-10-19", "7pm")).toBeNull();
    });
});
