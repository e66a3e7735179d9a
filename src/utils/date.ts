export const createUTCDate = (day: number, month: number, year: number = new Date().getFullYear()) => {
    return new Date(Date.UTC(year, month - 1, day));
};

export const createUTCDateTime = (date: Date, hours: number, minutes: number): Date => {
    return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate(), hours, minutes));
};

const pad = (value: number) => String(value).padStart(2, "0");

export const formatLocalDate = (date: Date) => {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
};

/** `Sun 19 Oct`, the label the cinema uses on its day tabs. */
export const formatDateDisplay = (date: Date) => {
    const weekday = date.toLocaleDateString("en-GB", { weekday: "short", timeZone: "UTC" });
    const month = date.toLocaleDateString("en-GB", { month: "short", timeZone: "UTC" });
    return `${weekday} ${pad(date.getUTCDate())} ${month}`;
};

export const parseDateKey = (key: string): Date | null => {
    const match = key.match(/^(\d{4})(\d{2})(\d{2})$/);
    if (!match) return null;
    const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
    const date = createUTCDate(day, month, year);
    if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
    return date;
};

export const parseIsoDate = (value: string): Date | null => {
    return parseDateKey(value.replace(/-/g, ""));
};

export const formatIsoDate = (date: Date) => {
    return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
};

/**
 * Parses the time formats the cinema uses ("14:30", "2:30 PM", "11.15", "1430")
 * into a 24-hour `HH:MM` string.
 */
export const parseShowTime = (text: string): string | null => {
    const value = text.trim().toUpperCase();
    const match = value.match(/^(\d{1,2})(?:[:.]?(\d{2}))?\s*(AM|PM)?$/);
    if (!match) return null;

    let hours = Number(match[1]);
    const minutes = match[2] === undefined ? 0 : Number(match[2]);
    const meridiem = match[3];
    if (match[2] === undefined && !meridiem) return null;

    if (meridiem) {
        if (hours < 1 || hours > 12) return null;
        if (meridiem === "AM" && hours === 12) hours = 0;
        if (meridiem === "PM" && hours !== 12) hours += 12;
    }
    if (hours > 23 || minutes > 59) return null;

    return `${pad(hours)}:${pad(minutes)}`;
};

/** Combines a `YYYY-MM-DD` date and an `HH:MM` time into a wall-clock date stored as UTC. */
export const toShowDateTime = (date: string, time: string): Date | null => {
    const day = parseIsoDate(date);
    const match = time.match(/^(\d{2}):(\d{2})$/);
    if (!day || !match) return null;
    return createUTCDateTime(day, Number(match[1]), Number(match[2]));
};
