export type JsonObject = Record<string, unknown>;

export const isObject = (value: unknown): value is JsonObject => {
    return typeof value === "object" && value !== null && !Array.isArray(value);
};

export const stringField = (record: JsonObject, key: string) => {
    const value = record[key];
    if (typeof value === "string") return value.trim();
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
    return "";
};
