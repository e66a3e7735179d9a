import { decodeHTML } from "entities";
import { Showing, TitleTag, TitleTagType } from "src/utils/types";

const NT_LIVE_PREFIX = "NT Live: ";

const TAG_PATTERNS: [RegExp, TitleTagType][] = [
    [/^4K\s+(Re-?release|Restoration)$/i, "remaster"],
    [/anniversary/i, "anniversary"],
    [/^(Re-?Issue|Re-?release)$/i, "rerelease"],
    [/^(Dubbed|Subbed|Subtitled)$/i, "language"],
    [/^(Uncut|Director'?s Cut|Extended( Cut| Edition)?|Final Cut)$/i, "version"],
    [/^Double Bill/i, "collection"],
    [/^(U|PG|12A?|15|18)$/i, "certificate"],
    [/^(2D|3D|IMAX)$/i, "format"],
];

const classifyAnnotation = (text: string): TitleTagType => {
    return TAG_PATTERNS.find(([pattern]) => pattern.test(text))?.[1] ?? "note";
};

const collapseWhitespace = (value: string) => value.replace(/\s+/g, " ").trim();

const decodeEntities = (value: string) => {
    let current = value;
    let decoded = decodeHTML(current);
    // "&amp;amp;" needs more than one pass to settle
    while (decoded !== current) {
        current = decoded;
        decoded = decodeHTML(current);
    }
    return current;
};

/**
 * Removes every top-level parenthetical group, nested groups included.
 * An unclosed "(" swallows the rest of the string; a stray ")" is left alone.
 */
const stripParentheticals = (value: string) => {
    const annotations: string[] = [];
    let kept = "";
    let depth = 0;
    let groupStart = 0;

    for (let i = 0; i < value.length; i++) {
        const char = value[i];
        if (char === "(") {
            if (depth === 0) {
                groupStart = i;
                kept += " ";
            }
            depth++;
        } else if (char === ")" && depth > 0) {
            depth--;
            if (depth === 0) annotations.push(value.slice(groupStart + 1, i));
        } else if (depth === 0) {
            kept += char;
        }
    }
    if (depth > 0) annotations.push(value.slice(groupStart + 1));

    return { kept, annotations };
};

export const extractTitleAndTags = (raw: string): { title: string; tags: TitleTag[] } => {
    const decoded = collapseWhitespace(decodeEntities(raw));
    const { kept, annotations } = stripParentheticals(decoded);

    const tags: TitleTag[] = annotations
        .map((annotation) => collapseWhitespace(annotation))
        .filter((text) => text.length > 0)
        .map((text) => ({ type: classifyAnnotation(text), text }));

    let title = collapseWhitespace(kept);
    if (title.startsWith(NT_LIVE_PREFIX)) {
        tags.push({ type: "format", text: "NT Live" });
        while (title.startsWith(NT_LIVE_PREFIX)) {
            title = title.slice(NT_LIVE_PREFIX.length).trim();
        }
    }

    if (!title) return { title: decoded, tags: [] };
    return { title, tags };
};

export const cleanTitle = (raw: string) => extractTitleAndTags(raw).title;

export interface TitleChange {
    rawTitle: string;
    title: string;
    tags: TitleTag[];
    count: number;
}

export const cleanShowingTitles = (showings: Showing[]) => {
    const changes = new Map<string, TitleChange>();

    const cleaned = showings.map((showing) => {
        const { title, tags } = extractTitleAndTags(showing.rawTitle || showing.title);
        if (title === showing.title) return showing;

        const change = changes.get(showing.rawTitle) ?? { rawTitle: showing.rawTitle, title, tags, count: 0 };
        change.count++;
        changes.set(showing.rawTitle, change);

        const { scores: _staleScores, ...rest } = showing;
        return { ...rest, title, titleTags: tags };
    });

    return { showings: cleaned, changes: Array.from(changes.values()) };
};
