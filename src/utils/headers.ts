import UserAgent from "user-agents";

const FALLBACK_CHROME_VERSION = "120";

export const generateHeaders = (pageUrl?: string) => {
    const userAgent = new UserAgent([/Chrome/, { deviceCategory: "desktop" }]).toString();
    const chromeVersion = userAgent.match(/Chrom(?:e|ium)\/(\d+)/i)?.[1] ?? FALLBACK_CHROME_VERSION;

    let origin: string | null = null;
    if (pageUrl) {
        try {
            origin = new URL(pageUrl).origin;
        } catch {
            origin = null;
        }
    }

    return {
        "User-Agent": userAgent,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "en-GB,en;q=0.9",
        "Cache-Control": "no-cache",
        "Sec-CH-UA": `"Chromium";v="${chromeVersion}", "Google Chrome";v="${chromeVersion}"`,
        "Sec-CH-UA-Mobile": "?0",
        "Sec-Fetch-Dest": "document",
        "Sec-Fetch-Mode": "navigate",
        "Sec-Fetch-Site": origin ? "same-origin" : "none",
        ...(origin ? { Referer: `${origin}/` } : {}),
    };
};
