import { ScoreSource } from "src/utils/types";

export interface SourceScores {
    rottenTomatoes?: number | null;
    metacritic?: number | null;
    /** 0-10 */
    imdb?: number | null;
}

const WEIGHTS: Record<ScoreSource, number> = {
    rottenTomatoes: 3,
    metacritic: 2,
    imdb: 1,
};

const SOURCE_ORDER: ScoreSource[] = ["rottenTomatoes", "metacritic", "imdb"];

const isPresent = (value: number | null | undefined): value is number => {
    return typeof value === "number" && Number.isFinite(value);
};

const normalize = (source: ScoreSource, value: number) => (source === "imdb" ? value * 10 : value);

export const availableScoreSources = (scores: SourceScores): ScoreSource[] => {
    return SOURCE_ORDER.filter((source) => isPresent(scores[source]));
};

/**
 * Weighted mean on a 0-100 scale over the sources that are present.
 * Returns `null` when there is nothing to average.
 */
export const computeCompositeScore = (scores: SourceScores): number | null => {
    let weightedTotal = 0;
    let totalWeight = 0;

    for (const source of SOURCE_ORDER) {
        const value = scores[source];
        if (!isPresent(value)) continue;
        weightedTotal += normalize(source, value) * WEIGHTS[source];
        totalWeight += WEIGHTS[source];
    }

    if (totalWeight === 0) return null;
    return Math.round((weightedTotal / totalWeight) * 10) / 10;
};
