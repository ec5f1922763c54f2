/**
 * Token + semantic score combination and confidence bands.
 */
import { ConfigurationError } from "../errors.js";
import { clamp, roundScore } from "../utils/math.js";
import type { Band } from "../models/FilePairScore.js";

export interface ScoreWeights {
    token: number;
    semantic: number;
}

/**
 * Lower bounds of each band. Anything under `medium` is `low`.
 */
export interface BandThresholds {
    critical: number;
    high: number;
    medium: number;
}

export interface CombineOptions {
    weights: ScoreWeights;
    bands: BandThresholds;
}

export const DEFAULT_WEIGHTS: Readonly<ScoreWeights> = Object.freeze({ token: 0.5, semantic: 0.5 });

export const DEFAULT_BANDS: Readonly<BandThresholds> = Object.freeze({
    critical: 0.95,
    high: 0.8,
    medium: 0.65,
});

const WEIGHT_TOLERANCE = 1e-9;

export function validateWeights(weights: ScoreWeights): void {
    const { token, semantic } = weights;
    if (!Number.isFinite(token) || !Number.isFinite(semantic) || token < 0 || semantic < 0) {
        throw new ConfigurationError(`Score weights must be non-negative numbers (token=${token}, semantic=${semantic})`);
    }
    if (Math.abs(token + semantic - 1) > WEIGHT_TOLERANCE) {
        throw new ConfigurationError(`Score weights must sum to 1 (token=${token}, semantic=${semantic})`);
    }
}

export function validateBands(bands: BandThresholds): void {
    const { critical, high, medium } = bands;
    for (const [name, value] of Object.entries(bands)) {
        if (!Number.isFinite(value) || value <= 0 || value > 1) {
            throw new ConfigurationError(`Band threshold "${name}" must be in (0, 1], got ${value}`);
        }
    }
    if (!(critical > high && high > medium)) {
        throw new ConfigurationError(
            `Band thresholds must be ordered critical > high > medium (got ${critical}, ${high}, ${medium})`
        );
    }
}

export function classifyBand(score: number, bands: BandThresholds = DEFAULT_BANDS): Band {
    if (score >= bands.critical) return "critical";
    if (score >= bands.high) return "high";
    if (score >= bands.medium) return "medium";
    return "low";
}

/**
 * Weighted sum of the two scores, plus its band. Deterministic and
 * non-decreasing in each input. Options are assumed validated.
 */
export function combine(
    tokenScore: number,
    semanticScore: number,
    options: CombineOptions = { weights: DEFAULT_WEIGHTS, bands: DEFAULT_BANDS }
): { combinedScore: number; band: Band } {
    const { weights, bands } = options;
    const combinedScore = roundScore(
        clamp(weights.token * clamp(tokenScore, 0, 1) + weights.semantic * clamp(semanticScore, 0, 1), 0, 1)
    );

    return { combinedScore, band: classifyBand(combinedScore, bands) };
}
