/**
 * Trophic Diversity Calculator
 *
 * Computes trophic richness, divergence and evenness indices for each
 * community of an abundance table (Villéger et al. 2008, MEPS 364: 135-146).
 * Mean trophic level follows Pauly & Watson (2005), FDvar Mason et al. (2003),
 * and FROm is modified from Mouillot et al. (2005).
 */

import logger from '../../utils/logger';
import { validateTrophicInputs } from './validation';
import {
    Abundance,
    AbundanceTable,
    CommunityResult,
    ComputationWarning,
    IndexName,
    ResultTable,
    TrophicIndices,
    TrophicLevels,
} from './types';

export interface PresentSpecies {
    abundances: number[];
    levels: number[];
}

export function isPresent(abundance: Abundance): abundance is number {
    // NaN > 0 is false, so NaN counts as missing
    return abundance != null && abundance > 0;
}

/**
 * Round an index value to 3 decimal places
 */
export function roundIndex(value: number): number {
    return Math.round(value * 1000) / 1000;
}

/**
 * Keep only species with a strictly positive abundance, in input order
 */
export function selectPresentSpecies(abundances: Abundance[], levels: number[]): PresentSpecies {
    const present: PresentSpecies = { abundances: [], levels: [] };

    abundances.forEach((abundance, i) => {
        if (isPresent(abundance)) {
            present.abundances.push(abundance);
            present.levels.push(levels[i]);
        }
    });

    return present;
}

export function calculateRelativeAbundances(abundances: number[]): number[] {
    const total = abundances.reduce((a, b) => a + b, 0);
    return abundances.map(a => a / total);
}

function weightedSum(values: number[], weights: number[]): number {
    return values.reduce((sum, value, i) => sum + value * weights[i], 0);
}

/**
 * Abundance weighted mean trophic level (MTI)
 * meantl = Σ(tl_i * p_i)
 */
export function calculateMeanTrophicLevel(levels: number[], relAbundances: number[]): number {
    return roundIndex(weightedSum(levels, relAbundances));
}

/**
 * Abundance weighted standard deviation of trophic levels
 * sdtl = sqrt(Σ(tl_i² * p_i) - meantl²), using the rounded meantl
 */
export function calculateTrophicSd(levels: number[], relAbundances: number[], meantl: number): number {
    const radicand = weightedSum(levels.map(t => t * t), relAbundances) - meantl * meantl;

    if (radicand < 0) {
        logger.debug(`Negative sdtl radicand ${radicand} clamped to 0`, { meantl });
        return 0;
    }

    return roundIndex(Math.sqrt(radicand));
}

/**
 * FDvar, trophic divergence
 * FDvar = 2/π * atan(5 * V), V = weighted variance of ln(tl)
 */
export function calculateFDvar(levels: number[], relAbundances: number[]): number {
    const logLevels = levels.map(t => Math.log(t));
    const mean = weightedSum(logLevels, relAbundances);
    const variance = weightedSum(logLevels.map(l => l * l), relAbundances) - mean * mean;

    return roundIndex((2 / Math.PI) * Math.atan(5 * Math.max(0, variance)));
}

/**
 * FROm, trophic evenness
 *
 * Species are sorted by trophic level, ties by relative abundance, so the
 * result does not depend on column order. Each adjacent pair gets an
 * evenness weight EW = |Δtl| / (p_j + p_j+1). Normalised weights are capped
 * at 1/(S-1) and the sum rescaled to [0, 1].
 *
 * Returns null when fewer than 3 distinct trophic levels are present.
 */
export function calculateFROm(levels: number[], abundances: number[]): number | null {
    if (new Set(levels).size <= 2) return null;

    const total = abundances.reduce((a, b) => a + b, 0);
    const sorted = levels
        .map((level, i) => ({ level, rel: abundances[i] / total }))
        .sort((a, b) => a.level - b.level || a.rel - b.rel);

    const s = sorted.length;
    const reference = 1 / (s - 1);

    const weights: number[] = [];
    for (let j = 0; j < s - 1; j++) {
        const next = sorted[j + 1];
        const current = sorted[j];
        weights.push(Math.abs(next.level - current.level) / (next.rel + current.rel));
    }

    const weightTotal = weights.reduce((a, b) => a + b, 0);
    const capped = weights.reduce((sum, w) => sum + Math.min(w / weightTotal, reference), 0);

    return roundIndex((capped - reference) / (1 - reference));
}

/**
 * Calculate all ten indices for one community.
 * Returns null when no species is present.
 */
export function calculateCommunityIndices(abundances: Abundance[], levels: number[]): TrophicIndices | null {
    const present = selectPresentSpecies(abundances, levels);
    if (present.abundances.length === 0) return null;

    const abtot = present.abundances.reduce((a, b) => a + b, 0);
    const mintl = present.levels.reduce((min, t) => Math.min(min, t), Infinity);
    const maxtl = present.levels.reduce((max, t) => Math.max(max, t), -Infinity);
    const relAbundances = calculateRelativeAbundances(present.abundances);
    const meantl = calculateMeanTrophicLevel(present.levels, relAbundances);

    return {
        abtot,
        nbsp: present.abundances.length,
        nbtl: new Set(present.levels).size,
        mintl,
        maxtl,
        rgetl: maxtl - mintl,
        meantl,
        sdtl: calculateTrophicSd(present.levels, relAbundances, meantl),
        FDvar: calculateFDvar(present.levels, relAbundances),
        FROm: calculateFROm(present.levels, present.abundances),
    };
}

/**
 * Compute trophic diversity indices for every community of an abundance table.
 *
 * Inputs are validated once up front; a community with no present species
 * yields a row with null indices and a NO_SPECIES_PRESENT warning.
 */
export function computeTrophicDiversity(ab: AbundanceTable, tl: TrophicLevels): ResultTable {
    const levels = validateTrophicInputs(ab, tl);

    logger.debug(`Computing trophic diversity for ${ab.communities.length} communities x ${ab.species.length} species`);

    const warnings: ComputationWarning[] = [];
    const rows: CommunityResult[] = ab.values.map((row, index) => {
        const community = ab.communities[index];
        const indices = calculateCommunityIndices(row, levels);

        if (indices == null) {
            const message = `No species present in community "${community}"`;
            logger.warn(message, { row: index });
            warnings.push({ code: 'NO_SPECIES_PRESENT', community, row: index, message });
        }

        return { community, indices };
    });

    return { rows, warnings };
}

/**
 * Extract one index as a column, in community order
 */
export function getIndexColumn(table: ResultTable, name: IndexName): Array<number | null> {
    return table.rows.map(row => (row.indices ? row.indices[name] : null));
}

export default {
    isPresent,
    roundIndex,
    selectPresentSpecies,
    calculateRelativeAbundances,
    calculateMeanTrophicLevel,
    calculateTrophicSd,
    calculateFDvar,
    calculateFROm,
    calculateCommunityIndices,
    computeTrophicDiversity,
    getIndexColumn,
};
