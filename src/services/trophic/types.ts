/**
 * Data model shared by the trophic diversity engine and its callers.
 */

// null (or NaN) marks a missing abundance; it is never treated as zero
export type Abundance = number | null;

export interface AbundanceTable {
    communities: string[];      // Row labels
    species: string[];          // Column labels, same order as TrophicLevels.species
    values: Abundance[][];      // communities.length x species.length
}

export interface TrophicLevels {
    species: string[];
    levels: Array<number | null>;
}

export const INDEX_NAMES = [
    'abtot',
    'nbsp',
    'nbtl',
    'mintl',
    'maxtl',
    'rgetl',
    'meantl',
    'sdtl',
    'FDvar',
    'FROm',
] as const;

export type IndexName = typeof INDEX_NAMES[number];

export interface TrophicIndices {
    abtot: number;             // Total abundance of present species
    nbsp: number;              // Number of present species
    nbtl: number;              // Number of distinct trophic levels
    mintl: number;
    maxtl: number;
    rgetl: number;             // Range of trophic levels
    meantl: number;            // Abundance weighted mean trophic level (MTI)
    sdtl: number;              // Abundance weighted standard deviation
    FDvar: number;             // Trophic divergence, [0, 1)
    FROm: number | null;       // Trophic evenness, [0, 1]; null below 3 distinct levels
}

export interface CommunityResult {
    community: string;
    indices: TrophicIndices | null;     // null when no species is present
}

export interface ComputationWarning {
    code: 'NO_SPECIES_PRESENT';
    community: string;
    row: number;
    message: string;
}

export interface ResultTable {
    rows: CommunityResult[];
    warnings: ComputationWarning[];
}
