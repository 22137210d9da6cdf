/**
 * Structural checks run once before any community is computed.
 */

import logger from '../../utils/logger';
import { AbundanceTable, TrophicLevels } from './types';
import {
    DimensionMismatchError,
    InvalidInputError,
    NameMismatchError,
    TrophicInputError,
} from './errors';

function fail(error: TrophicInputError): never {
    logger.error(`Trophic diversity input rejected: ${error.message}`, {
        code: error.code,
        details: error.details,
    });
    throw error;
}

function checkDimensions(ab: AbundanceTable, tl: TrophicLevels): void {
    const speciesCount = ab.species.length;

    if (tl.levels.length !== speciesCount || tl.species.length !== tl.levels.length) {
        fail(new DimensionMismatchError(
            `Number of species differs: abundance table has ${speciesCount}, trophic levels has ${tl.levels.length}`,
            {
                check: 'speciesCount',
                abundanceSpecies: speciesCount,
                trophicLevels: tl.levels.length,
                trophicSpecies: tl.species.length,
            }
        ));
    }

    if (ab.values.length !== ab.communities.length) {
        fail(new DimensionMismatchError(
            `Abundance table has ${ab.values.length} rows for ${ab.communities.length} communities`,
            { check: 'communityCount', rows: ab.values.length, communities: ab.communities.length }
        ));
    }

    ab.values.forEach((row, index) => {
        if (row.length !== speciesCount) {
            fail(new DimensionMismatchError(
                `Community "${ab.communities[index]}" has ${row.length} abundances, expected ${speciesCount}`,
                { check: 'rowWidth', row: index, community: ab.communities[index], width: row.length, expected: speciesCount }
            ));
        }
    });
}

function checkMissingLevels(tl: TrophicLevels): void {
    const missing = tl.species.filter((_, i) => {
        const level = tl.levels[i];
        return level == null || Number.isNaN(level);
    });

    if (missing.length > 0) {
        fail(new InvalidInputError(
            `Missing trophic levels are not allowed (species: ${missing.join(', ')})`,
            { check: 'missingTrophicLevel', species: missing }
        ));
    }
}

function isSpeciesPresent(ab: AbundanceTable, column: number): boolean {
    return ab.values.some((row) => {
        const value = row[column];
        return value != null && value > 0;
    });
}

/**
 * Narrows the trophic levels to numbers, rejecting values the indices
 * cannot be computed from. Levels of species absent from every community
 * never enter the computation and are passed through.
 */
function toTrophicLevelValues(ab: AbundanceTable, tl: TrophicLevels): number[] {
    return tl.levels.map((level, i) => {
        // FDvar takes the logarithm of each level
        const usable = level != null && Number.isFinite(level) && level > 0;
        if (level != null && (usable || !isSpeciesPresent(ab, i))) return level;

        return fail(new InvalidInputError(
            `Trophic level of species "${tl.species[i]}" must be a positive finite number, got ${level}`,
            { check: 'trophicLevelRange', species: tl.species[i], value: level }
        ));
    });
}

function checkSpeciesNames(ab: AbundanceTable, tl: TrophicLevels): void {
    const position = tl.species.findIndex((name, i) => name !== ab.species[i]);

    if (position !== -1) {
        fail(new NameMismatchError(
            `Species names differ at position ${position}: "${ab.species[position]}" in abundance table, "${tl.species[position]}" in trophic levels`,
            {
                check: 'speciesNames',
                position,
                abundanceSpecies: ab.species[position],
                trophicSpecies: tl.species[position],
            }
        ));
    }
}

function checkAbundances(ab: AbundanceTable): void {
    ab.values.forEach((row, rowIndex) => {
        row.forEach((value, column) => {
            if (value == null || Number.isNaN(value)) return;
            if (value < 0 || !Number.isFinite(value)) {
                fail(new InvalidInputError(
                    `Abundance of species "${ab.species[column]}" in community "${ab.communities[rowIndex]}" must be a non-negative finite number, got ${value}`,
                    {
                        check: 'abundanceRange',
                        row: rowIndex,
                        community: ab.communities[rowIndex],
                        species: ab.species[column],
                        value,
                    }
                ));
            }
        });
    });
}

/**
 * Validates both input tables and returns the trophic levels as plain numbers.
 *
 * Checks run in a fixed order: dimensions, missing trophic levels,
 * species names, then value ranges of present species.
 */
export function validateTrophicInputs(ab: AbundanceTable, tl: TrophicLevels): number[] {
    checkDimensions(ab, tl);
    checkMissingLevels(tl);
    checkSpeciesNames(ab, tl);
    const levels = toTrophicLevelValues(ab, tl);
    checkAbundances(ab);
    return levels;
}
