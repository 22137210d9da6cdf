/**
 * Trophic Diversity Services Index
 */

import trophicDiversity from './trophicDiversity';
export { trophicDiversity };
export {
    computeTrophicDiversity,
    calculateCommunityIndices,
    getIndexColumn,
} from './trophicDiversity';
export type { PresentSpecies } from './trophicDiversity';

export { validateTrophicInputs } from './validation';

export {
    TrophicInputError,
    DimensionMismatchError,
    InvalidInputError,
    NameMismatchError,
} from './errors';
export type { TrophicErrorCode } from './errors';

export { INDEX_NAMES } from './types';
export type {
    Abundance,
    AbundanceTable,
    TrophicLevels,
    IndexName,
    TrophicIndices,
    CommunityResult,
    ComputationWarning,
    ResultTable,
} from './types';

export default trophicDiversity;
