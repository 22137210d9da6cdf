/**
* Trophic Diversity Tests - Jest
*
* Run: npm test
*/

import {
  computeTrophicDiversity,
  getIndexColumn,
  AbundanceTable,
  TrophicLevels,
} from '../src';
import logger from '../src/utils/logger';

const levels: TrophicLevels = {
  species: ['sp1', 'sp2', 'sp3'],
  levels: [2.0, 3.0, 4.0],
};

function table(values: AbundanceTable['values'], species = levels.species): AbundanceTable {
  return {
    communities: values.map((_, i) => `com${i + 1}`),
    species,
    values,
  };
}

describe('computeTrophicDiversity', () => {
  describe('two communities with one and two present species', () => {
    const result = computeTrophicDiversity(table([[10, 0, 5], [0, 20, 0]]), levels);

    it('should keep community order and labels', () => {
      expect(result.rows.map(r => r.community)).toEqual(['com1', 'com2']);
      expect(result.warnings).toEqual([]);
    });

    it('should compute richness and weighted indices for the first community', () => {
      expect(result.rows[0].indices).toEqual({
        abtot: 15,
        nbsp: 2,
        nbtl: 2,
        mintl: 2,
        maxtl: 4,
        rgetl: 2,
        meantl: 2.667,
        sdtl: 0.942,
        FDvar: 0.312,
        FROm: null,
      });
    });

    it('should compute a single-species community', () => {
      expect(result.rows[1].indices).toEqual({
        abtot: 20,
        nbsp: 1,
        nbtl: 1,
        mintl: 3,
        maxtl: 3,
        rgetl: 0,
        meantl: 3,
        sdtl: 0,
        FDvar: 0,
        FROm: null,
      });
    });
  });

  it('should yield FROm = 1 for evenly spaced levels with equal abundances', () => {
    const result = computeTrophicDiversity(table([[10, 10, 10]]), levels);
    const indices = result.rows[0].indices;

    expect(indices).not.toBeNull();
    expect(indices?.FROm).toBe(1);
    expect(indices?.meantl).toBe(3);
    expect(indices?.sdtl).toBe(0.816);
    expect(indices?.FDvar).toBe(0.245);
  });

  it('should ignore missing abundances and compute FROm with four levels', () => {
    const ab: AbundanceTable = {
      communities: ['lagoon'],
      species: ['a', 'b', 'c', 'd', 'e'],
      values: [[40, null, 30, 20, 10]],
    };
    const tl: TrophicLevels = {
      species: ['a', 'b', 'c', 'd', 'e'],
      levels: [2.0, 2.5, 3.0, 3.5, 4.5],
    };

    const indices = computeTrophicDiversity(ab, tl).rows[0].indices;

    expect(indices).toEqual({
      abtot: 100,
      nbsp: 4,
      nbtl: 4,
      mintl: 2,
      maxtl: 4.5,
      rgetl: 2.5,
      meantl: 2.85,
      sdtl: 0.808,
      FDvar: 0.239,
      FROm: 0.632,
    });
  });

  it('should give the same row when species sharing a level are swapped', () => {
    const tl: TrophicLevels = {
      species: ['a', 'b', 'c', 'd'],
      levels: [2.2, 3.1, 3.1, 4.0],
    };
    const swappedTl: TrophicLevels = {
      species: ['a', 'c', 'b', 'd'],
      levels: [2.2, 3.1, 3.1, 4.0],
    };

    const forward = computeTrophicDiversity(
      { communities: ['pond'], species: tl.species, values: [[1, 2, 3, 4]] },
      tl
    );
    const swapped = computeTrophicDiversity(
      { communities: ['pond'], species: swappedTl.species, values: [[1, 3, 2, 4]] },
      swappedTl
    );

    expect(swapped).toEqual(forward);
    expect(getIndexColumn(swapped, 'FROm')[0]).toBeCloseTo(0.45, 3);
  });

  it('should handle a community with many present species', () => {
    const count = 200000;
    const species = Array.from({ length: count }, (_, i) => `sp${i}`);
    const result = computeTrophicDiversity(
      { communities: ['ocean'], species, values: [species.map(() => 1)] },
      { species, levels: species.map((_, i) => (i % 2 === 0 ? 2.0 : 4.0)) }
    );

    expect(result.rows[0].indices?.nbsp).toBe(count);
    expect(result.rows[0].indices?.mintl).toBe(2);
    expect(result.rows[0].indices?.maxtl).toBe(4);
  });

  it('should treat NaN abundances as missing', () => {
    const result = computeTrophicDiversity(table([[NaN, 20, 0]]), levels);
    expect(result.rows[0].indices?.nbsp).toBe(1);
    expect(result.rows[0].indices?.abtot).toBe(20);
  });

  it('should leave FROm null with only two distinct levels among three species', () => {
    const ab: AbundanceTable = {
      communities: ['reef'],
      species: ['a', 'b', 'c', 'd'],
      values: [[5, 5, 10, 0]],
    };
    const tl: TrophicLevels = {
      species: ['a', 'b', 'c', 'd'],
      levels: [2.0, 2.0, 3.5, 4.0],
    };

    const indices = computeTrophicDiversity(ab, tl).rows[0].indices;

    expect(indices?.nbsp).toBe(3);
    expect(indices?.nbtl).toBe(2);
    expect(indices?.maxtl).toBe(3.5);
    expect(indices?.meantl).toBe(2.75);
    expect(indices?.sdtl).toBe(0.75);
    expect(indices?.FROm).toBeNull();
  });

  describe('communities without present species', () => {
    it('should return a null row and a warning without aborting other rows', () => {
      const warnSpy = jest.spyOn(logger, 'warn');
      const result = computeTrophicDiversity(table([[0, null, 0], [10, 0, 5]]), levels);

      expect(result.rows[0]).toEqual({ community: 'com1', indices: null });
      expect(result.rows[1].indices?.abtot).toBe(15);
      expect(result.warnings).toEqual([
        {
          code: 'NO_SPECIES_PRESENT',
          community: 'com1',
          row: 0,
          message: 'No species present in community "com1"',
        },
      ]);
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    it('should report null for every index column of an empty row', () => {
      const result = computeTrophicDiversity(table([[0, 0, 0]]), levels);
      expect(getIndexColumn(result, 'abtot')).toEqual([null]);
      expect(getIndexColumn(result, 'FROm')).toEqual([null]);
    });
  });

  it('should return an empty table when there are no communities', () => {
    expect(computeTrophicDiversity(table([]), levels)).toEqual({ rows: [], warnings: [] });
  });
});

describe('getIndexColumn', () => {
  it('should read one index across communities', () => {
    const result = computeTrophicDiversity(table([[10, 0, 5], [0, 20, 0], [10, 10, 10]]), levels);

    expect(getIndexColumn(result, 'nbsp')).toEqual([2, 1, 3]);
    expect(getIndexColumn(result, 'meantl')).toEqual([2.667, 3, 3]);
    expect(getIndexColumn(result, 'FROm')).toEqual([null, null, 1]);
  });
});
