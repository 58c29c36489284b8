import {
  scoreBicycles,
  calculatePriceEfficiency,
  getPriceRange,
  weightedSum,
} from '../../engine/scoring';
import { EmptyCatalogError, InvalidOptionError, InvalidRecordError, InvalidWeightError } from '../../models/errors';
import { fleetCatalog, makeBicycle, pairCatalog, samePriceCatalog } from '../fixtures/bicycles';
import {
  conditionOnlyWeights,
  conditionPopularityWeights,
  equalWeights,
  zeroWeights,
} from '../fixtures/weights';

describe('calculatePriceEfficiency', () => {
  it('should give 1 to the cheapest and 0 to the most expensive bicycle', () => {
    const range = { min: 300, max: 1500 };
    expect(calculatePriceEfficiency(300, range)).toBe(1);
    expect(calculatePriceEfficiency(1500, range)).toBe(0);
    expect(calculatePriceEfficiency(600, range)).toBeCloseTo(0.75, 10);
  });

  it('should return 1 for a zero-width price range', () => {
    expect(calculatePriceEfficiency(500, { min: 500, max: 500 })).toBe(1);
  });
});

describe('getPriceRange', () => {
  it('should find min and max prices', () => {
    expect(getPriceRange(fleetCatalog)).toEqual({ min: 300, max: 1500 });
  });
});

describe('scoreBicycles', () => {
  it('should score condition and popularity when price efficiency has no weight', () => {
    const scores = scoreBicycles(pairCatalog, conditionPopularityWeights);

    expect(scores.map((s) => s.bicycleId)).toEqual(['2', '1']);
    expect(scores[0].rawScore).toBeCloseTo(0.75, 10);
    expect(scores[1].rawScore).toBeCloseTo(0.7, 10);
    expect(scores[0].priceEfficiency).toBe(1);
    expect(scores[1].priceEfficiency).toBe(0);
  });

  it('should produce one score per record with contiguous unique ranks', () => {
    const available = fleetCatalog.filter((b) => b.availabilityStatus === 'AVAILABLE');
    const scores = scoreBicycles(available, equalWeights);

    expect(scores).toHaveLength(available.length);
    expect(scores.map((s) => s.rank)).toEqual([1, 2, 3, 4]);
    expect(new Set(scores.map((s) => s.bicycleId)).size).toBe(available.length);
  });

  it('should rank the fleet by normalized weighted score', () => {
    const available = fleetCatalog.filter((b) => b.availabilityStatus === 'AVAILABLE');
    const scores = scoreBicycles(available, equalWeights);

    expect(scores.map((s) => s.bicycleId)).toEqual(['102', '101', '103', '104']);
    expect(scores[0].rawScore).toBeCloseTo(0.9, 10);
    expect(scores[1].rawScore).toBeCloseTo(2.35 / 3, 10);
    expect(scores[2].rawScore).toBeCloseTo(2 / 3, 10);
    expect(scores[3].rawScore).toBeCloseTo(1.6 / 3, 10);
  });

  it('should give every bicycle price efficiency 1 when all prices are equal', () => {
    const scores = scoreBicycles(samePriceCatalog, equalWeights);

    scores.forEach((s) => expect(s.priceEfficiency).toBe(1));
    expect(scores.map((s) => s.bicycleId)).toEqual(['c', 'b', 'a']);
  });

  it('should fall back to equal weighting when all weights are zero', () => {
    const scores = scoreBicycles(pairCatalog, zeroWeights);
    const byId = new Map<string, number>(scores.map((s) => [s.bicycleId, s.rawScore]));

    expect(byId.get('1')).toBeCloseTo(1.4 / 3, 10);
    expect(byId.get('2')).toBeCloseTo(2.5 / 3, 10);
  });

  it('should give the same scores for proportional weights', () => {
    const scaled = scoreBicycles(pairCatalog, { wCondition: 5, wPopularity: 5, wPriceEfficiency: 0 });
    const unit = scoreBicycles(pairCatalog, conditionPopularityWeights);

    expect(scaled.map((s) => s.bicycleId)).toEqual(unit.map((s) => s.bicycleId));
    scaled.forEach((s, i) => expect(s.rawScore).toBeCloseTo(unit[i].rawScore, 12));
  });

  it('should break score ties by lower price, then lower identifier', () => {
    const records = [
      makeBicycle({ id: '7', price: 300, conditionScore: 0.8 }),
      makeBicycle({ id: '5', price: 200, conditionScore: 0.8 }),
      makeBicycle({ id: '3', price: 200, conditionScore: 0.8 }),
    ];
    const scores = scoreBicycles(records, conditionOnlyWeights);

    expect(scores.map((s) => s.bicycleId)).toEqual(['3', '5', '7']);
    expect(scores.map((s) => s.rank)).toEqual([1, 2, 3]);
  });

  it('should tie scores that agree to nine decimal places', () => {
    const records = [
      makeBicycle({ id: 'a', conditionScore: 0.5 }),
      makeBicycle({ id: 'b', conditionScore: 0.5000000006 }),
      makeBicycle({ id: 'c', conditionScore: 0.5000000012 }),
    ];
    const scores = scoreBicycles(records, equalWeights, { combine: (factors) => factors.conditionScore });

    expect(scores.map((s) => s.bicycleId)).toEqual(['b', 'c', 'a']);
    expect(scores[1].rawScore).toBe(0.5000000012);
  });

  it('should compare numeric identifiers by value', () => {
    const records = [
      makeBicycle({ id: '10', conditionScore: 0.4 }),
      makeBicycle({ id: '9', conditionScore: 0.4 }),
    ];
    const scores = scoreBicycles(records, conditionOnlyWeights);

    expect(scores.map((s) => s.bicycleId)).toEqual(['9', '10']);
  });

  it('should accept a custom score combiner', () => {
    const scores = scoreBicycles(pairCatalog, equalWeights, {
      combine: (factors) => factors.conditionScore * factors.popularityScore,
    });
    const byId = new Map<string, number>(scores.map((s) => [s.bicycleId, s.rawScore]));

    expect(byId.get('1')).toBeCloseTo(0.45, 10);
    expect(byId.get('2')).toBeCloseTo(0.54, 10);
    expect(scores[0].bicycleId).toBe('2');
  });

  it('should reject a combiner that returns a non-finite score', () => {
    expect(() => scoreBicycles(pairCatalog, equalWeights, { combine: () => NaN })).toThrow(
      InvalidOptionError
    );
  });

  it('should throw EmptyCatalogError for an empty list', () => {
    expect(() => scoreBicycles([], equalWeights)).toThrow(EmptyCatalogError);
  });

  it('should throw InvalidWeightError for a negative weight', () => {
    expect(() =>
      scoreBicycles(pairCatalog, { wCondition: 1, wPopularity: -0.5, wPriceEfficiency: 1 })
    ).toThrow(InvalidWeightError);
  });

  it('should throw InvalidRecordError for a score outside [0, 1]', () => {
    const records = [makeBicycle({ id: 'x', conditionScore: 1.2 })];
    expect(() => scoreBicycles(records, equalWeights)).toThrow(InvalidRecordError);
  });

  it('should throw InvalidRecordError for duplicate identifiers', () => {
    const records = [makeBicycle({ id: 'x' }), makeBicycle({ id: 'x', price: 50 })];
    expect(() => scoreBicycles(records, equalWeights)).toThrow(/duplicate identifier/);
  });

  it('should not mutate its input', () => {
    const records = pairCatalog.map((b) => ({ ...b }));
    scoreBicycles(records, equalWeights);
    expect(records).toEqual(pairCatalog);
  });
});

describe('weightedSum', () => {
  it('should multiply each factor by its weight', () => {
    const value = weightedSum(
      { conditionScore: 0.5, popularityScore: 1, priceEfficiency: 0 },
      { wCondition: 0.2, wPopularity: 0.3, wPriceEfficiency: 0.5 }
    );
    expect(value).toBeCloseTo(0.4, 10);
  });
});
