import { compareBicycleIds, isAvailable, matchesFilters } from '../../models/BicycleRecord';
import { makeBicycle } from '../fixtures/bicycles';

describe('isAvailable', () => {
  it('should only accept AVAILABLE bicycles', () => {
    expect(isAvailable(makeBicycle({ id: '1' }))).toBe(true);
    expect(isAvailable(makeBicycle({ id: '2', availabilityStatus: 'RENTED' }))).toBe(false);
    expect(isAvailable(makeBicycle({ id: '3', availabilityStatus: 'OUT_OF_SERVICE' }))).toBe(false);
  });
});

describe('matchesFilters', () => {
  const bike = makeBicycle({ id: '1', type: 'road', frameSize: 54, conditionScore: 0.7 });

  it('should match everything with no filters', () => {
    expect(matchesFilters(bike)).toBe(true);
    expect(matchesFilters(bike, { types: [], frameSizes: [] })).toBe(true);
  });

  it('should filter by type', () => {
    expect(matchesFilters(bike, { types: ['road', 'hybrid'] })).toBe(true);
    expect(matchesFilters(bike, { types: ['mountain'] })).toBe(false);
  });

  it('should filter by numeric and letter frame sizes', () => {
    expect(matchesFilters(bike, { frameSizes: [54] })).toBe(true);
    expect(matchesFilters(bike, { frameSizes: ['M', 56] })).toBe(false);
  });

  it('should treat minCondition as inclusive', () => {
    expect(matchesFilters(bike, { minCondition: 0.7 })).toBe(true);
    expect(matchesFilters(bike, { minCondition: 0.71 })).toBe(false);
  });
});

describe('compareBicycleIds', () => {
  it('should order numeric ids by value', () => {
    expect(['10', '9', '100'].sort(compareBicycleIds)).toEqual(['9', '10', '100']);
  });

  it('should order other ids lexically', () => {
    expect(['b2', 'a10', 'a2'].sort(compareBicycleIds)).toEqual(['a10', 'a2', 'b2']);
  });

  it('should return 0 for equal ids', () => {
    expect(compareBicycleIds('7', '7')).toBe(0);
  });
});
