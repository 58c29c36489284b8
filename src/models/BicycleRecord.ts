/**
 * Bicycle catalog data structures
 */

export const BICYCLE_TYPES = [
  "road",
  "mountain",
  "hybrid",
  "electric",
  "city",
  "single-gear",
] as const;

export type BicycleType = (typeof BICYCLE_TYPES)[number];

export const LETTER_FRAME_SIZES = ["S", "M", "L", "XL"] as const;

/**
 * Frame size is either a letter size or a numeric size in centimetres.
 */
export type FrameSize = (typeof LETTER_FRAME_SIZES)[number] | number;

export type AvailabilityStatus = "AVAILABLE" | "RENTED" | "OUT_OF_SERVICE";

export interface BicycleRecord {
  id: string;
  brand: string;
  frameSize: FrameSize;
  type: BicycleType;
  price: number;
  conditionScore: number; // 0-1, higher = better condition
  popularityScore: number; // 0-1, higher = rented more often
  availabilityStatus: AvailabilityStatus;
}

/**
 * Buyer filters applied before scoring.
 * An omitted or empty list does not restrict that attribute.
 */
export interface BicycleFilters {
  types?: BicycleType[];
  frameSizes?: FrameSize[];
  minCondition?: number;
}

export function isAvailable(record: BicycleRecord): boolean {
  return record.availabilityStatus === "AVAILABLE";
}

/**
 * Check whether a record satisfies the buyer filters (status is not checked here)
 */
export function matchesFilters(record: BicycleRecord, filters: BicycleFilters = {}): boolean {
  if (filters.types && filters.types.length > 0 && !filters.types.includes(record.type)) {
    return false;
  }
  if (
    filters.frameSizes &&
    filters.frameSizes.length > 0 &&
    !filters.frameSizes.includes(record.frameSize)
  ) {
    return false;
  }
  if (filters.minCondition !== undefined && record.conditionScore < filters.minCondition) {
    return false;
  }
  return true;
}

/**
 * Compare bicycle identifiers. Purely numeric ids compare by value,
 * anything else compares by code unit order.
 */
export function compareBicycleIds(a: string, b: string): number {
  const numericA = /^\d+$/.test(a);
  const numericB = /^\d+$/.test(b);
  if (numericA && numericB) {
    const diff = Number(a) - Number(b);
    if (diff !== 0) {
      return diff;
    }
  }
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
