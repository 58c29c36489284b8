import { BicycleRecord } from "../models/BicycleRecord";

/**
 * Immutable view of the catalog for one planning run.
 */
export type CatalogSnapshot = ReadonlyArray<Readonly<BicycleRecord>>;

/**
 * A rental entry from the rental ledger; `returnDate` is null while the bicycle is out.
 */
export interface RentalEntry {
  bicycleId: string;
  returnDate: string | null;
}

/**
 * Copy and freeze records so a planning run never holds a live handle on shared state.
 */
export function createCatalogSnapshot(records: readonly BicycleRecord[]): CatalogSnapshot {
  return Object.freeze(records.map((record) => Object.freeze({ ...record })));
}

/**
 * Marks AVAILABLE bicycles with an open rental (no return date) as RENTED.
 * OUT_OF_SERVICE records keep their status. Returns new records.
 */
export function applyOpenRentals(
  records: readonly BicycleRecord[],
  rentals: readonly RentalEntry[]
): BicycleRecord[] {
  const openRentals = new Set(
    rentals.filter((rental) => rental.returnDate === null).map((rental) => rental.bicycleId)
  );

  return records.map((record): BicycleRecord =>
    record.availabilityStatus === "AVAILABLE" && openRentals.has(record.id)
      ? { ...record, availabilityStatus: "RENTED" }
      : { ...record }
  );
}
