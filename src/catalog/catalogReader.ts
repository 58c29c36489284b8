import * as fs from "fs";
import * as path from "path";
import { BicycleRecord } from "../models/BicycleRecord";
import { CatalogSchema } from "../utils/validation";
import { CatalogSnapshot, createCatalogSnapshot } from "./catalogSnapshot";

/**
 * Source of catalog data for the planner. Every call returns a fresh snapshot.
 */
export interface CatalogReader {
  read(): Promise<CatalogSnapshot>;
}

export class InMemoryCatalogReader implements CatalogReader {
  private records: BicycleRecord[];

  constructor(records: readonly BicycleRecord[]) {
    this.records = records.map((record) => ({ ...record }));
  }

  async read(): Promise<CatalogSnapshot> {
    return createCatalogSnapshot(this.records);
  }
}

/**
 * Reads a JSON array of bicycle records from disk.
 */
export class JsonFileCatalogReader implements CatalogReader {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async read(): Promise<CatalogSnapshot> {
    const raw = await fs.promises.readFile(this.filePath, "utf-8");

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Catalog file "${this.filePath}" is not valid JSON: ${message}`);
    }

    const parsed = CatalogSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new Error(`Catalog file "${this.filePath}" is invalid: ${issues}`);
    }

    return createCatalogSnapshot(parsed.data);
  }
}
