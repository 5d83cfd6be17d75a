/**
 * Nutrition Knowledge Store
 *
 * In-memory, read-only table of per-100g nutrition records keyed by canonical
 * food name, loaded once from the nutrition CSV. Derives per-serving features
 * (scaled macros + glycemic load) on demand.
 */

import { readFile } from "fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { normalizeFoodName } from "./canonicalize";
import { GlycemicError } from "./glycemic-error";
import { DECIMAL_PATTERN, DEFAULT_SERVING_SIZE, parseServingSize } from "./serving";
import {
  REQUIRED_RECORD_FIELDS,
  type FoodRecord,
  type NutritionFeatures,
  type RequiredRecordField,
  type SourceColumn,
  type SourceRow,
} from "@/types/nutrition";

// ---------------------------------------------------------------------------
// Row parsing
// ---------------------------------------------------------------------------

const SourceRowSchema = z.record(z.string(), z.string());

/** CSV column reported when a record field is missing. */
const FIELD_COLUMNS: Record<RequiredRecordField, SourceColumn> = {
  glycemicIndex: "glycemic_index",
  carbohydrates: "carbohydrates",
  fiber: "fiber",
  protein: "protein",
  fat: "fat",
  processingLevel: "processing_level",
  servingSizeGrams: "serving_size_grams",
};

/** Empty, malformed or negative cells are absent (null), never zero. */
function parseAmountCell(cell: string | undefined): number | null {
  const text = cell?.trim() ?? "";
  if (!DECIMAL_PATTERN.test(text)) return null;
  const value = Number(text);
  if (!Number.isFinite(value) || value < 0) return null;
  return value;
}

function parseTextCell(cell: string | undefined): string | null {
  const text = cell?.trim() ?? "";
  return text || null;
}

export function parseSourceRow(row: SourceRow): FoodRecord | null {
  const canonicalName = normalizeFoodName(row.name ?? "");
  if (!canonicalName) return null;

  const servingSizeGrams = parseAmountCell(row.serving_size_grams);

  return Object.freeze({
    canonicalName,
    glycemicIndex: parseAmountCell(row.glycemic_index),
    carbohydrates: parseAmountCell(row.carbohydrates),
    fiber: parseAmountCell(row.fiber),
    protein: parseAmountCell(row.protein),
    fat: parseAmountCell(row.fat),
    processingLevel: parseTextCell(row.processing_level),
    // "1 serving" has to weigh something
    servingSizeGrams: servingSizeGrams !== null && servingSizeGrams > 0 ? servingSizeGrams : null,
  });
}

function missingFields(record: FoodRecord): string[] {
  return REQUIRED_RECORD_FIELDS.filter((field) => record[field] === null).map(
    (field) => FIELD_COLUMNS[field]
  );
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class KnowledgeStore {
  private readonly records: Map<string, FoodRecord>;
  private readonly duplicates: Map<string, number>;

  private constructor(records: Map<string, FoodRecord>, duplicates: Map<string, number>) {
    this.records = records;
    this.duplicates = duplicates;
  }

  /**
   * Read and parse the nutrition CSV at `path`.
   * Fails with SOURCE_UNAVAILABLE if the file cannot be read or parsed.
   */
  static async load(path: string): Promise<KnowledgeStore> {
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (error) {
      throw new GlycemicError({
        kind: "SOURCE_UNAVAILABLE",
        path,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    return KnowledgeStore.fromCsv(text, path);
  }

  /**
   * Build a store from CSV text with a header row. Later rows whose names
   * normalize to an existing key replace the earlier record.
   */
  static fromCsv(text: string, source = "<inline>"): KnowledgeStore {
    let header: string[] = [];
    let raw: unknown[];
    try {
      raw = parse(text, {
        bom: true,
        columns: (columns: string[]) => {
          header = columns.map((c) => c.trim().toLowerCase());
          return header;
        },
        skip_empty_lines: true,
        relax_column_count: true,
      });
    } catch (error) {
      throw new GlycemicError({
        kind: "SOURCE_UNAVAILABLE",
        path: source,
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    if (!header.includes("name")) {
      throw new GlycemicError({
        kind: "SOURCE_UNAVAILABLE",
        path: source,
        reason: "missing 'name' column",
      });
    }

    const records = new Map<string, FoodRecord>();
    const duplicates = new Map<string, number>();

    for (const row of raw) {
      const record = parseSourceRow(SourceRowSchema.parse(row));
      if (!record) continue;

      const key = record.canonicalName;
      if (records.has(key)) {
        duplicates.set(key, (duplicates.get(key) ?? 1) + 1);
      }
      records.set(key, record);
    }

    if (duplicates.size > 0) {
      const sample = [...duplicates]
        .slice(0, 10)
        .map(([name, count]) => `${name} (${count}x)`)
        .join(", ");
      console.warn(
        `[KnowledgeStore] ${duplicates.size} duplicate food names in ${source}, last row wins: ${sample}`
      );
    }

    return new KnowledgeStore(records, duplicates);
  }

  get size(): number {
    return this.records.size;
  }

  normalize(name: string): string {
    return normalizeFoodName(name);
  }

  has(name: string): boolean {
    return this.records.has(normalizeFoodName(name));
  }

  /** Canonical names in load order. */
  listNames(): string[] {
    return [...this.records.keys()];
  }

  /** Copy of the name → record table; records themselves are frozen. */
  getAllFoods(): Map<string, FoodRecord> {
    return new Map(this.records);
  }

  getRecord(name: string): FoodRecord | null {
    return this.records.get(normalizeFoodName(name)) ?? null;
  }

  /** Names that appeared more than once in the source, with their row counts. */
  duplicateNames(): Map<string, number> {
    return new Map(this.duplicates);
  }

  /**
   * Per-serving features for a food.
   *
   * Macros scale linearly with the serving mass; GI does not scale, and
   * GL = GI × scaled carbohydrates / 100.
   */
  getFeatures(queryName: string, servingSize: string = DEFAULT_SERVING_SIZE): NutritionFeatures {
    const record = this.records.get(normalizeFoodName(queryName));
    if (!record) {
      throw new GlycemicError({ kind: "NOT_FOUND", foodName: queryName });
    }

    const {
      glycemicIndex,
      carbohydrates,
      fiber,
      protein,
      fat,
      processingLevel,
      servingSizeGrams,
    } = record;
    if (
      glycemicIndex === null ||
      carbohydrates === null ||
      fiber === null ||
      protein === null ||
      fat === null ||
      processingLevel === null ||
      servingSizeGrams === null
    ) {
      throw new GlycemicError({
        kind: "MISSING_DATA",
        foodName: record.canonicalName,
        missingFields: missingFields(record),
      });
    }

    const grams = parseServingSize(servingSize, servingSizeGrams);
    const scale = grams / 100;
    const scaledCarbohydrates = carbohydrates * scale;

    return {
      glycemicIndex,
      glycemicLoad: (glycemicIndex * scaledCarbohydrates) / 100,
      carbohydrates: scaledCarbohydrates,
      fiber: fiber * scale,
      protein: protein * scale,
      fat: fat * scale,
      processingLevel,
      servingSizeGrams: grams,
    };
  }
}
