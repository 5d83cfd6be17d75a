#!/usr/bin/env npx tsx
/**
 * Interactive food safety check
 *
 * Type a food name, pick the intended food from the ranked matches
 * ("next" pages further), give a serving size and read back the
 * nutrition features and the safe / caution / unsafe verdict.
 *
 * Usage:
 *   npx tsx scripts/glycemic-check.ts
 *   npx tsx scripts/glycemic-check.ts --data data/nutrition_data.csv --top-k 5
 *
 * Environment (.env.local): NUTRITION_DATA_PATH, EMBEDDING_API_URL,
 * EMBEDDING_API_KEY, EMBEDDING_MODEL, *_THRESHOLD overrides.
 */

import { config } from "dotenv";
config({ path: ".env.local" });

import { createInterface, type Interface } from "readline/promises";
import { loadConfig } from "../src/lib/config";
import { createRuntime, type GlycemicRuntime } from "../src/lib/glycemic";
import { isGlycemicError } from "../src/lib/glycemic-error";
import { formatValue } from "../src/lib/safety-rules";
import { DEFAULT_SERVING_SIZE } from "../src/lib/serving";
import type { SafetyAssessment, SafetyLabel } from "../src/types/nutrition";

const RULE = "=".repeat(50);

const LABEL_SYMBOLS: Record<SafetyLabel, string> = {
  safe: "✓",
  caution: "⚠",
  unsafe: "✗",
};

/**
 * Exact matches return immediately; otherwise page through candidates
 * until the user picks one or cancels (null).
 */
async function selectFood(
  rl: Interface,
  runtime: GlycemicRuntime,
  topK: number
): Promise<string | null> {
  const query = (await rl.question("\nEnter food name: ")).trim();
  if (!query) return null;

  const exact = runtime.resolver.resolveExact(query);
  if (exact !== null) return exact;

  let offset = 0;
  for (;;) {
    const candidates = await runtime.resolver.findCandidates(query, topK, offset);
    if (candidates.length === 0) {
      console.log(
        offset === 0
          ? `\nNo similar foods found for '${query}'.`
          : `\nNo more matches for '${query}'.`
      );
      return null;
    }

    console.log(`\nFound ${candidates.length} similar foods:`);
    candidates.forEach((c, i) => {
      console.log(`  ${i + 1}. ${c.name} (similarity: ${c.score.toFixed(2)})`);
    });

    console.log("\nOptions:");
    console.log(`  Enter 1-${candidates.length} to select a food`);
    const hasMore = offset + topK < runtime.resolver.size;
    if (hasMore) console.log(`  Enter 'next' to see the next ${topK} options`);
    console.log("  Enter 'cancel' to go back");

    const choice = (await rl.question("Your choice: ")).trim().toLowerCase();
    if (choice === "cancel") return null;
    if (choice === "next" && hasMore) {
      offset += topK;
      continue;
    }

    const index = Number.parseInt(choice, 10);
    if (Number.isInteger(index) && index >= 1 && index <= candidates.length) {
      return candidates[index - 1].name;
    }
    console.log(`Please enter a number between 1 and ${candidates.length}, 'next' or 'cancel'.`);
  }
}

function printAssessment({ food, features, verdict }: SafetyAssessment): void {
  console.log(`\n${RULE}`);
  console.log(`FOOD SAFETY ANALYSIS: ${food}`);
  console.log(RULE);
  console.log(`\nSafety: ${LABEL_SYMBOLS[verdict.label]} ${verdict.label.toUpperCase()}`);
  console.log(`Explanation: ${verdict.explanation}`);

  console.log("\nNutrition Information:");
  console.log(`  Glycemic Index (GI): ${features.glycemicIndex.toFixed(1)}`);
  console.log(`  Glycemic Load (GL): ${features.glycemicLoad.toFixed(1)}`);
  console.log(`  Serving Size: ${formatValue(features.servingSizeGrams)}g`);
  console.log("\nMacronutrients (per serving):");
  console.log(`  Carbohydrates: ${features.carbohydrates.toFixed(1)}g`);
  console.log(`  Fiber: ${features.fiber.toFixed(1)}g`);
  console.log(`  Protein: ${features.protein.toFixed(1)}g`);
  console.log(`  Fat: ${features.fat.toFixed(1)}g`);
  console.log(`  Processing Level: ${features.processingLevel}`);
  console.log(RULE);
}

async function checkFood(rl: Interface, runtime: GlycemicRuntime, topK: number): Promise<void> {
  const food = await selectFood(rl, runtime, topK);
  if (food === null) {
    console.log("Cancelled.");
    return;
  }

  const serving =
    (await rl.question(`\nEnter serving size for '${food}' (default: ${DEFAULT_SERVING_SIZE}): `)).trim() ||
    DEFAULT_SERVING_SIZE;

  try {
    printAssessment(runtime.engine.evaluateFood(food, serving));
  } catch (error) {
    // Bad input or incomplete data: report and go back to the menu
    if (isGlycemicError(error) && error.kind !== "SOURCE_UNAVAILABLE") {
      console.log(`\nError: ${error.message}`);
      return;
    }
    throw error;
  }
}

async function main() {
  const args = process.argv.slice(2);
  const dataIdx = args.indexOf("--data");
  const topKIdx = args.indexOf("--top-k");
  const topK = topKIdx >= 0 ? parseInt(args[topKIdx + 1] || "5", 10) : 5;
  if (!Number.isInteger(topK) || topK < 1) {
    throw new Error("--top-k must be a positive integer");
  }

  const settings = loadConfig();
  if (dataIdx >= 0 && args[dataIdx + 1]) {
    settings.dataPath = args[dataIdx + 1];
  }

  console.log(RULE);
  console.log("Glycemic Guard - single food safety check");
  console.log(RULE);
  console.log(`\nLoading knowledge base from ${settings.dataPath}...`);

  const runtime = await createRuntime(settings);
  console.log(`Loaded ${runtime.store.size} foods (name matching: ${runtime.resolver.mode}).`);

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      console.log(`\n${RULE}\nMAIN MENU\n${RULE}`);
      console.log("1. Check food safety");
      console.log("2. Exit");

      const choice = (await rl.question("\nChoose option: ")).trim();
      if (choice === "1") {
        await checkFood(rl, runtime, topK);
      } else if (choice === "2") {
        console.log("\nGoodbye!");
        break;
      } else {
        console.log("Invalid choice. Please enter 1 or 2.");
      }
    }
  } finally {
    rl.close();
  }
}

main().catch((e) => {
  if (isGlycemicError(e)) {
    console.error(`Error: ${e.message}`);
  } else {
    console.error(e);
  }
  process.exit(1);
});
