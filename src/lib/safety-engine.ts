import { KnowledgeStore } from "./knowledge-store";
import { evaluate, resolveThresholds } from "./safety-rules";
import { DEFAULT_SERVING_SIZE } from "./serving";
import type { SafetyAssessment, SafetyThresholds } from "@/types/nutrition";

/**
 * Name + serving → features → verdict. Knowledge-store errors
 * (NOT_FOUND, MISSING_DATA, INVALID_SERVING_FORMAT) pass through unchanged.
 */
export class FoodSafetyEngine {
  readonly knowledgeStore: KnowledgeStore;
  readonly thresholds: SafetyThresholds;

  constructor(knowledgeStore: KnowledgeStore, thresholds: Partial<SafetyThresholds> = {}) {
    this.knowledgeStore = knowledgeStore;
    this.thresholds = resolveThresholds(thresholds);
  }

  evaluateFood(foodName: string, servingSize: string = DEFAULT_SERVING_SIZE): SafetyAssessment {
    const features = this.knowledgeStore.getFeatures(foodName, servingSize);
    return {
      food: this.knowledgeStore.normalize(foodName),
      features,
      verdict: evaluate(features, this.thresholds),
    };
  }
}
