import { defaultRegistry, type SchemaRegistry, type SchemaValidationResult } from "../schema/registry.js";
import type { ThresholdStore } from "./store.js";

/** Validate a store against `thresholds.schema.json`. */
export function validateThresholds(
  store: ThresholdStore,
  registry: SchemaRegistry = defaultRegistry(),
): SchemaValidationResult {
  return registry.validate("thresholds", store.toJSON());
}
