import { QualityError, QualityErrorCode } from "../errors.js";
import type { ThresholdCategory, ThresholdValue, ThresholdsDocument } from "../types/thresholds.js";

/**
 * Read-only view over parsed threshold categories.
 *
 * Built once by the parser; nothing exposed here mutates the underlying maps,
 * so a single store can be shared by every analysis in a run.
 */
export class ThresholdStore {
  private readonly categories: ReadonlyMap<string, ThresholdCategory>;

  constructor(categories: Map<string, Map<string, ThresholdValue>>) {
    const copy = new Map<string, ThresholdCategory>();
    for (const [name, entries] of categories) {
      copy.set(name, new Map(entries));
    }
    this.categories = copy;
  }

  /** Category names in file order. */
  names(): string[] {
    return [...this.categories.keys()];
  }

  has(category: string, key?: string): boolean {
    const entries = this.categories.get(category);
    if (!entries) return false;
    return key === undefined ? true : entries.has(key);
  }

  /** Get a category, failing if it was never declared. */
  category(name: string): ThresholdCategory {
    const entries = this.categories.get(name);
    if (!entries) {
      throw new QualityError(
        QualityErrorCode.CONFIG_MISSING_KEY,
        `Threshold category not found: [${name}]`,
        { category: name },
      );
    }
    return entries;
  }

  get(category: string, key: string): ThresholdValue | undefined {
    return this.categories.get(category)?.get(key);
  }

  /** Numeric lookup; missing keys and text values are configuration errors. */
  number(category: string, key: string): number {
    const value = this.category(category).get(key);
    if (value === undefined) {
      throw new QualityError(
        QualityErrorCode.CONFIG_MISSING_KEY,
        `Threshold not found: ${category}.${key}`,
        { category, key },
      );
    }
    if (value.kind === "text") {
      throw new QualityError(
        QualityErrorCode.CONFIG_INVALID_VALUE,
        `Threshold ${category}.${key} is not numeric: "${value.value}"`,
        { category, key, value: value.value },
      );
    }
    return value.value;
  }

  /** Like `number`, but falls back to `fallbackKey` in the same category when `key` is absent. */
  numberOr(category: string, key: string, fallbackKey: string): number {
    return this.category(category).has(key)
      ? this.number(category, key)
      : this.number(category, fallbackKey);
  }

  toJSON(): ThresholdsDocument {
    const doc: ThresholdsDocument = {};
    for (const [name, entries] of this.categories) {
      const section: Record<string, number | string> = {};
      for (const [key, v] of entries) section[key] = v.value;
      doc[name] = section;
    }
    return doc;
  }
}
