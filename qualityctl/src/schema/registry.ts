import fs from "node:fs";
import path from "node:path";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  filePath: string;
  schema: unknown;
};

export type SchemaValidationResult = { valid: boolean; errors: string | null };

const SCHEMA_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../schemas");

/**
 * Loads every `*.schema.json` under a directory and validates artifacts
 * against them by name ("experiment-config.schema.json" → "experiment-config").
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private readonly ajv: AjvInstance = loadAjv();

  constructor(private readonly schemaDir: string) {}

  load(): void {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));
    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, filePath, schema });
    }
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  private validator(name: string): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  validate(name: string, data: unknown): SchemaValidationResult {
    const validate = this.validator(name);
    const valid = validate(data);
    return {
      valid,
      errors: valid ? null : this.ajv.errorsText(validate.errors),
    };
  }
}

let shared: SchemaRegistry | null = null;

/** Registry over the bundled schemas directory, loaded once per process. */
export function defaultRegistry(): SchemaRegistry {
  if (!shared) {
    shared = createRegistry();
  }
  return shared;
}

export function createRegistry(schemaDir?: string): SchemaRegistry {
  const registry = new SchemaRegistry(schemaDir ?? SCHEMA_DIR);
  registry.load();
  return registry;
}
