import { createHash } from "node:crypto";
import type { KeyCase } from "./catalog-entity.js";
import { CatalogError } from "./catalog-errors.js";

export interface CatalogConfig {
  commentPrefix: string;
  crossRefDelimiters: string;
  keyCase: KeyCase;
  requireRecords: boolean;
  strictMalformed: boolean;
  unknownLabelText: string;
  maxWarnings: number;
}

export type CatalogConfigInput = Partial<CatalogConfig>;

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  ok: boolean;
  errors: ValidationError[];
}

export const DEFAULT_CATALOG_CONFIG: CatalogConfig = {
  commentPrefix: "#",
  crossRefDelimiters: "|;,",
  keyCase: "upper",
  requireRecords: true,
  strictMalformed: false,
  unknownLabelText: "(title unknown)",
  maxWarnings: 1000,
};

const KEY_CASES: KeyCase[] = ["upper", "preserve"];

export function normalizeCatalogConfig(input: CatalogConfigInput = {}): CatalogConfig {
  const merged: CatalogConfig = {
    ...DEFAULT_CATALOG_CONFIG,
    ...input,
  };

  return {
    ...merged,
    commentPrefix: merged.commentPrefix.trim(),
    unknownLabelText: merged.unknownLabelText.trim(),
  };
}

export function validateCatalogConfig(config: CatalogConfig): ValidationResult {
  const errors: ValidationError[] = [];

  if (config.commentPrefix.length === 0) {
    errors.push({ path: "commentPrefix", message: "Comment prefix is required." });
  }

  if (/[\p{L}\p{N}"]/u.test(config.crossRefDelimiters)) {
    errors.push({
      path: "crossRefDelimiters",
      message: "Delimiters must not contain letters, digits or double quotes.",
    });
  }

  if (!KEY_CASES.includes(config.keyCase)) {
    errors.push({ path: "keyCase", message: `Must be one of: ${KEY_CASES.join(", ")}.` });
  }

  if (config.unknownLabelText.length === 0) {
    errors.push({ path: "unknownLabelText", message: "Unknown label text is required." });
  }

  assertIntBetween(errors, "maxWarnings", config.maxWarnings, 1, 10_000);

  return {
    ok: errors.length === 0,
    errors,
  };
}

/**
 * Normalizes and validates in one step; invalid input raises `invalid_config`.
 */
export function resolveCatalogConfig(input: CatalogConfigInput = {}): CatalogConfig {
  const config = normalizeCatalogConfig(input);
  const validation = validateCatalogConfig(config);
  if (!validation.ok) {
    throw new CatalogError({
      code: "invalid_config",
      message: `Invalid catalog config: ${validation.errors.map((error) => `${error.path}: ${error.message}`).join("; ")}`,
      details: { errors: validation.errors },
    });
  }
  return config;
}

function assertIntBetween(errors: ValidationError[], path: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    errors.push({ path, message: `Must be an integer between ${min} and ${max}.` });
  }
}

export function stableSerializeCatalogConfig(config: CatalogConfig): string {
  return JSON.stringify(config, Object.keys(config).sort());
}

export function computeCatalogConfigHash(config: CatalogConfig): string {
  return createHash("sha256").update(stableSerializeCatalogConfig(config)).digest("hex");
}
