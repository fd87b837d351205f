import { CatalogError } from "./catalog-errors.js";

export type KeyCase = "upper" | "preserve";

export interface CatalogEntity {
  key: string;
  label: string;
  crossRefs: string[];
}

export interface CatalogEntityInput {
  key: string;
  label: string;
  crossRefs?: string[];
}

/**
 * Strict total order over normalized keys. Code-unit order, so "CSCI100" < "CSCI2" < "MATH".
 */
export function compareEntityKeys(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

export function normalizeEntityKey(raw: string, keyCase: KeyCase = "upper"): string {
  const trimmed = raw.trim();
  return keyCase === "upper" ? trimmed.toUpperCase() : trimmed;
}

export function normalizeCrossRefs(values: string[], keyCase: KeyCase = "upper"): string[] {
  return values
    .map((value) => normalizeEntityKey(value, keyCase))
    .filter((value) => value.length > 0)
    .sort(compareEntityKeys)
    .filter((value, index, list) => index === 0 || list[index - 1] !== value);
}

export function createCatalogEntity(input: CatalogEntityInput, keyCase: KeyCase = "upper"): CatalogEntity {
  const key = normalizeEntityKey(input.key, keyCase);
  if (key.length === 0) {
    throw new CatalogError({ code: "invalid_entity", message: "key must be a non-empty string." });
  }

  const label = input.label.trim();
  if (label.length === 0) {
    throw new CatalogError({
      code: "invalid_entity",
      message: `label for '${key}' must be a non-empty string.`,
      details: { key },
    });
  }

  return {
    key,
    label,
    crossRefs: normalizeCrossRefs(input.crossRefs ?? [], keyCase),
  };
}

export function renderCatalogEntityCanonical(entity: CatalogEntity): string {
  const refs = entity.crossRefs.length > 0 ? entity.crossRefs.join(",") : "none";
  return `entity=${entity.key}|label=${JSON.stringify(entity.label)}|refs=${refs}`;
}
