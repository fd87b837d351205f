import { createHash } from "node:crypto";
import { compareEntityKeys, normalizeEntityKey, renderCatalogEntityCanonical, type CatalogEntity } from "./catalog-entity.js";
import { resolveCatalogConfig, type CatalogConfigInput } from "./catalog-config.js";
import type { CatalogStore } from "./catalog-ingestion.js";

export type CatalogQueryDiagnosticCode = "entity_not_found" | "empty_key";

export interface CatalogQueryDiagnostic {
  code: CatalogQueryDiagnosticCode;
  severity: "error" | "warning";
  message: string;
  details?: Record<string, unknown>;
}

export type ResolvedCrossRef = { key: string; status: "found"; label: string } | { key: string; status: "unknown" };

export interface CatalogResolution {
  ok: boolean;
  key: string;
  entity?: CatalogEntity;
  crossRefs: ResolvedCrossRef[];
  diagnostics: CatalogQueryDiagnostic[];
}

export interface PrerequisiteClosureOptions {
  includeUnknown?: boolean;
}

export interface PrerequisiteClosure {
  ok: boolean;
  key: string;
  /** Dependency-first: every key appears after the keys it requires. */
  prerequisiteKeys: string[];
  unknownKeys: string[];
  diagnostics: CatalogQueryDiagnostic[];
}

export interface CatalogQueryApi {
  store: CatalogStore;
  getEntity(rawKey: string): { key: string; entity?: CatalogEntity };
  resolveEntity(rawKey: string): CatalogResolution;
  listEntities(): CatalogEntity[];
  getPrerequisiteClosure(rawKey: string, options?: PrerequisiteClosureOptions): PrerequisiteClosure;
}

export function createCatalogQueryApi(store: CatalogStore, configInput: CatalogConfigInput = {}): CatalogQueryApi {
  const config = resolveCatalogConfig(configInput);

  const getEntity = (rawKey: string): { key: string; entity?: CatalogEntity } => {
    const key = normalizeEntityKey(rawKey, config.keyCase);
    return { key, entity: key.length === 0 ? undefined : store.find(key) };
  };

  const resolveEntity = (rawKey: string): CatalogResolution => {
    const { key, entity } = getEntity(rawKey);
    if (!entity) {
      return {
        ok: false,
        key,
        crossRefs: [],
        diagnostics: [missingEntityDiagnostic(key)],
      };
    }

    const crossRefs = entity.crossRefs.map((refKey): ResolvedCrossRef => {
      const target = store.find(refKey);
      return target ? { key: refKey, status: "found", label: target.label } : { key: refKey, status: "unknown" };
    });

    return { ok: true, key, entity, crossRefs, diagnostics: [] };
  };

  const listEntities = (): CatalogEntity[] => [...store.traverseInOrder()];

  const getPrerequisiteClosure = (rawKey: string, options: PrerequisiteClosureOptions = {}): PrerequisiteClosure => {
    const includeUnknown = options.includeUnknown ?? false;
    const { key, entity } = getEntity(rawKey);
    if (!entity) {
      return {
        ok: false,
        key,
        prerequisiteKeys: [],
        unknownKeys: [],
        diagnostics: [missingEntityDiagnostic(key)],
      };
    }

    const state = new Map<string, "visiting" | "done">();
    const ordered: string[] = [];
    const unknownKeys: string[] = [];

    const visit = (nodeKey: string): void => {
      if (state.has(nodeKey)) {
        return;
      }
      state.set(nodeKey, "visiting");

      const node = store.find(nodeKey);
      if (node) {
        for (const refKey of node.crossRefs) {
          visit(refKey);
        }
      } else {
        unknownKeys.push(nodeKey);
      }

      state.set(nodeKey, "done");

      if (nodeKey !== key && (node !== undefined || includeUnknown)) {
        ordered.push(nodeKey);
      }
    };

    visit(key);

    return {
      ok: true,
      key,
      prerequisiteKeys: ordered,
      unknownKeys: unknownKeys.sort(compareEntityKeys),
      diagnostics: [],
    };
  };

  return {
    store,
    getEntity,
    resolveEntity,
    listEntities,
    getPrerequisiteClosure,
  };
}

export function renderCatalogCanonical(store: CatalogStore): string {
  const lines: string[] = [`entities=${store.size}`];
  for (const entity of store.traverseInOrder()) {
    lines.push(renderCatalogEntityCanonical(entity));
  }
  return lines.join("\n");
}

export function computeCatalogHash(store: CatalogStore): string {
  return createHash("sha256").update(renderCatalogCanonical(store)).digest("hex");
}

function missingEntityDiagnostic(key: string): CatalogQueryDiagnostic {
  if (key.length === 0) {
    return { code: "empty_key", severity: "error", message: "Lookup key must be non-empty." };
  }
  return {
    code: "entity_not_found",
    severity: "error",
    message: `Entity '${key}' was not found in the catalog.`,
    details: { key },
  };
}
