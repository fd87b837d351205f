import { promises as fs } from "node:fs";
import path from "node:path";
import { BalancedTreeStore, type BalancedTreeStoreOptions } from "./balanced-tree-store.js";
import type { CatalogEntity } from "./catalog-entity.js";
import { CatalogError } from "./catalog-errors.js";
import { resolveCatalogConfig, type CatalogConfigInput } from "./catalog-config.js";
import { parseCatalogRecord } from "./record-parser.js";

export type CatalogStore = BalancedTreeStore<CatalogEntity>;

export interface CatalogIngestionWarning {
  code: "malformed_record" | "duplicate_key";
  message: string;
  line: number;
  snippet: string;
}

export interface CatalogIngestionResult {
  loadedCount: number;
  malformedCount: number;
  ignoredCount: number;
  duplicateCount: number;
  warnings: CatalogIngestionWarning[];
  droppedWarningCount: number;
}

export interface CatalogIngestionOptions {
  config?: CatalogConfigInput;
  /** Called for every warning as it is raised, including ones past `maxWarnings`. */
  onWarning?: (warning: CatalogIngestionWarning) => void;
}

export interface LoadCatalogOptions extends CatalogIngestionOptions {
  store?: BalancedTreeStoreOptions;
  /** Called once the text has been ingested, before an empty load is rejected. */
  onIngested?: (result: CatalogIngestionResult) => void;
}

export interface LoadedCatalog {
  sourcePath: string;
  store: CatalogStore;
  result: CatalogIngestionResult;
}

const SNIPPET_LENGTH = 80;

export function ingestCatalogText(
  store: CatalogStore,
  text: string,
  options: CatalogIngestionOptions = {},
): CatalogIngestionResult {
  const config = resolveCatalogConfig(options.config);
  const result: CatalogIngestionResult = {
    loadedCount: 0,
    malformedCount: 0,
    ignoredCount: 0,
    duplicateCount: 0,
    warnings: [],
    droppedWarningCount: 0,
  };

  const pushWarning = (warning: CatalogIngestionWarning): void => {
    options.onWarning?.(warning);
    if (result.warnings.length >= config.maxWarnings) {
      result.droppedWarningCount += 1;
      return;
    }
    result.warnings.push(warning);
  };

  // A trailing newline does not open another line.
  const lines = text.length === 0 ? [] : text.replace(/\n$/, "").split("\n");

  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    const parsed = parseCatalogRecord(line, config);

    if (parsed.status === "skipped") {
      result.ignoredCount += 1;
      return;
    }

    if (parsed.status === "malformed") {
      result.malformedCount += 1;
      pushWarning({ code: "malformed_record", message: parsed.message, line: lineNumber, snippet: toSnippet(line) });
      return;
    }

    const { entity } = parsed;
    if (store.has(entity.key)) {
      result.duplicateCount += 1;
      pushWarning({
        code: "duplicate_key",
        message: `Duplicate key '${entity.key}' replaces the earlier record.`,
        line: lineNumber,
        snippet: entity.key,
      });
    }

    store.insert(entity.key, entity);
    result.loadedCount += 1;
  });

  if (config.strictMalformed && result.malformedCount > 0) {
    throw new CatalogError({
      code: "malformed_records",
      message: `Catalog ingestion failed: ${result.malformedCount} malformed records detected.`,
      details: { malformedCount: result.malformedCount },
    });
  }

  return result;
}

/**
 * Reads a catalog file into a fresh store. A load that yields no records tears the partial store down
 * before failing, unless `requireRecords` is off.
 */
export async function loadCatalogFile(filePath: string, options: LoadCatalogOptions = {}): Promise<LoadedCatalog> {
  const config = resolveCatalogConfig(options.config);
  const sourcePath = path.resolve(filePath);

  let content: string;
  try {
    content = await fs.readFile(sourcePath, "utf8");
  } catch (error) {
    throw new CatalogError({
      code: "source_unreadable",
      message: `Could not open file '${filePath}'. Check the path and try again.`,
      details: { sourcePath, cause: error instanceof Error ? error.message : String(error) },
    });
  }

  const store: CatalogStore = new BalancedTreeStore<CatalogEntity>(options.store);
  let result: CatalogIngestionResult;
  try {
    result = ingestCatalogText(store, content, { config, onWarning: options.onWarning });
    options.onIngested?.(result);
  } catch (error) {
    store.teardown();
    throw error;
  }

  if (config.requireRecords && result.loadedCount === 0) {
    store.teardown();
    throw new CatalogError({
      code: "empty_catalog",
      message: "No valid course records were loaded. Verify file format.",
      details: { sourcePath, loadedCount: result.loadedCount, malformedCount: result.malformedCount },
    });
  }

  return { sourcePath, store, result };
}

export function renderIngestionSummary(result: CatalogIngestionResult, sourceLabel: string): string {
  const skipped = result.malformedCount > 0 ? ` (${result.malformedCount} skipped due to errors)` : "";
  return `Loaded ${result.loadedCount} courses${skipped} from '${sourceLabel}'.`;
}

export function renderIngestionWarning(warning: CatalogIngestionWarning): string {
  return `WARN (line ${warning.line}): ${warning.message}`;
}

function toSnippet(line: string): string {
  const trimmed = line.trim();
  return trimmed.length > SNIPPET_LENGTH ? `${trimmed.slice(0, SNIPPET_LENGTH - 3)}...` : trimmed;
}
