import { normalizeCrossRefs, normalizeEntityKey, type CatalogEntity } from "./catalog-entity.js";
import { DEFAULT_CATALOG_CONFIG, type CatalogConfig } from "./catalog-config.js";

export type MalformedRecordCode = "missing_key" | "missing_label";

export type ParsedRecordResult =
  | { status: "record"; entity: CatalogEntity }
  | { status: "skipped"; reason: "blank" | "comment" }
  | { status: "malformed"; code: MalformedRecordCode; message: string };

export const MALFORMED_RECORD_MESSAGE = "Malformed line: requires course number and title.";

/**
 * Parses one catalog line: `KEY, Label, REF1, REF2 | REF3 ...`.
 * Fields after the label are split again on whitespace and on the configured delimiters.
 */
export function parseCatalogRecord(rawLine: string, config: CatalogConfig = DEFAULT_CATALOG_CONFIG): ParsedRecordResult {
  const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;

  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return { status: "skipped", reason: "blank" };
  }
  if (trimmed.startsWith(config.commentPrefix)) {
    return { status: "skipped", reason: "comment" };
  }

  const fields = splitDelimitedLine(line).map((field) => stripQuotes(field.trim()));

  const [rawKey = "", rawLabel = ""] = fields;
  const key = normalizeEntityKey(rawKey, config.keyCase);
  const label = rawLabel.trim();
  if (key.length === 0) {
    return { status: "malformed", code: "missing_key", message: MALFORMED_RECORD_MESSAGE };
  }
  if (fields.length < 2 || label.length === 0) {
    return { status: "malformed", code: "missing_label", message: MALFORMED_RECORD_MESSAGE };
  }

  const tokens = fields.slice(2).flatMap((field) => splitCrossRefTokens(field, config.crossRefDelimiters));

  return {
    status: "record",
    entity: {
      key,
      label,
      crossRefs: normalizeCrossRefs(tokens, config.keyCase),
    },
  };
}

/**
 * Splits on commas outside double quotes. A doubled quote inside a quoted field is a literal quote.
 */
export function splitDelimitedLine(line: string): string[] {
  const fields: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];
    if (char === '"') {
      if (inQuotes && line[index + 1] === '"') {
        field += '"';
        index += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }
    if (char === "," && !inQuotes) {
      fields.push(field);
      field = "";
      continue;
    }
    field += char;
  }

  fields.push(field);
  return fields;
}

export function splitCrossRefTokens(field: string, delimiters: string): string[] {
  const tokens: string[] = [];
  let token = "";

  const flush = (): void => {
    const value = token.trim();
    if (value.length > 0) {
      tokens.push(value);
    }
    token = "";
  };

  for (const char of field) {
    if (/\s/.test(char) || delimiters.includes(char)) {
      flush();
    } else {
      token += char;
    }
  }
  flush();

  return tokens;
}

function stripQuotes(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}
