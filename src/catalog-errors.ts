export type CatalogErrorCode =
  | "invalid_config"
  | "invalid_entity"
  | "source_unreadable"
  | "empty_catalog"
  | "malformed_records";

export class CatalogError extends Error {
  public readonly code: CatalogErrorCode;
  public readonly details?: Record<string, unknown>;

  public constructor(params: { code: CatalogErrorCode; message: string; details?: Record<string, unknown> }) {
    super(params.message);
    this.name = "CatalogError";
    this.code = params.code;
    this.details = params.details;
  }
}

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}
