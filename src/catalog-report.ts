import type { CatalogEntity } from "./catalog-entity.js";
import { DEFAULT_CATALOG_CONFIG } from "./catalog-config.js";
import type { CatalogResolution } from "./catalog-query.js";

export const COURSE_LIST_HEADER = "---- Computer Science Course List (Alphanumeric) ----";
export const COURSE_LIST_FOOTER = "-".repeat(53);
export const NO_COURSES_LOADED = "No courses loaded. Use Option 1 to load data first.";

export function renderCourseList(entities: CatalogEntity[]): string[] {
  if (entities.length === 0) {
    return [NO_COURSES_LOADED];
  }

  return [COURSE_LIST_HEADER, ...entities.map((entity) => `${entity.key}: ${entity.label}`), COURSE_LIST_FOOTER];
}

export function renderCourseDetail(
  resolution: CatalogResolution,
  unknownLabelText: string = DEFAULT_CATALOG_CONFIG.unknownLabelText,
): string[] {
  const { entity } = resolution;
  if (!entity) {
    return [`Course '${resolution.key}' was not found. Please check the course number and try again.`];
  }

  const lines = [`Course: ${entity.key} - ${entity.label}`];
  if (resolution.crossRefs.length === 0) {
    lines.push("Prerequisites: None");
    return lines;
  }

  lines.push("Prerequisites:");
  for (const ref of resolution.crossRefs) {
    const label = ref.status === "found" ? ref.label : unknownLabelText;
    lines.push(`  - ${ref.key} - ${label}`);
  }
  return lines;
}
