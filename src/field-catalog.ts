import type { FieldDefinition } from "./schemas.js";

export type FieldCatalog = ReadonlyMap<string, string>;

/**
 * Maps lower-cased display names to custom field ids.
 *
 * Entries are processed in the order the server returned them, so the result is
 * order-sensitive. A standard field removes a custom field that already claimed
 * its name; when nothing was claimed yet it blocks every later custom field with
 * that name. Among custom fields the first one seen keeps the name.
 */
export function buildFieldCatalog(definitions: readonly FieldDefinition[]): FieldCatalog {
  const catalog = new Map<string, string>();
  const standardNames = new Set<string>();

  for (const definition of definitions) {
    const name = definition.name.toLowerCase();

    if (definition.custom) {
      if (!catalog.has(name) && !standardNames.has(name)) {
        catalog.set(name, definition.id.toLowerCase());
      }
      continue;
    }

    if (!catalog.delete(name)) {
      standardNames.add(name);
    }
  }

  return catalog;
}

export function resolveFieldIds(catalog: FieldCatalog, requested: readonly string[]): string[] {
  const ids: string[] = [];
  const seen = new Set<string>();

  for (const column of requested) {
    const trimmed = column.trim();
    if (!trimmed) {
      continue;
    }

    const id = catalog.get(trimmed.toLowerCase()) ?? trimmed;
    if (!seen.has(id)) {
      seen.add(id);
      ids.push(id);
    }
  }

  return ids;
}
