const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
export const MAX_IDENTIFIER_LENGTH = 128;

export interface TableRef {
  schema?: string;
  name: string;
}

export function isIdentifier(value: string): boolean {
  return value.length <= MAX_IDENTIFIER_LENGTH && IDENTIFIER_PATTERN.test(value);
}

/**
 * Parses `table` or `schema.table`. Every part must be a plain identifier;
 * brackets, quotes and escapes are never accepted.
 */
export function parseTableRef(value: string): TableRef | null {
  const parts = value.split(".");
  if (parts.length > 2 || !parts.every(isIdentifier)) {
    return null;
  }
  return parts.length === 2 ? { schema: parts[0], name: parts[1] } : { name: parts[0] };
}

export function formatTableRef(ref: TableRef): string {
  return ref.schema ? `${ref.schema}.${ref.name}` : ref.name;
}

/** Bracket-quotes an identifier for interpolation into catalog-derived statements. */
export function quoteIdentifier(name: string): string {
  return `[${name.replace(/]/g, "]]")}]`;
}

export function quoteTable(schema: string, name: string): string {
  return `${quoteIdentifier(schema)}.${quoteIdentifier(name)}`;
}
