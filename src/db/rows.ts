import type { Row } from "./types.js";

export function readString(row: Row, key: string): string {
  const value = row[key];
  if (typeof value === "string") {
    return value;
  }
  return value === null || value === undefined ? "" : String(value);
}

export function readNullableString(row: Row, key: string): string | null {
  const value = row[key];
  if (value === null || value === undefined) {
    return null;
  }
  return typeof value === "string" ? value : String(value);
}

/** Numbers arrive as number, or as string for BIGINT and wide DECIMAL columns. */
export function readNumber(row: Row, key: string): number | null {
  const value = row[key];
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function readBoolean(row: Row, key: string): boolean {
  const value = row[key];
  if (typeof value === "string") {
    return ["YES", "TRUE", "1"].includes(value.toUpperCase());
  }
  return value === true || value === 1;
}

export function readDate(row: Row, key: string): string | null {
  const value = row[key];
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  return typeof value === "string" && value !== "" ? value : null;
}
