import { customType } from "drizzle-orm/pg-core";

/** pgvector text form: `[0.1,0.2,0.3]`. */
export function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}

export function parseVectorLiteral(value: string): number[] {
  const inner = value.trim().replace(/^\[/, "").replace(/\]$/, "");
  if (inner === "") return [];
  return inner.split(",").map(Number);
}

/**
 * Untyped `vector` column. The dimension is fixed per deployment by the
 * similarity index expression rather than by the column type.
 */
export const vector = customType<{ data: number[]; driverData: string }>({
  dataType() {
    return "vector";
  },
  toDriver(value: number[]): string {
    return toVectorLiteral(value);
  },
  fromDriver(value: string): number[] {
    return parseVectorLiteral(value);
  },
});
