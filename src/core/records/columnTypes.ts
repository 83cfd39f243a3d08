export type ColumnType = "Boolean" | "DateTime" | "Float" | "Text";

const floatHints = ["amount", "price", "value", "pm25", "pm10"] as const;

/**
 * Naming-convention type inference used for dynamically created tables and
 * for detecting a usable time column.
 */
export const inferColumnType = (columnName: string): ColumnType => {
  const name = columnName.trim().toLowerCase();

  if (name.endsWith("_at") || name === "timestamp") return "DateTime";
  if (name.startsWith("is_") || name.startsWith("has_")) return "Boolean";
  if (floatHints.some((hint) => name.includes(hint))) return "Float";
  return "Text";
};

export const findTimeColumn = (columns: readonly string[]): string | undefined =>
  columns.find((column) => inferColumnType(column) === "DateTime");
