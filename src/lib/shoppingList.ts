import type { ShoppingListLine } from "../types";

export type CartRow = { name: string; measurementUnit: string; amount: number };

export const compareLines = (a: ShoppingListLine, b: ShoppingListLine) => {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  if (a.measurementUnit !== b.measurementUnit) return a.measurementUnit < b.measurementUnit ? -1 : 1;
  return 0;
};

/**
 * Sums amounts per (name, unit) pair and orders the result by name.
 * Rows from different recipes that share an ingredient merge into one line.
 */
export const sumIngredientLines = (rows: Iterable<CartRow>): ShoppingListLine[] => {
  const totals = new Map<string, ShoppingListLine>();
  for (const row of rows) {
    const key = JSON.stringify([row.name, row.measurementUnit]);
    const line = totals.get(key);
    if (line) line.totalAmount += row.amount;
    else totals.set(key, { name: row.name, measurementUnit: row.measurementUnit, totalAmount: row.amount });
  }
  return [...totals.values()].sort(compareLines);
};

export const formatLine = (line: ShoppingListLine) =>
  `${line.name}: ${line.totalAmount} ${line.measurementUnit}`;
