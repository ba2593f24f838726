import { InvalidAddressError } from "../utils/errors";

/** Largest column Excel accepts (`XFD`). */
export const MAX_COLUMN_INDEX = 16384;
export const MAX_ROW_INDEX = 1048576;

export interface CellAddress {
  column: string;
  row: number;
}

export type SortUnit = "row" | "column";

const ADDRESS_PATTERN = /^\$?([A-Za-z]+)\$?([0-9]+)$/;

export function columnToIndex(column: string): number {
  if (!/^[A-Za-z]+$/.test(column)) {
    throw new InvalidAddressError(column, "column must contain only letters");
  }
  let index = 0;
  for (const ch of column.toUpperCase()) {
    index = index * 26 + (ch.charCodeAt(0) - 64);
  }
  return index;
}

export function indexToColumn(index: number): string {
  if (!Number.isInteger(index) || index < 1) {
    throw new InvalidAddressError(String(index), "column index must be a positive integer");
  }
  let remaining = index;
  let letters = "";
  while (remaining > 0) {
    const digit = (remaining - 1) % 26;
    letters = String.fromCharCode(65 + digit) + letters;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return letters;
}

/**
 * Splits `B15`, `$B$15`, `$B15` or `B$15` into column letters and row number.
 * Column letters come back upper-case.
 */
export function resolveAddress(address: string): CellAddress {
  const match = ADDRESS_PATTERN.exec(address);
  if (!match) {
    throw new InvalidAddressError(address, "expected column letters followed by a row number");
  }

  const column = match[1].toUpperCase();
  const row = Number.parseInt(match[2], 10);

  if (row < 1) {
    throw new InvalidAddressError(address, "row must be 1 or greater");
  }
  if (row > MAX_ROW_INDEX) {
    throw new InvalidAddressError(address, `row exceeds ${MAX_ROW_INDEX}`);
  }
  if (columnToIndex(column) > MAX_COLUMN_INDEX) {
    throw new InvalidAddressError(address, `column exceeds ${indexToColumn(MAX_COLUMN_INDEX)}`);
  }

  return { column, row };
}

export function isValidAddress(address: string): boolean {
  try {
    resolveAddress(address);
    return true;
  } catch {
    return false;
  }
}

export function formatAddress(cell: CellAddress, options: { absolute?: boolean } = {}): string {
  const anchor = options.absolute ? "$" : "";
  return `${anchor}${cell.column.toUpperCase()}${anchor}${cell.row}`;
}

export function addressSortKey(address: string, unit: "row"): number;
export function addressSortKey(address: string, unit: "column"): string;
export function addressSortKey(address: string, unit: SortUnit): number | string;
export function addressSortKey(address: string, unit: SortUnit): number | string {
  const { column, row } = resolveAddress(address);
  return unit === "row" ? row : column;
}

/** Orders by row number, or by column rank so that `Z` sorts before `AA`. */
export function compareAddresses(a: string, b: string, unit: SortUnit): number {
  const left = resolveAddress(a);
  const right = resolveAddress(b);
  if (unit === "row") {
    return left.row - right.row || columnToIndex(left.column) - columnToIndex(right.column);
  }
  return columnToIndex(left.column) - columnToIndex(right.column) || left.row - right.row;
}

export function sortAddresses(addresses: readonly string[], unit: SortUnit): string[] {
  return [...addresses].sort((a, b) => compareAddresses(a, b, unit));
}

export function offsetAddress(address: string, rows: number, columns: number): string {
  const { column, row } = resolveAddress(address);
  const nextRow = row + rows;
  const nextColumn = columnToIndex(column) + columns;
  if (nextRow < 1 || nextColumn < 1) {
    throw new InvalidAddressError(address, `offset (${rows}, ${columns}) leaves the sheet`);
  }
  return formatAddress({ column: indexToColumn(nextColumn), row: nextRow });
}
