export type CellValue = string | number | boolean | Date | null;

export const VALUE_TYPES = ["string", "integer", "float", "boolean", "datetime", "date", "time", "email", "url"] as const;
export type ValueType = (typeof VALUE_TYPES)[number];

const VALUE_TYPE_ALIASES: Record<string, ValueType> = {
  str: "string",
  text: "string",
  int: "integer",
  number: "integer",
  decimal: "float",
  double: "float",
  bool: "boolean",
  logical: "boolean",
  hyperlink: "url",
};

export function isValueType(value: string): value is ValueType {
  return VALUE_TYPES.some(type => type === value);
}

/** Accepts canonical names and common aliases, case-insensitively. */
export function normalizeValueType(raw: string): ValueType | undefined {
  const lowered = raw.trim().toLowerCase();
  if (isValueType(lowered)) return lowered;
  return Object.prototype.hasOwnProperty.call(VALUE_TYPE_ALIASES, lowered) ? VALUE_TYPE_ALIASES[lowered] : undefined;
}

export interface FieldConstraints {
  minValue?: number;
  maxValue?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  enum?: readonly CellValue[];
  customValidator?: (value: CellValue) => boolean;
}

export interface FieldDefinition {
  name: string;
  valueAddress: string;
  valueType: ValueType;
  isDropDown: boolean;
  labelAddress?: string;
  label?: string;
  required?: boolean;
  constraints?: FieldConstraints;
  format?: string;
}

export interface Schema {
  schemaName: string;
  tabName: string;
  fields: readonly FieldDefinition[];
  metadata?: Readonly<Record<string, unknown>>;
}

export interface SchemaRegistry {
  readonly schemas: Readonly<Record<string, Schema>>;
  readonly aliases: Readonly<Record<string, string>>;
}

export type ExtractedRecord = Record<string, CellValue>;

export interface ParsedWorkbook {
  readonly metadata: Readonly<Record<string, CellValue>>;
  readonly schemas: Readonly<Record<string, string>>;
  readonly tabContents: Readonly<Record<string, Readonly<ExtractedRecord>>>;
}

export interface BusinessRule {
  name: string;
  condition: (record: Readonly<ExtractedRecord>) => boolean;
  message: string;
}

export interface WorksheetDimensions {
  rowCount: number;
  columnCount: number;
}

export interface WorksheetHandle {
  readonly name: string;
  readonly dimensions: WorksheetDimensions;
  getCell(address: string): CellValue;
  /** Every non-empty cell, keyed by its relative address. */
  cells(): Iterable<[string, CellValue]>;
}

export interface WorkbookProperties {
  title?: string;
  creator?: string;
  created?: Date;
  modified?: Date;
  lastModifiedBy?: string;
}

export interface WorkbookHandle {
  readonly filePath?: string;
  readonly properties: WorkbookProperties;
  sheetNames(): string[];
  sheet(name: string): WorksheetHandle | undefined;
  close(): void;
}
