import { XMLBuilder } from 'fast-xml-parser';
import { MarkupNameError, UnsupportedValueError } from '../errors.js';
import { Decimal, Temporal, formatLocalTimestamp, type ColumnInfo } from '../utils/values.js';

export type ResultSet = {
  statement: string;
  columns: ColumnInfo[];
  rows: unknown[][];
};

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export function columnNames(resultSet: ResultSet): string[] {
  return resultSet.columns.map((column) => column.name);
}

/** One mapping per row, column names zipped onto the row values. */
export function toRecords(resultSet: ResultSet): Record<string, unknown>[] {
  const names = columnNames(resultSet);
  return resultSet.rows.map((row) => {
    const record: Record<string, unknown> = {};
    names.forEach((name, index) => {
      record[name] = row[index];
    });
    return record;
  });
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'Object';
  return typeof value;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Maps a driver value onto JSON. Exact decimals are widened to numbers; any
 * other value without a JSON form, dates and times included, is rejected with
 * its type name.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new UnsupportedValueError(String(value));
    return value;
  }
  if (typeof value !== 'object') throw new UnsupportedValueError(typeof value);

  if (value instanceof Decimal) {
    const widened = value.toNumber();
    if (!Number.isFinite(widened)) throw new UnsupportedValueError(`Decimal(${value.text})`);
    return widened;
  }
  if (value instanceof Temporal) {
    throw new UnsupportedValueError(value.kind);
  }
  if (Array.isArray(value)) {
    return value.map((item) => toJsonValue(item));
  }
  if (isPlainObject(value)) {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toJsonValue(item);
    }
    return result;
  }
  throw new UnsupportedValueError(typeName(value));
}

export function serializeRecords(resultSet: ResultSet): string {
  const records = toRecords(resultSet).map((record) => toJsonValue(record));
  return JSON.stringify(records, null, 4);
}

const ELEMENT_NAME = /^[\p{L}_][\p{L}\p{N}._-]*$/u;

export function isValidElementName(name: string): boolean {
  return ELEMENT_NAME.test(name);
}

export function markupText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return formatLocalTimestamp(value);
  if (typeof value === 'object' && !(value instanceof Decimal) && !(value instanceof Temporal)) {
    return JSON.stringify(toJsonValue(value));
  }
  return String(value);
}

export const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

const builder = new XMLBuilder({
  format: true,
  indentBy: '  ',
  suppressEmptyNode: false,
});

/** `<data>` wrapper, one `<row>` per row, one child element per column. */
export function serializeMarkup(resultSet: ResultSet): string {
  const names = columnNames(resultSet);
  for (const name of names) {
    if (!isValidElementName(name)) {
      throw new MarkupNameError(name);
    }
  }

  const rows = resultSet.rows.map((row) => {
    const element: Record<string, string> = {};
    names.forEach((name, index) => {
      element[name] = markupText(row[index]);
    });
    return element;
  });

  const document = rows.length ? { data: { row: rows } } : { data: '' };
  return `${XML_DECLARATION}\n${builder.build(document)}`;
}
