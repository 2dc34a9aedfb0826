const NUMERIC_OID = 1700;
const INT8_OID = 20;
const DATE_OID = 1082;
const TIME_OID = 1083;
const TIMESTAMP_OID = 1114;
const TIMESTAMPTZ_OID = 1184;
const TIMETZ_OID = 1266;

/**
 * Exact decimal as reported by the server. The source text is kept so the
 * markup output shows the value with its declared scale (`12.50`).
 */
export class Decimal {
  readonly text: string;

  constructor(text: string) {
    this.text = text.trim();
  }

  toNumber(): number {
    return Number(this.text);
  }

  toString(): string {
    return this.text;
  }
}

export type TemporalKind = 'date' | 'time' | 'timestamp' | 'timestamptz';

/**
 * Date or time value in the server's text form (`1996-05-13`,
 * `1996-05-13 08:30:00`). The driver hands timestamps over as local-time
 * `Date`s; they are rendered back from their local fields, never through UTC.
 */
export class Temporal {
  readonly kind: TemporalKind;
  readonly text: string;

  constructor(kind: TemporalKind, text: string) {
    this.kind = kind;
    this.text = text;
  }

  toString(): string {
    return this.text;
  }
}

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

export function formatLocalDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function formatLocalTimestamp(date: Date): string {
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  const millis = date.getMilliseconds();
  const fraction = millis ? `.${pad(millis, 3)}000` : '';
  return `${formatLocalDate(date)} ${time}${fraction}`;
}

function formatOffset(date: Date): string {
  const minutes = -date.getTimezoneOffset();
  const sign = minutes < 0 ? '-' : '+';
  const absolute = Math.abs(minutes);
  return `${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`;
}

function decodeDate(value: Date, dataTypeID: number): unknown {
  switch (dataTypeID) {
    case DATE_OID:
      return new Temporal('date', formatLocalDate(value));
    case TIMESTAMP_OID:
      return new Temporal('timestamp', formatLocalTimestamp(value));
    case TIMESTAMPTZ_OID:
      return new Temporal('timestamptz', `${formatLocalTimestamp(value)}${formatOffset(value)}`);
    default:
      return value;
  }
}

export type ColumnInfo = {
  name: string;
  dataTypeID: number;
};

function decodeInt8(text: string): number | bigint {
  const asNumber = Number(text);
  return Number.isSafeInteger(asNumber) ? asNumber : BigInt(text);
}

// The driver hands NUMERIC, INT8 and times of day over as strings and dates as `Date`s.
export function decodeValue(value: unknown, dataTypeID: number): unknown {
  if (value instanceof Date) return decodeDate(value, dataTypeID);
  if (typeof value !== 'string') return value;
  switch (dataTypeID) {
    case NUMERIC_OID:
      return new Decimal(value);
    case INT8_OID:
      return decodeInt8(value);
    case TIME_OID:
    case TIMETZ_OID:
      return new Temporal('time', value);
    default:
      return value;
  }
}

export function decodeRow(row: unknown[], columns: ColumnInfo[]): unknown[] {
  return row.map((value, index) => {
    const column = columns[index];
    return column ? decodeValue(value, column.dataTypeID) : value;
  });
}
