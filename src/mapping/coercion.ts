import { CoercionError, ConfigurationError } from '../errors';
import type { ParamType, ScalarValue } from '../types/param';

interface Codec {
  /** Typed value for the raw text, or undefined when the text is not valid. */
  parse(text: string): ScalarValue | undefined;
  /** Query-string form of the value, or undefined when the type has no rule for it. */
  format(value: unknown): string | undefined;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?)?Z?$/;

const TRUE_TOKENS = new Set(['true', '1', 'yes']);
const FALSE_TOKENS = new Set(['false', '0', 'no']);

function formatBoolean(value: boolean): string {
  return value ? 'true' : 'false';
}

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * Dates travel as UTC `YYYY-MM-DDTHH:MM:SSZ`, without milliseconds.
 */
export function formatDate(value: Date): string {
  return value.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Accepts `YYYY-MM-DD` with an optional time (`T` or space separated),
 * optional fraction and optional `Z`. Always read as UTC.
 */
export function parseDate(text: string): Date | undefined {
  const match = DATE_PATTERN.exec(text);
  if (!match) return undefined;

  const [, y, mo, d, h = '0', mi = '0', s = '0', fraction = ''] = match;
  const year = Number(y);
  const month = Number(mo) - 1;
  const day = Number(d);
  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;
  const date = new Date(Date.UTC(year, month, day, Number(h), Number(mi), Number(s), millis));

  // Date.UTC rolls 2024-02-30 over to March; reject instead
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== Number(h) ||
    date.getUTCMinutes() !== Number(mi) ||
    date.getUTCSeconds() !== Number(s)
  ) {
    return undefined;
  }
  return date;
}

const CODECS: Record<ParamType, Codec> = {
  string: {
    parse: (text) => text,
    format: (value) => {
      if (typeof value === 'string') return value;
      if (typeof value === 'number') return Number.isFinite(value) ? String(value) : undefined;
      if (typeof value === 'boolean') return formatBoolean(value);
      if (isValidDate(value)) return formatDate(value);
      return undefined;
    },
  },
  integer: {
    parse: (text) => {
      if (!INTEGER_PATTERN.test(text)) return undefined;
      const n = Number(text);
      if (!Number.isSafeInteger(n)) return undefined;
      return n === 0 ? 0 : n;
    },
    format: (value) => {
      if (typeof value === 'number') return Number.isSafeInteger(value) ? String(value) : undefined;
      if (typeof value === 'string') return INTEGER_PATTERN.test(value) ? value : undefined;
      return undefined;
    },
  },
  float: {
    parse: (text) => {
      if (!FLOAT_PATTERN.test(text)) return undefined;
      const n = Number(text);
      return Number.isFinite(n) ? n : undefined;
    },
    format: (value) => {
      if (typeof value === 'number') return Number.isFinite(value) ? String(value) : undefined;
      if (typeof value === 'string') return FLOAT_PATTERN.test(value) ? value : undefined;
      return undefined;
    },
  },
  boolean: {
    parse: (text) => {
      const token = text.toLowerCase();
      if (TRUE_TOKENS.has(token)) return true;
      if (FALSE_TOKENS.has(token)) return false;
      return undefined;
    },
    format: (value) => (typeof value === 'boolean' ? formatBoolean(value) : undefined),
  },
  date: {
    parse: parseDate,
    format: (value) => (isValidDate(value) ? formatDate(value) : undefined),
  },
};

export const PARAM_TYPES: readonly ParamType[] = ['string', 'integer', 'float', 'boolean', 'date'];

export function isParamType(value: unknown): value is ParamType {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(CODECS, value);
}

/**
 * Checked when a parameter is declared, so that a bad type tag never reaches
 * a render or a parse.
 */
export function assertParamType(value: unknown, parameter: string): ParamType {
  if (value === undefined) return 'string';
  if (!isParamType(value)) {
    throw new ConfigurationError(
      `Unknown type ${JSON.stringify(value)}; expected one of ${PARAM_TYPES.join(', ')}`,
      parameter,
    );
  }
  return value;
}

export function coerce(parameter: string, type: ParamType, raw: string): ScalarValue {
  const value = CODECS[type].parse(raw);
  if (value === undefined) {
    throw new CoercionError(parameter, type, raw);
  }
  return value;
}

export function formatValue(parameter: string, type: ParamType, value: unknown): string {
  const text = CODECS[type].format(value);
  if (text === undefined) {
    throw new ConfigurationError(`No ${type} form for value ${describe(value)}`, parameter);
  }
  return text;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (value instanceof Date) return isValidDate(value) ? `date ${formatDate(value)}` : 'Invalid Date';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') return 'object';
  if (typeof value === 'number') return String(value);
  return `${JSON.stringify(value) ?? String(value)} (${typeof value})`;
}
