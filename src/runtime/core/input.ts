/**
 * Input Line Parsing
 *
 * Converts one line read by an input statement into a value. Variants
 * are tried in order Integer, Float, Boolean, String; the first that
 * accepts the trimmed text wins.
 */

import type { GroveValue } from './values.js';
import {
  INTEGER_MAX,
  INTEGER_MIN,
  boolean,
  float,
  integer,
  string,
} from './values.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN =
  /^[+-]?(?:inf|infinity|nan|(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)$/i;

function parseInteger(text: string): GroveValue | undefined {
  if (!INTEGER_PATTERN.test(text)) return undefined;
  const value = BigInt(text.startsWith('+') ? text.slice(1) : text);
  if (value < INTEGER_MIN || value > INTEGER_MAX) return undefined;
  return integer(value);
}

function parseFloatLiteral(text: string): GroveValue | undefined {
  if (!FLOAT_PATTERN.test(text)) return undefined;
  const negative = text.startsWith('-');
  const body = text.replace(/^[+-]/, '').toLowerCase();
  if (body === 'inf' || body === 'infinity') {
    return float(negative ? -Infinity : Infinity);
  }
  if (body === 'nan') return float(NaN);
  return float(Number(text));
}

function parseBoolean(text: string): GroveValue | undefined {
  if (text === 'true') return boolean(true);
  if (text === 'false') return boolean(false);
  return undefined;
}

/**
 * Parse an input line. Surrounding whitespace is ignored; an empty line
 * yields an empty String.
 *
 * @example
 * parseInputLine(' 42 ')   // Integer(42)
 * parseInputLine('3.5')    // Float(3.5)
 * parseInputLine('true')   // Boolean(true)
 * parseInputLine('hello')  // String("hello")
 */
export function parseInputLine(line: string): GroveValue {
  const text = line.trim();
  return (
    parseInteger(text) ??
    parseFloatLiteral(text) ??
    parseBoolean(text) ??
    string(text)
  );
}
