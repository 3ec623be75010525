/**
 * ArgumentValidator: turns whitespace-split command tokens into a
 * ParsedCommand, or reports the first offending token with its offset in the
 * joined command line.
 *
 * Three passes, in order:
 *   1. length guard     (every token ≤ MAX_TOKEN_LENGTH)
 *   2. charset guard    (every token ASCII)
 *   3. classification + association, a small state machine over
 *      { value, single-dash flag, double-dash flag } with one lookback slot
 *
 * A value directly after a single-dash flag is bound to that flag; any other
 * value is a positional. Double-dash flags naming a boolean entry set their
 * option bit. Required positional arity is not checked.
 */

import { lookupFlag, optionMask, type ArgumentSchema, type ArgumentType } from './schema.js';
import { err, ok, type Result } from '../types/result.js';

export const MAX_TOKEN_LENGTH = 128;

// ─── Types ────────────────────────────────────────────────────────────────────

export type FlagValue = number | string | boolean;

export interface ParsedCommand {
  positionals: Array<number | string>;
  /** Positionals as typed, index-aligned with `positionals`. */
  positionalText: string[];
  flags: Record<string, FlagValue>;
  options: number;
}

/** A token as it appears in the joined command line. */
export interface TokenRef {
  text: string;
  index: number;
  offset: number;
}

export type ValueType = 'integer' | 'float' | 'text';

export type ValidationError =
  | { kind: 'TokenTooLarge'; token: TokenRef; length: number; limit: number }
  | { kind: 'NonAsciiToken'; token: TokenRef }
  | { kind: 'MalformedToken'; token: TokenRef }
  | { kind: 'UnknownFlag'; token: TokenRef; value: TokenRef }
  | { kind: 'FlagTypeMismatch'; token: TokenRef; value: TokenRef; expected: ArgumentType; actual: ValueType };

export type TokenClass =
  | { kind: 'value'; type: ValueType; value: number | string }
  | { kind: 'flag'; dashes: 1 | 2; name: string };

type Lookback =
  | { kind: 'none' }
  | { kind: 'value' }
  | { kind: 'double-flag' }
  | { kind: 'single-flag'; name: string; ref: TokenRef };

// ─── Token grammar ────────────────────────────────────────────────────────────

const NUMERIC_RE = /^-?(?:\d+(?:\.\d*)?|\.\d+)$/;
const WORD_RE = /^[A-Za-z]+$/;
const FLAG_RE = /^(--?)([a-z](?:-?[a-z])*)$/;
const NON_ASCII_RE = /[^\x00-\x7F]/;

/** Length in code points, so offsets line up with what the user typed. */
function charLength(token: string): number {
  return Array.from(token).length;
}

/**
 * Classify a single (ASCII, length-checked) token.
 * Returns null when the token matches no part of the grammar.
 */
export function classifyToken(token: string): TokenClass | null {
  if (NUMERIC_RE.test(token)) {
    const isFloat = token.includes('.');
    return { kind: 'value', type: isFloat ? 'float' : 'integer', value: Number(token) };
  }
  if (WORD_RE.test(token)) {
    return { kind: 'value', type: 'text', value: token };
  }
  const flag = FLAG_RE.exec(token);
  if (flag) {
    return { kind: 'flag', dashes: flag[1] === '--' ? 2 : 1, name: flag[2] };
  }
  return null;
}

function accepts(expected: ArgumentType, actual: ValueType): boolean {
  switch (expected) {
    case 'integer':
      return actual === 'integer';
    case 'float':
      return actual === 'integer' || actual === 'float';
    case 'text':
      return actual === 'text';
    case 'boolean':
      return false;
  }
}

// ─── Validator ────────────────────────────────────────────────────────────────

export function validate(schema: ArgumentSchema, tokens: readonly string[]): Result<ParsedCommand, ValidationError> {
  const refs: TokenRef[] = [];
  const lengths: number[] = [];
  let offset = 0;
  for (const [index, text] of tokens.entries()) {
    const length = charLength(text);
    refs.push({ text, index, offset });
    lengths.push(length);
    offset += length + 1;
  }

  for (const ref of refs) {
    const length = lengths[ref.index];
    if (length > MAX_TOKEN_LENGTH) {
      return err({ kind: 'TokenTooLarge', token: ref, length, limit: MAX_TOKEN_LENGTH });
    }
  }

  for (const ref of refs) {
    if (NON_ASCII_RE.test(ref.text)) {
      return err({ kind: 'NonAsciiToken', token: ref });
    }
  }

  const parsed: ParsedCommand = { positionals: [], positionalText: [], flags: {}, options: 0 };
  let lookback: Lookback = { kind: 'none' };

  for (const ref of refs) {
    const cls = classifyToken(ref.text);
    if (!cls) {
      return err({ kind: 'MalformedToken', token: ref });
    }

    if (cls.kind === 'value') {
      if (lookback.kind === 'single-flag') {
        const spec = lookupFlag(schema, lookback.name);
        if (!spec) {
          return err({ kind: 'UnknownFlag', token: lookback.ref, value: ref });
        }
        if (!accepts(spec.type, cls.type)) {
          return err({
            kind: 'FlagTypeMismatch',
            token: lookback.ref,
            value: ref,
            expected: spec.type,
            actual: cls.type,
          });
        }
        parsed.flags[lookback.name] = cls.value;
      } else {
        parsed.positionals.push(cls.value);
        parsed.positionalText.push(ref.text);
      }
      lookback = { kind: 'value' };
      continue;
    }

    if (cls.dashes === 2) {
      const spec = lookupFlag(schema, cls.name);
      // Unknown or non-boolean long flags are ignored
      if (spec?.type === 'boolean') {
        parsed.flags[cls.name] = true;
        parsed.options = (parsed.options | optionMask(schema, cls.name)) >>> 0;
      }
      lookback = { kind: 'double-flag' };
    } else {
      lookback = { kind: 'single-flag', name: cls.name, ref };
    }
  }

  return ok(parsed);
}
