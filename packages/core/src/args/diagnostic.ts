import type { TokenRef, ValidationError } from './validator.js';

export function describeValidationError(error: ValidationError): string {
  switch (error.kind) {
    case 'TokenTooLarge':
      return `Token at column ${error.token.offset + 1} is ${error.length} characters long (limit ${error.limit})`;
    case 'NonAsciiToken':
      return `Token "${error.token.text}" contains non-ASCII characters`;
    case 'MalformedToken':
      return `Unrecognized token "${error.token.text}"`;
    case 'UnknownFlag':
      return `Unknown flag "${error.token.text}"`;
    case 'FlagTypeMismatch':
      return `Flag "${error.token.text}" expects ${error.expected}, got ${error.actual} "${error.value.text}"`;
  }
}

function spansOf(error: ValidationError): TokenRef[] {
  if (error.kind === 'UnknownFlag' || error.kind === 'FlagTypeMismatch') {
    return [error.token, error.value];
  }
  return [error.token];
}

/**
 * Render the joined command line with every offending token underlined:
 *
 *   --fresh -p big
 *           ^~ ^~~
 */
export function renderDiagnostic(tokens: readonly string[], error: ValidationError): string {
  const line = tokens.join(' ');
  const marks: string[] = [];

  for (const span of spansOf(error)) {
    const width = Math.max(1, Array.from(span.text).length);
    while (marks.length < span.offset) marks.push(' ');
    marks[span.offset] = '^';
    for (let i = 1; i < width; i++) {
      marks[span.offset + i] = '~';
    }
  }

  return `${line}\n${marks.join('')}`;
}
