/**
 * Directive Parser
 * Layer: Application
 *
 * Compiles an access-log format string into a Template:
 *
 *   %%            literal percent sign
 *   %X            built-in directive, X one of t a r M U Q V s b T D
 *   %{NAME}i      request header          %{NAME}o   response header
 *   %{NAME}xi     custom request tag      %{NAME}xo  custom response tag
 *   %{r}a         socket peer address     %{NAME}e   environment variable
 *
 * Any directive may be followed by `(text)`. The text is kept as the
 * directive's sub-format and printed after the value, parentheses included;
 * it is never scanned for directives. Everything else is literal.
 *
 * Compilation is all-or-nothing: the first malformed directive throws a
 * TemplateSyntaxError and no Template is produced.
 */
import type { BuiltinKey, DirectiveKind, Segment } from '@domain/entities/Template';
import { Template } from '@domain/entities/Template';
import { BUILTIN_KEYS } from '@shared/constants';
import { TemplateSyntaxError } from '@shared/errors/AppError';

const BUILTIN_KEY_SET: ReadonlySet<string> = new Set(BUILTIN_KEYS);
const NAME_CHAR = /[A-Za-z0-9_-]/;

function isBuiltinKey(key: string): key is BuiltinKey {
  return BUILTIN_KEY_SET.has(key);
}

function syntaxError(source: string, index: number, reason: string): TemplateSyntaxError {
  return new TemplateSyntaxError(reason, Buffer.byteLength(source.slice(0, index), 'utf8'));
}

/** Parses `%{NAME}suffix` starting at the `%`; returns the directive and the index after it. */
function parseNamed(source: string, start: number): { directive: DirectiveKind; end: number } {
  let close = start + 2;
  while (close < source.length && NAME_CHAR.test(source.charAt(close))) close++;

  if (close >= source.length) {
    throw syntaxError(source, start, "unterminated '{'");
  }
  if (source.charAt(close) !== '}') {
    throw syntaxError(source, start, `invalid character '${source.charAt(close)}' in directive name`);
  }
  const name = source.slice(start + 2, close);
  if (name.length === 0) {
    throw syntaxError(source, start, 'empty directive name');
  }

  const at = close + 1;
  if (source.startsWith('xi', at)) {
    return { directive: { type: 'customTag', name, direction: 'request' }, end: at + 2 };
  }
  if (source.startsWith('xo', at)) {
    return { directive: { type: 'customTag', name, direction: 'response' }, end: at + 2 };
  }

  switch (source.charAt(at)) {
    case 'i':
      return { directive: { type: 'header', name, direction: 'request' }, end: at + 1 };
    case 'o':
      return { directive: { type: 'header', name, direction: 'response' }, end: at + 1 };
    case 'e':
      return { directive: { type: 'environment', name }, end: at + 1 };
    case 'a':
      if (name !== 'r') {
        throw syntaxError(source, start, `unsupported address directive '%{${name}}a'`);
      }
      return { directive: { type: 'peerAddress' }, end: at + 1 };
    default:
      throw syntaxError(source, start, `expected i, o, xi, xo, a or e after '%{${name}}'`);
  }
}

/** Reads an optional balanced `(...)` at `start`. */
function parseSubFormat(source: string, start: number): { subFormat?: string; end: number } {
  if (source.charAt(start) !== '(') return { end: start };

  let depth = 0;
  for (let i = start; i < source.length; i++) {
    const ch = source.charAt(i);
    if (ch === '(') depth++;
    else if (ch === ')' && --depth === 0) {
      return { subFormat: source.slice(start + 1, i), end: i + 1 };
    }
  }
  throw syntaxError(source, start, "unterminated '('");
}

export function compile(source: string): Template {
  const segments: Segment[] = [];
  let literal = '';
  let index = 0;

  const flushLiteral = (): void => {
    if (literal.length > 0) {
      segments.push({ kind: 'literal', text: literal });
      literal = '';
    }
  };

  while (index < source.length) {
    const percent = source.indexOf('%', index);
    if (percent === -1) {
      literal += source.slice(index);
      break;
    }
    literal += source.slice(index, percent);

    if (percent + 1 >= source.length) {
      throw syntaxError(source, percent, "dangling '%' at end of format");
    }
    const key = source.charAt(percent + 1);

    if (key === '%') {
      literal += '%';
      index = percent + 2;
      continue;
    }

    let directive: DirectiveKind;
    let end: number;
    if (key === '{') {
      ({ directive, end } = parseNamed(source, percent));
    } else if (isBuiltinKey(key)) {
      directive = { type: 'builtin', key };
      end = percent + 2;
    } else {
      throw syntaxError(source, percent, `unknown directive '%${key}'`);
    }

    const { subFormat, end: next } = parseSubFormat(source, end);
    flushLiteral();
    segments.push({
      kind: 'directive',
      spec: subFormat === undefined ? { directive } : { directive, subFormat },
    });
    index = next;
  }

  flushLiteral();
  return new Template(source, segments);
}
