/**
 * Compiled Access-Log Template
 * Layer: Domain
 *
 * `compile()` (application/format/DirectiveParser.ts) turns a format string
 * into a flat list of segments once at startup; the renderer walks that list
 * for every request. A Template is frozen on construction and never mutated.
 */
import type { BUILTIN_KEYS } from '@shared/constants';

export type BuiltinKey = (typeof BUILTIN_KEYS)[number];

/** `i`/`xi` directives read the request, `o`/`xo` the response. */
export type Direction = 'request' | 'response';

export type DirectiveKind =
  | { type: 'builtin'; key: BuiltinKey }
  | { type: 'header'; name: string; direction: Direction }
  | { type: 'customTag'; name: string; direction: Direction }
  | { type: 'peerAddress' }
  | { type: 'environment'; name: string };

export interface DirectiveSpec {
  readonly directive: DirectiveKind;
  /** Text from a trailing `(...)`, appended in parentheses after the value. Never evaluated. */
  readonly subFormat?: string;
}

export type Segment =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'directive'; readonly spec: DirectiveSpec };

export class Template {
  readonly segments: readonly Segment[];

  constructor(
    readonly source: string,
    segments: Segment[],
  ) {
    this.segments = Object.freeze([...segments]);
    Object.freeze(this);
  }

  /** Names of the custom tags the template references in the given direction. */
  customTags(direction: Direction): string[] {
    const names = new Set<string>();
    for (const segment of this.segments) {
      if (segment.kind !== 'directive') continue;
      const { directive } = segment.spec;
      if (directive.type === 'customTag' && directive.direction === direction) {
        names.add(directive.name);
      }
    }
    return [...names];
  }
}
