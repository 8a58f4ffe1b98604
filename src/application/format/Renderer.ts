/**
 * Renderer
 * Layer: Application
 *
 * Walks a compiled Template and concatenates one string per segment. Each
 * directive is resolved on its own from the context and registry; nothing a
 * segment produces is visible to another, and the same inputs always give
 * the same line. Missing headers and unregistered tags print "-".
 */
import type { TagRegistry } from '@application/format/TagRegistry';
import { builtinDirectives } from '@application/format/builtinDirectives';
import type { HeaderMap } from '@domain/entities/HeaderMap';
import type { RenderContext } from '@domain/entities/RenderContext';
import type { DirectiveKind, DirectiveSpec, Template } from '@domain/entities/Template';
import { PLACEHOLDER } from '@shared/constants';

function headerValue(headers: HeaderMap, name: string): string {
  const values = headers.get(name);
  if (!values || values.length === 0) return PLACEHOLDER;
  if (values.length === 1) return values[0] ?? PLACEHOLDER;
  return JSON.stringify(values);
}

function resolve(directive: DirectiveKind, ctx: RenderContext, registry: TagRegistry): string {
  switch (directive.type) {
    case 'builtin':
      return builtinDirectives[directive.key](ctx);
    case 'header':
      return headerValue(
        directive.direction === 'request' ? ctx.request.headers : ctx.response.headers,
        directive.name,
      );
    case 'customTag':
      if (directive.direction === 'request') {
        const evaluator = registry.requestTag(directive.name);
        return evaluator ? evaluator(ctx.request) : PLACEHOLDER;
      } else {
        const evaluator = registry.responseTag(directive.name);
        return evaluator ? evaluator(ctx.response) : PLACEHOLDER;
      }
    case 'peerAddress':
      return ctx.request.peerAddress ?? PLACEHOLDER;
    case 'environment':
      return ctx.environment[directive.name] ?? PLACEHOLDER;
  }
}

function renderDirective(spec: DirectiveSpec, ctx: RenderContext, registry: TagRegistry): string {
  const value = resolve(spec.directive, ctx, registry);
  return spec.subFormat === undefined ? value : `${value}(${spec.subFormat})`;
}

export function render(template: Template, ctx: RenderContext, registry: TagRegistry): string {
  let line = '';
  for (const segment of template.segments) {
    line += segment.kind === 'literal' ? segment.text : renderDirective(segment.spec, ctx, registry);
  }
  return line;
}
