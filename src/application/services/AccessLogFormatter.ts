/**
 * Access Log Formatter: The Facade
 * Layer: Application
 * Pattern: Facade + Builder
 *
 * Owns one compiled Template, its custom tag registry and the optional span
 * factory. The app registers its tags on it while starting up:
 *
 *   formatter
 *     .registerRequestTag('ALL_REQ_HEADERS', (req) => ...)
 *     .registerResponseTag('ALL_RES_HEADERS', (res) => ...)
 *     .withSpanFactory((req) => ({ requestId: randomUUID() }));
 *
 * createAccessLogger() seals it before the first request, after which the
 * formatter is read-only and render() can be called from any number of
 * in-flight requests.
 */
import { render } from '@application/format/Renderer';
import { TagRegistry } from '@application/format/TagRegistry';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { RenderContext, RequestView } from '@domain/entities/RenderContext';
import type { Direction, Template } from '@domain/entities/Template';
import type {
  RequestTagEvaluator,
  ResponseTagEvaluator,
  SpanBindings,
  SpanFactory,
} from '@domain/interfaces/ITagEvaluator';
import { TagRegistrationError } from '@shared/errors/AppError';
import { inject, injectable } from 'tsyringe';

@injectable()
export class AccessLogFormatter {
  private readonly registry = new TagRegistry();
  private spanFactory: SpanFactory | null = null;

  constructor(
    @inject(TOKENS.AccessLogTemplate) readonly template: Template,
    @inject(TOKENS.Logger) private logger: Logger,
  ) {}

  registerRequestTag(name: string, evaluator: RequestTagEvaluator): this {
    this.registry.registerRequestTag(name, evaluator);
    this.warnIfUnreferenced('request', name);
    return this;
  }

  registerResponseTag(name: string, evaluator: ResponseTagEvaluator): this {
    this.registry.registerResponseTag(name, evaluator);
    this.warnIfUnreferenced('response', name);
    return this;
  }

  withSpanFactory(factory: SpanFactory): this {
    if (this.registry.isSealed) {
      throw new TagRegistrationError('Cannot set a span factory after the access logger is sealed');
    }
    this.spanFactory = factory;
    return this;
  }

  /** Correlation bindings for this request, or null when no span factory is set. */
  makeSpan(request: RequestView): SpanBindings | null {
    return this.spanFactory ? this.spanFactory(request) : null;
  }

  render(ctx: RenderContext): string {
    return render(this.template, ctx, this.registry);
  }

  /** Freezes registrations. Safe to call more than once. */
  seal(): void {
    if (this.registry.isSealed) return;
    this.registry.seal();

    for (const direction of ['request', 'response'] as const) {
      for (const name of this.template.customTags(direction)) {
        if (!this.registry.has(direction, name)) {
          this.logger.warn(
            { tag: name, direction },
            'Custom tag in access log format has no evaluator; it will render as "-"',
          );
        }
      }
    }
  }

  get isSealed(): boolean {
    return this.registry.isSealed;
  }

  private warnIfUnreferenced(direction: Direction, name: string): void {
    if (!this.template.customTags(direction).includes(name)) {
      this.logger.warn(
        { tag: name, direction, format: this.template.source },
        'Registered custom tag is not used by the access log format',
      );
    }
  }
}
