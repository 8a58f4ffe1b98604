/**
 * Custom Tag Registry
 * Layer: Application
 *
 * Holds the evaluators behind `%{NAME}xi` (request) and `%{NAME}xo`
 * (response). Registration happens while the app is being assembled; once
 * the access logger middleware is created the registry is sealed and every
 * later registration throws, so concurrent requests only ever read it.
 *
 * Re-registering a name replaces the earlier evaluator. Names must fit the
 * `%{NAME}` grammar and may not reuse a single-character built-in key.
 */
import type { Direction } from '@domain/entities/Template';
import type {
  RequestTagEvaluator,
  ResponseTagEvaluator,
} from '@domain/interfaces/ITagEvaluator';
import { BUILTIN_KEYS, TAG_NAME_PATTERN } from '@shared/constants';
import { TagRegistrationError } from '@shared/errors/AppError';

const RESERVED_NAMES: ReadonlySet<string> = new Set<string>([...BUILTIN_KEYS, '%']);

export class TagRegistry {
  private readonly requestTags = new Map<string, RequestTagEvaluator>();
  private readonly responseTags = new Map<string, ResponseTagEvaluator>();
  private sealed = false;

  registerRequestTag(name: string, evaluator: RequestTagEvaluator): this {
    this.assertRegistrable(name);
    this.requestTags.set(name, evaluator);
    return this;
  }

  registerResponseTag(name: string, evaluator: ResponseTagEvaluator): this {
    this.assertRegistrable(name);
    this.responseTags.set(name, evaluator);
    return this;
  }

  requestTag(name: string): RequestTagEvaluator | undefined {
    return this.requestTags.get(name);
  }

  responseTag(name: string): ResponseTagEvaluator | undefined {
    return this.responseTags.get(name);
  }

  has(direction: Direction, name: string): boolean {
    return direction === 'request' ? this.requestTags.has(name) : this.responseTags.has(name);
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  private assertRegistrable(name: string): void {
    if (this.sealed) {
      throw new TagRegistrationError(
        `Cannot register custom tag "${name}": the registry is sealed once requests are served`,
      );
    }
    if (RESERVED_NAMES.has(name)) {
      throw new TagRegistrationError(`Custom tag name "${name}" is reserved for a built-in directive`);
    }
    if (!TAG_NAME_PATTERN.test(name)) {
      throw new TagRegistrationError(
        `Custom tag name "${name}" must match ${TAG_NAME_PATTERN.source}`,
      );
    }
  }
}
