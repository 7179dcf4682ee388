import { ConfigurationError } from '../lib/errors.js';

declare const __brand: unique symbol;

type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Tag partitioning interchangeable resources ("quota" artists, "support" technicians...). */
export type ResourceType = Brand<string, 'ResourceType'>;

/** Item classification selecting per-stage effort overrides ("high", "low"...). */
export type ComplexityLevel = Brand<string, 'ComplexityLevel'>;

/**
 * Open-ended set of string tags. New tags are registered at configuration
 * time; `resolve` is the only way to obtain the branded value, so call sites
 * that take a tag can only receive a registered one.
 */
export class TagRegistry<T extends string> {
  private readonly tags = new Set<string>();

  constructor(
    private readonly kind: string,
    defaults: readonly string[] = [],
  ) {
    for (const tag of defaults) this.tags.add(tag);
  }

  register(tag: string): T {
    const trimmed = tag.trim();
    if (trimmed.length === 0) {
      throw new ConfigurationError(`${this.kind} tag must not be empty`);
    }
    this.tags.add(trimmed);
    return this.brand(trimmed);
  }

  has(tag: string): boolean {
    return this.tags.has(tag);
  }

  resolve(tag: string): T {
    if (!this.tags.has(tag)) {
      throw new ConfigurationError(`Unknown ${this.kind}: '${tag}'`, {
        known: this.list(),
      });
    }
    return this.brand(tag);
  }

  list(): T[] {
    return [...this.tags].map((t) => this.brand(t));
  }

  private brand(tag: string): T {
    return tag as T;
  }
}

export const QUOTA = 'quota';
export const SUPPORT = 'support';
export const REVIEW = 'review';

export function createResourceTypeRegistry(
  extra: readonly string[] = [],
): TagRegistry<ResourceType> {
  return new TagRegistry<ResourceType>('resource type', [QUOTA, SUPPORT, REVIEW, ...extra]);
}

export function createComplexityRegistry(
  extra: readonly string[] = [],
): TagRegistry<ComplexityLevel> {
  return new TagRegistry<ComplexityLevel>('complexity level', ['high', 'low', ...extra]);
}
