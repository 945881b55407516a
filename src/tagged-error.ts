/**
 * iso-period/tagged-error
 *
 * Factory for error classes that carry a `_tag` discriminant and structured props.
 * Parse failures are built with it so callers can switch on the kind of failure
 * instead of matching message text.
 *
 * @example
 * ```typescript
 * class MissingPeriodMarkerError extends TaggedError("MissingPeriodMarkerError", {
 *   message: (p: { input: string }) => `expected 'P' period mark at the start: ${p.input}`,
 * }) {}
 *
 * const error = new MissingPeriodMarkerError({ input: "1Y" });
 * error._tag;                  // "MissingPeriodMarkerError"
 * error.input;                 // "1Y"
 * error instanceof TaggedError; // true
 * ```
 */

/**
 * Options for the TaggedError factory.
 */
export interface TaggedErrorCreateOptions<Props extends Record<string, unknown>> {
  /** Message generator. Annotate the parameter; Props is inferred from it. */
  message: (props: Props) => string;
}

/**
 * Base interface for all tagged errors.
 */
export interface TaggedErrorBase extends Error {
  readonly _tag: string;
}

/**
 * Internal base class for instanceof checks.
 * @internal
 */
class InternalTaggedErrorBase extends Error implements TaggedErrorBase {
  readonly _tag!: string;
}

type TaggedErrorInstance<Tag extends string, Props> = TaggedErrorBase & {
  readonly _tag: Tag;
} & Readonly<Props>;

/**
 * Constructor type returned by the TaggedError factory.
 */
export interface TaggedErrorConstructor<
  Tag extends string,
  Props extends Record<string, unknown>,
> {
  new (props: Props): TaggedErrorInstance<Tag, Props>;
  readonly prototype: TaggedErrorInstance<Tag, Props>;
}

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type FnReturnType<T> = T extends (...args: any[]) => infer R ? R : never;

type HandlersReturnType<H> = { [K in keyof H]: FnReturnType<H[K]> }[keyof H];

/**
 * Creates a tagged error class. Props are inferred from the `message` callback.
 *
 * `_tag`, `name`, `message` and `stack` are stripped from props so the
 * discriminant cannot be forged.
 */
function TaggedError<Tag extends string, Props extends Record<string, unknown>>(
  tag: Tag,
  options: TaggedErrorCreateOptions<Props>
): TaggedErrorConstructor<Tag, Props>;

function TaggedError<Tag extends string, Props extends Record<string, unknown>>(
  tag: Tag,
  options: TaggedErrorCreateOptions<Props>
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
): any {
  return class extends InternalTaggedErrorBase {
    override readonly _tag: Tag = tag;

    constructor(props: Props) {
      super(options.message(props));
      this.name = tag;

      // Maintains proper prototype chain for instanceof checks
      Object.setPrototypeOf(this, new.target.prototype);

      const { _tag: _, name: _n, message: _m, stack: _s, ...safeProps } = props;
      Object.assign(this, safeProps);
    }
  };
}

// Add Symbol.hasInstance so `instanceof TaggedError` works
Object.defineProperty(TaggedError, Symbol.hasInstance, {
  value: (instance: unknown): boolean => instance instanceof InternalTaggedErrorBase,
});

/**
 * Namespace for static methods on TaggedError.
 */
// eslint-disable-next-line @typescript-eslint/no-namespace
namespace TaggedError {
  /**
   * Type guard for genuine TaggedError instances (created via the factory).
   */
  export function isTaggedError(value: unknown): value is TaggedErrorBase {
    return value instanceof InternalTaggedErrorBase;
  }

  /**
   * Exhaustively matches on a tagged error, requiring a handler for every variant.
   *
   * @example
   * ```typescript
   * const hint = TaggedError.match(error, {
   *   EmptyOrSignOnlyInputError: () => "nothing to parse",
   *   MissingPeriodMarkerError: () => "start with P",
   *   MissingFieldNumberError: (e) => `put a number before ${e.designator}`,
   *   MalformedFieldNumberError: (e) => e.reason,
   *   TrailingTextError: (e) => `remove ${e.remaining}`,
   *   NoFieldsMatchedError: () => "add at least one field",
   * });
   * ```
   */
  export function match<
    E extends TaggedErrorBase,
    H extends { [K in E["_tag"]]: (e: Extract<E, { _tag: K }>) => unknown },
  >(error: E, handlers: H): HandlersReturnType<H> {
    const tag = error._tag as E["_tag"];
    const handler = handlers[tag];
    return handler(
      error as Extract<E, { _tag: typeof tag }>
    ) as HandlersReturnType<H>;
  }
}

export { TaggedError };

/**
 * Helper type to extract the _tag literal type from a TaggedError.
 */
export type TagOf<E extends TaggedErrorBase> = E["_tag"];

/**
 * Helper type to extract a specific variant from a TaggedError union by tag.
 *
 * @example
 * ```typescript
 * type Trailing = ErrorByTag<PeriodParseError, "TrailingTextError">;
 * ```
 */
export type ErrorByTag<
  E extends TaggedErrorBase,
  Tag extends E["_tag"],
> = Extract<E, { _tag: Tag }>;
