/**
 * lazyflight/tagged-error
 *
 * Base factory for discriminated error classes. Every error carries a literal
 * `_tag`, so unions of errors can be narrowed with a `switch` or a guard.
 *
 * @example
 * ```typescript
 * class LoadError extends TaggedError("LoadError", {
 *   message: (p: { path: string }) => `LoadError: could not read ${p.path}`,
 * }) {
 *   declare readonly path: string;
 * }
 *
 * const error = new LoadError({ path: "/etc/app.json" });
 * error._tag;    // "LoadError"
 * error.path;    // "/etc/app.json"
 * error.message; // "LoadError: could not read /etc/app.json"
 * ```
 */

/**
 * Shape shared by every tagged error instance.
 */
export interface TaggedErrorInstance<Tag extends string = string> extends Error {
  readonly _tag: Tag;
}

/**
 * Options for a tagged error class.
 */
export interface TaggedErrorOptions<Props> {
  /** Builds the `message` from the constructor props. */
  message: (props: Props) => string;
}

/**
 * Create a tagged error base class.
 *
 * Props passed to the constructor are copied onto the instance. Subclasses
 * surface them to the type system with `declare readonly` fields, which emit
 * no initializer and so do not overwrite the copied values.
 */
export function TaggedError<Tag extends string, Props extends object>(
  tag: Tag,
  options: TaggedErrorOptions<Props>
) {
  return class extends Error implements TaggedErrorInstance<Tag> {
    readonly _tag: Tag = tag;

    constructor(props: Props, errorOptions?: ErrorOptions) {
      super(options.message(props), errorOptions);
      this.name = tag;
      Object.assign(this, props);
    }
  };
}

/**
 * Check whether a value is an error created through {@link TaggedError}.
 */
TaggedError.isTaggedError = (error: unknown): error is TaggedErrorInstance =>
  error instanceof Error &&
  "_tag" in error &&
  typeof error._tag === "string";
