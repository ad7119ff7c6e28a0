/**
 * Errors raised by the runtime. Each is a `Schema.TaggedError`, so it can be matched by
 * `_tag` or `Effect.catchTag` when a caller runs dispatch inside an effect.
 *
 * Faults raised by generated code or observers (kind and shape mismatches, popping an
 * empty state stack) are thrown, not returned: they indicate a defect, and there is no
 * recovery path.
 *
 * @module
 */
import { Schema } from "effect";

/** Environment value extracted as the wrong kind */
export class KindMismatchError extends Schema.TaggedError<KindMismatchError>()(
  "KindMismatchError",
  {
    expected: Schema.String,
    actual: Schema.String,
    field: Schema.optional(Schema.String),
  },
) {}

/** Live state/method instance coerced to a shape it does not have */
export class ShapeMismatchError extends Schema.TaggedError<ShapeMismatchError>()(
  "ShapeMismatchError",
  {
    expected: Schema.String,
    actual: Schema.String,
  },
) {}

/** Pop requested while the state stack is empty */
export class EmptyStateStackError extends Schema.TaggedError<EmptyStateStackError>()(
  "EmptyStateStackError",
  { machine: Schema.String },
) {}

/** Static machine table references a name it does not declare */
export class InvalidMachineInfoError extends Schema.TaggedError<InvalidMachineInfoError>()(
  "InvalidMachineInfoError",
  {
    machine: Schema.String,
    reason: Schema.String,
  },
) {}

/** Raised by {@link assertOrder} */
export class AssertionError extends Schema.TaggedError<AssertionError>()("AssertionError", {
  message: Schema.String,
}) {}
