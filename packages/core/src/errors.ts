/**
 * Error types for array, buffer and index operations
 *
 * Every contract violation is reported synchronously by throwing one of the
 * classes below. Each carries a stable `code`, a coarse `category` and an
 * optional context record used by `getFormattedMessage()`.
 */

export type ErrorCategory = 'rank' | 'bounds' | 'shape' | 'buffer' | 'access' | 'argument';

export type ErrorContext = Readonly<Record<string, unknown>>;

/**
 * Base class of all errors thrown by ndkit packages
 */
export class NdArrayError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    public readonly context?: ErrorContext,
  ) {
    super(message);
    this.name = 'NdArrayError';
    this.code = code;
    this.category = category;
  }

  getFormattedMessage(): string {
    let formatted = `${this.name}: ${this.message}`;
    if (this.context && Object.keys(this.context).length > 0) {
      formatted += '\nContext:\n';
      for (const [key, value] of Object.entries(this.context)) {
        formatted += `  ${key}: ${formatContextValue(value)}\n`;
      }
    }
    return formatted;
  }
}

/**
 * Malformed argument (zero range step, non-scalar index source, ...)
 */
export class InvalidArgumentError extends NdArrayError {
  constructor(
    message: string,
    context?: ErrorContext,
    code = 'INVALID_ARGUMENT',
    category: ErrorCategory = 'argument',
  ) {
    super(message, code, category, context);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Coordinate count or iteration depth does not fit the array rank.
 *
 * A rank mismatch is a special kind of invalid argument, so callers catching
 * `InvalidArgumentError` also see it.
 */
export class RankMismatchError extends InvalidArgumentError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'RANK_MISMATCH', 'rank');
    this.name = 'RankMismatchError';
  }
}

/**
 * Coordinate, position or index bound outside its valid span
 */
export class IndexOutOfRangeError extends NdArrayError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'INDEX_OUT_OF_RANGE', 'bounds', context);
    this.name = 'IndexOutOfRangeError';
  }
}

/**
 * Source and destination shapes (or declared sizes) differ
 */
export class ShapeMismatchError extends NdArrayError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'SHAPE_MISMATCH', 'shape', context);
    this.name = 'ShapeMismatchError';
  }
}

/**
 * Starting offset of a bulk transfer is negative or past the end
 */
export class InvalidOffsetError extends NdArrayError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'INVALID_OFFSET', 'buffer', context);
    this.name = 'InvalidOffsetError';
  }
}

/**
 * Not enough elements left in the source of a transfer
 */
export class BufferUnderrunError extends NdArrayError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'BUFFER_UNDERRUN', 'buffer', context);
    this.name = 'BufferUnderrunError';
  }
}

/**
 * Not enough room left in the destination of a transfer
 */
export class BufferOverrunError extends NdArrayError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'BUFFER_OVERRUN', 'buffer', context);
    this.name = 'BufferOverrunError';
  }
}

/**
 * Mutation attempted on read-only storage
 */
export class ReadOnlyViolationError extends NdArrayError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'READ_ONLY_VIOLATION', 'access', context);
    this.name = 'ReadOnlyViolationError';
  }
}

/**
 * Constructor of any error class above, as accepted by `toThrow` matchers
 */
export type NdArrayErrorClass = new (message: string, context?: ErrorContext) => NdArrayError;

/**
 * Forces TypeScript to check that all cases of a closed union are handled
 *
 * @example
 * switch (spec.kind) {
 *   case 'all': return ...;
 *   // ... all other cases
 *   default:
 *     return assertExhaustiveSwitch(spec); // compile error if a case is missing
 * }
 */
export function assertExhaustiveSwitch(value: never): never {
  throw new NdArrayError(`Unhandled case: ${JSON.stringify(value)}`, 'UNREACHABLE', 'argument');
}

function formatContextValue(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => String(item)).join(', ')}]`;
  }
  return String(value);
}
