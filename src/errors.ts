export class ScadError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
  }
}

export class ConstructionError extends ScadError {}

export class DimensionalityError extends ScadError {}

export class DimensionalityZeroError extends DimensionalityError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("dimensionality_zero", message, details);
  }
}

export class DimensionalityMismatchError extends DimensionalityError {}

// Thrown where a non-expression value takes the place of an expression.
export class ExpressionTypeError extends TypeError {
  readonly code = "expression_type";
  readonly details?: Record<string, unknown>;
  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.details = details;
  }
}

export class StringEncodingError extends ScadError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("string_encoding", message, details);
  }
}

export class OperatorError extends ScadError {}

export class TranspileError extends ScadError {}

export class BundleError extends ScadError {}
