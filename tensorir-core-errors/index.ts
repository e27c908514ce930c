export abstract class TensorIRError extends Error {
  constructor(public readonly errorType: string, public readonly reason: string) {
    super(`[${errorType}]: ${reason}`);
    this.name = errorType;
  }
}

/**
 * Raised when a scalar type reaches an operation that has no rule for it. Seeing this from the
 * constant evaluator means a type was added to the type system without teaching the evaluator.
 */
export class UnsupportedDtypeError extends TensorIRError {
  constructor(public readonly scalarType: string, context?: string) {
    super(
      'UnsupportedDtype',
      context == null
        ? `Scalar type \`${scalarType}\` is not supported.`
        : `Scalar type \`${scalarType}\` is not supported by ${context}.`
    );
  }
}

export class UnsupportedOperatorError extends TensorIRError {
  constructor(public readonly operator: string) {
    super('UnsupportedOperator', `Operator \`${operator}\` is not supported.`);
  }
}

export class MalformedInputError extends TensorIRError {
  constructor(reason: string) {
    super('MalformedInput', reason);
  }
}
