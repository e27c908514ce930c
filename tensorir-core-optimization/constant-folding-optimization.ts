import {
  TensorIRExpression,
  TensorIRBinaryOperator,
  TensorIRBinaryExpression,
  TIR_ADD,
  TIR_RAMP,
  TIR_BROADCAST,
  TIR_CAST,
  TIR_COMPARE_SELECT,
  TIR_INTRINSICS,
  TIR_LOAD,
  createBinaryOperatorExpression,
  dtypeEquals,
  isPureIntrinsic,
  isTensorIRExpressionConstant,
} from 'tensorir-core-ast';
import { evaluateConstantTensorIRExpression, PanicException } from 'tensorir-core-interpreter';
import { listShallowEquals } from 'tensorir-core-utils';

export type ConstantFoldingOptions = {
  /**
   * When true, a cast whose source was rewritten into a non-constant expression is rebuilt around
   * the new source. When false, such a cast is returned unchanged and only casts of constant
   * sources are folded.
   */
  readonly rebuildCastOnChange: boolean;
};

export const DEFAULT_CONSTANT_FOLDING_OPTIONS: ConstantFoldingOptions = {
  rebuildCastOnChange: true,
};

type Fold = (expression: TensorIRExpression) => TensorIRExpression;

/**
 * Proposes a simpler replacement for a binary node from its folded operands, or null. A proposal
 * is only taken when its dtype equals the dtype of the node it replaces.
 */
type IdentityRule = (
  lhs: TensorIRExpression,
  rhs: TensorIRExpression,
  fold: Fold
) => TensorIRExpression | null;

const isIntImmediateOf = (expression: TensorIRExpression, value: number): boolean =>
  expression.__type__ === 'TensorIRIntImmediateExpression' && expression.value.equals(value);

const isFloatImmediateOf = (expression: TensorIRExpression, value: number): boolean =>
  expression.__type__ === 'TensorIRFloatImmediateExpression' && expression.value === value;

const isBroadcastOfIntImmediate = (expression: TensorIRExpression, value: number): boolean =>
  expression.__type__ === 'TensorIRBroadcastExpression' &&
  isIntImmediateOf(expression.value, value);

const dropLeftIf =
  (predicate: (expression: TensorIRExpression) => boolean): IdentityRule =>
  (lhs, rhs) =>
    predicate(lhs) ? rhs : null;

const dropRightIf =
  (predicate: (expression: TensorIRExpression) => boolean): IdentityRule =>
  (lhs, rhs) =>
    predicate(rhs) ? lhs : null;

const isIntZero = (expression: TensorIRExpression) => isIntImmediateOf(expression, 0);
const isIntOne = (expression: TensorIRExpression) => isIntImmediateOf(expression, 1);
const isFloatOne = (expression: TensorIRExpression) => isFloatImmediateOf(expression, 1);
const isBroadcastZero = (expression: TensorIRExpression) =>
  isBroadcastOfIntImmediate(expression, 0);
const isBroadcastOne = (expression: TensorIRExpression) =>
  isBroadcastOfIntImmediate(expression, 1);

/**
 * Broadcast(b) + Ramp(base, stride) => Ramp(b + base, stride), with the new ramp folded again.
 * Only applies when both sides share a scalar type, since the ramp's lanes wrap at its own width.
 */
const mergeBroadcastIntoRamp =
  (broadcastOnLeft: boolean): IdentityRule =>
  (lhs, rhs, fold) => {
    const broadcast = broadcastOnLeft ? lhs : rhs;
    const ramp = broadcastOnLeft ? rhs : lhs;
    if (
      broadcast.__type__ !== 'TensorIRBroadcastExpression' ||
      ramp.__type__ !== 'TensorIRRampExpression' ||
      broadcast.dtype.scalarType !== ramp.dtype.scalarType
    ) {
      return null;
    }
    return fold(TIR_RAMP(TIR_ADD(broadcast.value, ramp.base), ramp.stride, ramp.lanes));
  };

const IDENTITY_RULES: Readonly<Record<TensorIRBinaryOperator, readonly IdentityRule[]>> = {
  Add: [
    dropLeftIf(isIntZero),
    dropRightIf(isIntZero),
    dropLeftIf(isBroadcastZero),
    mergeBroadcastIntoRamp(true),
    dropRightIf(isBroadcastZero),
    mergeBroadcastIntoRamp(false),
  ],
  Sub: [dropRightIf(isIntZero)],
  Mul: [
    dropLeftIf(isIntOne),
    dropRightIf(isIntOne),
    dropLeftIf(isFloatOne),
    dropRightIf(isFloatOne),
    dropLeftIf(isBroadcastOne),
    dropRightIf(isBroadcastOne),
  ],
  Div: [dropRightIf(isIntOne)],
  Mod: [],
  And: [],
  Or: [],
  Xor: [],
  Lshift: [],
  Rshift: [],
  Min: [],
  Max: [],
};

/** Integer traps such as a division by zero stay in the tree and trap at run time instead. */
const evaluateUnlessTrapping = (expression: TensorIRExpression): TensorIRExpression => {
  try {
    return evaluateConstantTensorIRExpression(expression);
  } catch (e) {
    if (e instanceof PanicException) return expression;
    throw e;
  }
};

/**
 * Folds constant sub-expressions into immediates and removes identity operands, bottom up.
 * Nodes whose children did not change are returned as the same reference.
 */
export default function constantFoldTensorIRExpression(
  expression: TensorIRExpression,
  { rebuildCastOnChange }: ConstantFoldingOptions = DEFAULT_CONSTANT_FOLDING_OPTIONS
): TensorIRExpression {
  const foldBinary = (node: TensorIRBinaryExpression): TensorIRExpression => {
    const lhs = fold(node.lhs);
    const rhs = fold(node.rhs);

    for (const rule of IDENTITY_RULES[node.operator]) {
      const simplified = rule(lhs, rhs, fold);
      if (simplified != null && dtypeEquals(simplified.dtype, node.dtype)) return simplified;
    }

    const rebuilt =
      lhs === node.lhs && rhs === node.rhs
        ? node
        : createBinaryOperatorExpression(node.operator, lhs, rhs, node.propagateNans);
    if (!isTensorIRExpressionConstant(lhs) || !isTensorIRExpressionConstant(rhs)) return rebuilt;
    return evaluateUnlessTrapping(rebuilt);
  };

  function fold(e: TensorIRExpression): TensorIRExpression {
    switch (e.__type__) {
      case 'TensorIRIntImmediateExpression':
      case 'TensorIRFloatImmediateExpression':
      case 'TensorIRVariableExpression':
        return e;
      case 'TensorIRBinaryExpression':
        return foldBinary(e);
      case 'TensorIRCompareSelectExpression': {
        const lhs = fold(e.lhs);
        const rhs = fold(e.rhs);
        const trueValue = fold(e.trueValue);
        const falseValue = fold(e.falseValue);
        const rebuilt = listShallowEquals(
          [lhs, rhs, trueValue, falseValue],
          [e.lhs, e.rhs, e.trueValue, e.falseValue]
        )
          ? e
          : TIR_COMPARE_SELECT({ operator: e.operator, lhs, rhs, trueValue, falseValue });
        return isTensorIRExpressionConstant(rebuilt) ? evaluateUnlessTrapping(rebuilt) : rebuilt;
      }
      // Broadcasts and ramps of immediates are already the folded form of a constant vector.
      case 'TensorIRBroadcastExpression': {
        const value = fold(e.value);
        return value === e.value ? e : TIR_BROADCAST(value, e.lanes);
      }
      case 'TensorIRRampExpression': {
        const base = fold(e.base);
        const stride = fold(e.stride);
        return base === e.base && stride === e.stride ? e : TIR_RAMP(base, stride, e.lanes);
      }
      case 'TensorIRCastExpression': {
        const source = fold(e.source);
        if (!rebuildCastOnChange) {
          return isTensorIRExpressionConstant(source) ? evaluateUnlessTrapping(e) : e;
        }
        const rebuilt = source === e.source ? e : TIR_CAST(e.dtype.scalarType, source);
        return isTensorIRExpressionConstant(source) ? evaluateUnlessTrapping(rebuilt) : rebuilt;
      }
      case 'TensorIRIntrinsicsExpression': {
        const parameters = e.parameters.map(fold);
        const changed = !listShallowEquals(parameters, e.parameters);
        const allConstant = parameters.every(isTensorIRExpressionConstant);
        const rebuilt = changed ? TIR_INTRINSICS(e.intrinsic, parameters) : e;
        if (!allConstant || !isPureIntrinsic(e.intrinsic)) return rebuilt;
        return evaluateUnlessTrapping(rebuilt);
      }
      case 'TensorIRLoadExpression': {
        const index = fold(e.index);
        const mask = fold(e.mask);
        if (index === e.index && mask === e.mask) return e;
        return TIR_LOAD(e.dtype.scalarType, e.buffer, index, mask);
      }
    }
  }

  return fold(expression);
}
