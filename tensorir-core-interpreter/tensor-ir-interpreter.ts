import PanicException from './panic-exception';
import {
  TensorIRValue,
  TIR_INTEGRAL_VALUE,
  TIR_FLOATING_POINT_VALUE,
  castTensorIRValue,
  castToIntegralValue,
  castToFloatingPointValue,
} from './tensor-ir-values';

import {
  TensorIRExpression,
  TensorIRBinaryOperator,
  TensorIRCompareOperator,
  TensorIRIntrinsic,
  TensorIRIntegralScalarType,
  TensorIRFloatingPointScalarType,
  TensorIRScalarType,
  promoteScalarTypes,
  isIntegralScalarType,
  isFloatingPointScalarType,
} from 'tensorir-core-ast';
import { MalformedInputError, UnsupportedDtypeError } from 'tensorir-core-errors';
import { Long, roundHalfToEven } from 'tensorir-core-utils';

export type TensorIREnvironment = {
  /** Values of free variables. */
  readonly variables: ReadonlyMap<string, TensorIRValue>;
  /** Contents of the buffers that loads read from, keyed by buffer name. */
  readonly buffers: ReadonlyMap<string, TensorIRValue>;
  /** Source of `rand()`. */
  readonly random: () => number;
};

export const EMPTY_TENSOR_IR_ENVIRONMENT: TensorIREnvironment = {
  variables: new Map(),
  buffers: new Map(),
  random: Math.random,
};

const SHIFT_AMOUNT_MASK = 63;

const interpretIntegralBinary = (
  operator: TensorIRBinaryOperator,
  scalarType: TensorIRIntegralScalarType,
  value1: Long,
  value2: Long
): Long => {
  switch (operator) {
    case 'Add':
      return value1.add(value2);
    case 'Sub':
      return value1.subtract(value2);
    case 'Mul':
      return value1.multiply(value2);
    case 'Div':
      if (value2.isZero()) throw new PanicException('Division by zero!');
      return value1.divide(value2);
    case 'Mod':
      if (value2.isZero()) throw new PanicException('Mod by zero!');
      return value1.modulo(value2);
    case 'And':
      return value1.and(value2);
    case 'Or':
      return value1.or(value2);
    case 'Xor':
      return value1.xor(value2);
    case 'Lshift':
      return value1.shiftLeft(value2.toInt() & SHIFT_AMOUNT_MASK);
    case 'Rshift':
      // Unsigned types are stored zero-extended, signed ones sign-extended.
      return scalarType === 'Byte' || scalarType === 'Bool'
        ? value1.shiftRightUnsigned(value2.toInt() & SHIFT_AMOUNT_MASK)
        : value1.shiftRight(value2.toInt() & SHIFT_AMOUNT_MASK);
    case 'Min':
      return value1.lessThan(value2) ? value1 : value2;
    case 'Max':
      return value1.greaterThan(value2) ? value1 : value2;
  }
};

const interpretFloatingPointBinary = (
  operator: TensorIRBinaryOperator,
  scalarType: TensorIRFloatingPointScalarType,
  propagateNans: boolean,
  value1: number,
  value2: number
): number => {
  switch (operator) {
    case 'Add':
      return value1 + value2;
    case 'Sub':
      return value1 - value2;
    case 'Mul':
      return value1 * value2;
    case 'Div':
      return value1 / value2;
    case 'Mod':
      return value1 % value2;
    case 'And':
    case 'Or':
    case 'Xor':
    case 'Lshift':
    case 'Rshift':
      throw new UnsupportedDtypeError(scalarType, operator);
    case 'Min':
    case 'Max': {
      if (Number.isNaN(value1) || Number.isNaN(value2)) {
        if (propagateNans) return NaN;
        return Number.isNaN(value1) ? value2 : value1;
      }
      if (operator === 'Min') return value1 < value2 ? value1 : value2;
      return value1 > value2 ? value1 : value2;
    }
  }
};

const compare = <T>(
  operator: TensorIRCompareOperator,
  value1: T,
  value2: T,
  lessThan: (a: T, b: T) => boolean,
  equals: (a: T, b: T) => boolean
): boolean => {
  switch (operator) {
    case 'EQ':
      return equals(value1, value2);
    case 'NE':
      return !equals(value1, value2);
    case 'LT':
      return lessThan(value1, value2);
    case 'LE':
      return lessThan(value1, value2) || equals(value1, value2);
    case 'GT':
      return lessThan(value2, value1);
    case 'GE':
      return lessThan(value2, value1) || equals(value1, value2);
  }
};

const interpretUnaryIntrinsic = (intrinsic: TensorIRIntrinsic, value: number): number => {
  switch (intrinsic) {
    case 'sin':
      return Math.sin(value);
    case 'cos':
      return Math.cos(value);
    case 'tan':
      return Math.tan(value);
    case 'asin':
      return Math.asin(value);
    case 'acos':
      return Math.acos(value);
    case 'atan':
      return Math.atan(value);
    case 'sinh':
      return Math.sinh(value);
    case 'cosh':
      return Math.cosh(value);
    case 'tanh':
      return Math.tanh(value);
    case 'exp':
      return Math.exp(value);
    case 'expm1':
      return Math.expm1(value);
    case 'fabs':
      return Math.abs(value);
    case 'log':
      return Math.log(value);
    case 'log2':
      return Math.log2(value);
    case 'log10':
      return Math.log10(value);
    case 'log1p':
      return Math.log1p(value);
    case 'sqrt':
      return Math.sqrt(value);
    case 'rsqrt':
      return 1 / Math.sqrt(value);
    case 'ceil':
      return Math.ceil(value);
    case 'floor':
      return Math.floor(value);
    case 'round':
      // Halfway cases round away from zero.
      return Math.sign(value) * Math.round(Math.abs(value));
    case 'trunc':
      return Math.trunc(value);
    case 'frac':
      return value - Math.trunc(value);
    default:
      throw new MalformedInputError(`Intrinsic ${intrinsic} does not take one parameter.`);
  }
};

const interpretBinaryIntrinsic = (
  intrinsic: TensorIRIntrinsic,
  value1: number,
  value2: number
): number => {
  switch (intrinsic) {
    case 'atan2':
      return Math.atan2(value1, value2);
    case 'pow':
      return value1 ** value2;
    case 'fmod':
      return value1 % value2;
    case 'remainder':
      return value1 - roundHalfToEven(value1 / value2) * value2;
    default:
      throw new MalformedInputError(`Intrinsic ${intrinsic} does not take two parameters.`);
  }
};

const asFloatingPointScalarType = (
  scalarType: TensorIRScalarType
): TensorIRFloatingPointScalarType => {
  if (!isFloatingPointScalarType(scalarType)) {
    throw new UnsupportedDtypeError(scalarType, 'intrinsics');
  }
  return scalarType;
};

const compareLanes = (
  operator: TensorIRCompareOperator,
  value1: TensorIRValue,
  value2: TensorIRValue
): readonly boolean[] => {
  if (value1.__type__ === 'IntegralValue' && value2.__type__ === 'IntegralValue') {
    return value1.lanes.map((lane, i) =>
      compare<Long>(
        operator,
        lane,
        value2.lanes[i],
        (a, b) => a.lessThan(b),
        (a, b) => a.equals(b)
      )
    );
  }
  if (value1.__type__ === 'FloatingPointValue' && value2.__type__ === 'FloatingPointValue') {
    return value1.lanes.map((lane, i) =>
      compare<number>(
        operator,
        lane,
        value2.lanes[i],
        (a, b) => a < b,
        (a, b) => a === b
      )
    );
  }
  throw new UnsupportedDtypeError(value1.scalarType, 'CompareSelect');
};

/** Lane `i` comes from `trueValue` when `conditions[i]` holds, from `falseValue` otherwise. */
const chooseLanes = (
  conditions: readonly boolean[],
  trueValue: TensorIRValue,
  falseValue: TensorIRValue
): TensorIRValue => {
  if (trueValue.__type__ === 'IntegralValue' && falseValue.__type__ === 'IntegralValue') {
    return {
      ...trueValue,
      lanes: conditions.map((condition, i) =>
        condition ? trueValue.lanes[i] : falseValue.lanes[i]
      ),
    };
  }
  if (
    trueValue.__type__ === 'FloatingPointValue' &&
    falseValue.__type__ === 'FloatingPointValue'
  ) {
    return {
      ...trueValue,
      lanes: conditions.map((condition, i) =>
        condition ? trueValue.lanes[i] : falseValue.lanes[i]
      ),
    };
  }
  throw new UnsupportedDtypeError(trueValue.scalarType, 'CompareSelect');
};

const isLaneEnabled = (mask: TensorIRValue, lane: number): boolean => {
  switch (mask.__type__) {
    case 'IntegralValue':
      return !mask.lanes[lane].isZero();
    case 'FloatingPointValue':
      return mask.lanes[lane] !== 0;
  }
};

/** Builds a value whose lane `i` is lane `picks[i]` of `value`, or zero when that is null. */
const pickLanes = (value: TensorIRValue, picks: readonly (number | null)[]): TensorIRValue => {
  switch (value.__type__) {
    case 'IntegralValue':
      return {
        ...value,
        lanes: picks.map((pick) => (pick == null ? Long.ZERO : value.lanes[pick])),
      };
    case 'FloatingPointValue':
      return {
        ...value,
        lanes: picks.map((pick) => (pick == null ? 0 : value.lanes[pick])),
      };
  }
};

/**
 * Computes the value of `expression` under `environment`. Operands are converted to the scalar
 * type of the node that consumes them before the operation runs.
 */
export const interpretTensorIRExpression = (
  expression: TensorIRExpression,
  environment: TensorIREnvironment = EMPTY_TENSOR_IR_ENVIRONMENT
): TensorIRValue => {
  const interpret = (e: TensorIRExpression): TensorIRValue => {
    const { scalarType, lanes } = e.dtype;
    switch (e.__type__) {
      case 'TensorIRIntImmediateExpression':
        return TIR_INTEGRAL_VALUE(e.dtype.scalarType, [e.value]);
      case 'TensorIRFloatImmediateExpression':
        return TIR_FLOATING_POINT_VALUE(e.dtype.scalarType, [e.value]);
      case 'TensorIRVariableExpression': {
        const value = environment.variables.get(e.name);
        if (value == null) throw new MalformedInputError(`Variable \`${e.name}\` is not bound.`);
        if (value.lanes.length !== lanes) {
          throw new MalformedInputError(
            `Variable \`${e.name}\` expects ${lanes} lane(s), got ${value.lanes.length}.`
          );
        }
        return castTensorIRValue(value, scalarType);
      }
      case 'TensorIRBinaryExpression': {
        const lhs = interpret(e.lhs);
        const rhs = interpret(e.rhs);
        if (isIntegralScalarType(scalarType)) {
          const value1 = castToIntegralValue(lhs, scalarType);
          const value2 = castToIntegralValue(rhs, scalarType);
          return TIR_INTEGRAL_VALUE(
            scalarType,
            value1.lanes.map((lane, i) =>
              interpretIntegralBinary(e.operator, scalarType, lane, value2.lanes[i])
            )
          );
        }
        if (isFloatingPointScalarType(scalarType)) {
          const value1 = castToFloatingPointValue(lhs, scalarType);
          const value2 = castToFloatingPointValue(rhs, scalarType);
          return TIR_FLOATING_POINT_VALUE(
            scalarType,
            value1.lanes.map((lane, i) =>
              interpretFloatingPointBinary(
                e.operator,
                scalarType,
                e.propagateNans,
                lane,
                value2.lanes[i]
              )
            )
          );
        }
        throw new UnsupportedDtypeError(scalarType, e.operator);
      }
      case 'TensorIRCompareSelectExpression': {
        const comparisonType = promoteScalarTypes(e.lhs.dtype.scalarType, e.rhs.dtype.scalarType);
        const conditions = compareLanes(
          e.operator,
          castTensorIRValue(interpret(e.lhs), comparisonType),
          castTensorIRValue(interpret(e.rhs), comparisonType)
        );
        return chooseLanes(
          conditions,
          castTensorIRValue(interpret(e.trueValue), scalarType),
          castTensorIRValue(interpret(e.falseValue), scalarType)
        );
      }
      case 'TensorIRBroadcastExpression':
        return pickLanes(
          interpret(e.value),
          Array.from({ length: e.lanes }, () => 0)
        );
      case 'TensorIRRampExpression': {
        const base = interpret(e.base);
        const stride = interpret(e.stride);
        if (isIntegralScalarType(scalarType)) {
          const baseLane = castToIntegralValue(base, scalarType).lanes[0];
          const strideLane = castToIntegralValue(stride, scalarType).lanes[0];
          return TIR_INTEGRAL_VALUE(
            scalarType,
            Array.from({ length: e.lanes }, (_, i) =>
              baseLane.add(strideLane.multiply(Long.fromInt(i)))
            )
          );
        }
        if (isFloatingPointScalarType(scalarType)) {
          const baseLane = castToFloatingPointValue(base, scalarType).lanes[0];
          const strideLane = castToFloatingPointValue(stride, scalarType).lanes[0];
          return TIR_FLOATING_POINT_VALUE(
            scalarType,
            Array.from({ length: e.lanes }, (_, i) => baseLane + i * strideLane)
          );
        }
        throw new UnsupportedDtypeError(scalarType, 'Ramp');
      }
      case 'TensorIRCastExpression':
        return castTensorIRValue(interpret(e.source), scalarType);
      case 'TensorIRIntrinsicsExpression': {
        const resultType = asFloatingPointScalarType(scalarType);
        if (e.intrinsic === 'rand') {
          return TIR_FLOATING_POINT_VALUE(
            resultType,
            Array.from({ length: lanes }, () => environment.random())
          );
        }
        const parameters = e.parameters.map(
          (parameter) => castToFloatingPointValue(interpret(parameter), resultType).lanes
        );
        return TIR_FLOATING_POINT_VALUE(
          resultType,
          Array.from({ length: lanes }, (_, i) => {
            const [first, second] = parameters.map((parameterLanes) => parameterLanes[i]);
            return parameters.length === 1
              ? interpretUnaryIntrinsic(e.intrinsic, first)
              : interpretBinaryIntrinsic(e.intrinsic, first, second);
          })
        );
      }
      case 'TensorIRLoadExpression': {
        const buffer = environment.buffers.get(e.buffer.name);
        if (buffer == null) {
          throw new MalformedInputError(`Buffer \`${e.buffer.name}\` is not bound.`);
        }
        const index = interpret(e.index);
        if (index.__type__ !== 'IntegralValue') {
          throw new MalformedInputError('Load index must be integral.');
        }
        const mask = interpret(e.mask);
        const picks = index.lanes.map((lane, i) => {
          if (!isLaneEnabled(mask, i)) return null;
          const position = lane.toNumber();
          if (position < 0 || position >= buffer.lanes.length) {
            throw new PanicException(`Out of bounds load at ${e.buffer.name}[${position}]!`);
          }
          return position;
        });
        return pickLanes(castTensorIRValue(buffer, scalarType), picks);
      }
    }
  };
  return interpret(expression);
};
