import {
  TensorIRDtype,
  TensorIRScalarType,
  TensorIRIntegralScalarType,
  TensorIRFloatingPointScalarType,
  TIR_DTYPE,
  TIR_HANDLE_TYPE,
  isFloatingPointScalarType,
  normalizeIntegralValue,
  normalizeFloatingPointValue,
  promoteScalarTypes,
  prettyPrintTensorIRScalarType,
} from './tensor-ir-types';

import { MalformedInputError } from 'tensorir-core-errors';
import { Long } from 'tensorir-core-utils';

export type TensorIRBinaryOperator =
  | 'Add'
  | 'Sub'
  | 'Mul'
  | 'Div'
  | 'Mod'
  | 'And'
  | 'Or'
  | 'Xor'
  | 'Lshift'
  | 'Rshift'
  | 'Min'
  | 'Max';

export type TensorIRCompareOperator = 'EQ' | 'NE' | 'GT' | 'GE' | 'LT' | 'LE';

export type TensorIRUnaryIntrinsic =
  | 'sin'
  | 'cos'
  | 'tan'
  | 'asin'
  | 'acos'
  | 'atan'
  | 'sinh'
  | 'cosh'
  | 'tanh'
  | 'exp'
  | 'expm1'
  | 'fabs'
  | 'log'
  | 'log2'
  | 'log10'
  | 'log1p'
  | 'sqrt'
  | 'rsqrt'
  | 'ceil'
  | 'floor'
  | 'round'
  | 'trunc'
  | 'frac';
export type TensorIRBinaryIntrinsic = 'atan2' | 'pow' | 'fmod' | 'remainder';
export type TensorIRIntrinsic = TensorIRUnaryIntrinsic | TensorIRBinaryIntrinsic | 'rand';

interface BaseTensorIRExpression {
  readonly __type__: string;
  readonly dtype: TensorIRDtype;
}

export interface TensorIRIntImmediateExpression extends BaseTensorIRExpression {
  readonly __type__: 'TensorIRIntImmediateExpression';
  readonly dtype: TensorIRDtype & { readonly scalarType: TensorIRIntegralScalarType };
  readonly value: Long;
}

export interface TensorIRFloatImmediateExpression extends BaseTensorIRExpression {
  readonly __type__: 'TensorIRFloatImmediateExpression';
  readonly dtype: TensorIRDtype & { readonly scalarType: TensorIRFloatingPointScalarType };
  readonly value: number;
}

export interface TensorIRVariableExpression extends BaseTensorIRExpression {
  readonly __type__: 'TensorIRVariableExpression';
  readonly name: string;
}

export interface TensorIRBinaryExpression extends BaseTensorIRExpression {
  readonly __type__: 'TensorIRBinaryExpression';
  readonly operator: TensorIRBinaryOperator;
  readonly lhs: TensorIRExpression;
  readonly rhs: TensorIRExpression;
  /** Only meaningful for `Min` and `Max`. Always false for other operators. */
  readonly propagateNans: boolean;
}

export interface TensorIRCompareSelectExpression extends BaseTensorIRExpression {
  readonly __type__: 'TensorIRCompareSelectExpression';
  readonly operator: TensorIRCompareOperator;
  readonly lhs: TensorIRExpression;
  readonly rhs: TensorIRExpression;
  readonly trueValue: TensorIRExpression;
  readonly falseValue: TensorIRExpression;
}

export interface TensorIRBroadcastExpression extends BaseTensorIRExpression {
  readonly __type__: 'TensorIRBroadcastExpression';
  readonly value: TensorIRExpression;
  readonly lanes: number;
}

export interface TensorIRRampExpression extends BaseTensorIRExpression {
  readonly __type__: 'TensorIRRampExpression';
  readonly base: TensorIRExpression;
  readonly stride: TensorIRExpression;
  readonly lanes: number;
}

export interface TensorIRCastExpression extends BaseTensorIRExpression {
  readonly __type__: 'TensorIRCastExpression';
  readonly source: TensorIRExpression;
}

export interface TensorIRIntrinsicsExpression extends BaseTensorIRExpression {
  readonly __type__: 'TensorIRIntrinsicsExpression';
  readonly intrinsic: TensorIRIntrinsic;
  readonly parameters: readonly TensorIRExpression[];
}

export interface TensorIRLoadExpression extends BaseTensorIRExpression {
  readonly __type__: 'TensorIRLoadExpression';
  readonly buffer: TensorIRVariableExpression;
  readonly index: TensorIRExpression;
  readonly mask: TensorIRExpression;
}

export type TensorIRExpression =
  | TensorIRIntImmediateExpression
  | TensorIRFloatImmediateExpression
  | TensorIRVariableExpression
  | TensorIRBinaryExpression
  | TensorIRCompareSelectExpression
  | TensorIRBroadcastExpression
  | TensorIRRampExpression
  | TensorIRCastExpression
  | TensorIRIntrinsicsExpression
  | TensorIRLoadExpression;

const UNARY_INTRINSICS: readonly TensorIRUnaryIntrinsic[] = [
  'sin',
  'cos',
  'tan',
  'asin',
  'acos',
  'atan',
  'sinh',
  'cosh',
  'tanh',
  'exp',
  'expm1',
  'fabs',
  'log',
  'log2',
  'log10',
  'log1p',
  'sqrt',
  'rsqrt',
  'ceil',
  'floor',
  'round',
  'trunc',
  'frac',
];
const BINARY_INTRINSICS: readonly TensorIRBinaryIntrinsic[] = ['atan2', 'pow', 'fmod', 'remainder'];

export const isTensorIRUnaryIntrinsic = (name: string): name is TensorIRUnaryIntrinsic =>
  UNARY_INTRINSICS.some((intrinsic) => intrinsic === name);

export const isTensorIRBinaryIntrinsic = (name: string): name is TensorIRBinaryIntrinsic =>
  BINARY_INTRINSICS.some((intrinsic) => intrinsic === name);

export const isTensorIRIntrinsic = (name: string): name is TensorIRIntrinsic =>
  name === 'rand' || isTensorIRUnaryIntrinsic(name) || isTensorIRBinaryIntrinsic(name);

export const intrinsicArity = (intrinsic: TensorIRIntrinsic): number => {
  if (intrinsic === 'rand') return 0;
  return isTensorIRBinaryIntrinsic(intrinsic) ? 2 : 1;
};

/** `rand` is the only intrinsic with an observable effect. */
export const isPureIntrinsic = (intrinsic: TensorIRIntrinsic): boolean => intrinsic !== 'rand';

const checkSameLanes = (context: string, ...expressions: readonly TensorIRExpression[]): number => {
  const lanes = expressions[0]?.dtype.lanes ?? 1;
  expressions.forEach((expression) => {
    if (expression.dtype.lanes !== lanes) {
      throw new MalformedInputError(
        `${context} expects operands with the same lanes, ` +
          `got ${lanes} and ${expression.dtype.lanes}.`
      );
    }
  });
  return lanes;
};

const checkScalar = (context: string, expression: TensorIRExpression): void => {
  if (expression.dtype.lanes !== 1) {
    throw new MalformedInputError(
      `${context} expects a scalar, got ${expression.dtype.lanes} lanes.`
    );
  }
};

const checkLanes = (context: string, lanes: number): void => {
  if (!Number.isInteger(lanes) || lanes < 1) {
    throw new MalformedInputError(`${context} expects a positive lane count, got ${lanes}.`);
  }
};

export const TIR_INT = (
  value: number | Long,
  scalarType: TensorIRIntegralScalarType = 'Int'
): TensorIRIntImmediateExpression => ({
  __type__: 'TensorIRIntImmediateExpression',
  dtype: { scalarType, lanes: 1 },
  value: normalizeIntegralValue(
    scalarType,
    typeof value === 'number' ? Long.fromNumber(value) : value
  ),
});

export const TIR_ZERO: TensorIRIntImmediateExpression = TIR_INT(0);
export const TIR_ONE: TensorIRIntImmediateExpression = TIR_INT(1);

export const TIR_FLOAT = (
  value: number,
  scalarType: TensorIRFloatingPointScalarType = 'Float'
): TensorIRFloatImmediateExpression => ({
  __type__: 'TensorIRFloatImmediateExpression',
  dtype: { scalarType, lanes: 1 },
  value: normalizeFloatingPointValue(scalarType, value),
});

export const TIR_VARIABLE = (name: string, dtype: TensorIRDtype): TensorIRVariableExpression => ({
  __type__: 'TensorIRVariableExpression',
  dtype,
  name,
});

export const TIR_BUFFER = (name: string): TensorIRVariableExpression =>
  TIR_VARIABLE(name, TIR_HANDLE_TYPE);

export const TIR_BINARY = ({
  operator,
  lhs,
  rhs,
  propagateNans = false,
}: {
  readonly operator: TensorIRBinaryOperator;
  readonly lhs: TensorIRExpression;
  readonly rhs: TensorIRExpression;
  readonly propagateNans?: boolean;
}): TensorIRBinaryExpression => {
  const lanes = checkSameLanes(operator, lhs, rhs);
  return {
    __type__: 'TensorIRBinaryExpression',
    dtype: TIR_DTYPE(promoteScalarTypes(lhs.dtype.scalarType, rhs.dtype.scalarType), lanes),
    operator,
    lhs,
    rhs,
    propagateNans: (operator === 'Min' || operator === 'Max') && propagateNans,
  };
};

export const TIR_ADD = (
  lhs: TensorIRExpression,
  rhs: TensorIRExpression
): TensorIRBinaryExpression => TIR_BINARY({ operator: 'Add', lhs, rhs });
export const TIR_SUB = (
  lhs: TensorIRExpression,
  rhs: TensorIRExpression
): TensorIRBinaryExpression => TIR_BINARY({ operator: 'Sub', lhs, rhs });
export const TIR_MUL = (
  lhs: TensorIRExpression,
  rhs: TensorIRExpression
): TensorIRBinaryExpression => TIR_BINARY({ operator: 'Mul', lhs, rhs });
export const TIR_DIV = (
  lhs: TensorIRExpression,
  rhs: TensorIRExpression
): TensorIRBinaryExpression => TIR_BINARY({ operator: 'Div', lhs, rhs });
export const TIR_MOD = (
  lhs: TensorIRExpression,
  rhs: TensorIRExpression
): TensorIRBinaryExpression => TIR_BINARY({ operator: 'Mod', lhs, rhs });
export const TIR_AND = (
  lhs: TensorIRExpression,
  rhs: TensorIRExpression
): TensorIRBinaryExpression => TIR_BINARY({ operator: 'And', lhs, rhs });
export const TIR_OR = (
  lhs: TensorIRExpression,
  rhs: TensorIRExpression
): TensorIRBinaryExpression => TIR_BINARY({ operator: 'Or', lhs, rhs });
export const TIR_XOR = (
  lhs: TensorIRExpression,
  rhs: TensorIRExpression
): TensorIRBinaryExpression => TIR_BINARY({ operator: 'Xor', lhs, rhs });
export const TIR_LSHIFT = (
  lhs: TensorIRExpression,
  rhs: TensorIRExpression
): TensorIRBinaryExpression => TIR_BINARY({ operator: 'Lshift', lhs, rhs });
export const TIR_RSHIFT = (
  lhs: TensorIRExpression,
  rhs: TensorIRExpression
): TensorIRBinaryExpression => TIR_BINARY({ operator: 'Rshift', lhs, rhs });
export const TIR_MIN = (
  lhs: TensorIRExpression,
  rhs: TensorIRExpression,
  propagateNans: boolean
): TensorIRBinaryExpression => TIR_BINARY({ operator: 'Min', lhs, rhs, propagateNans });
export const TIR_MAX = (
  lhs: TensorIRExpression,
  rhs: TensorIRExpression,
  propagateNans: boolean
): TensorIRBinaryExpression => TIR_BINARY({ operator: 'Max', lhs, rhs, propagateNans });

export const TIR_COMPARE_SELECT = ({
  operator,
  lhs,
  rhs,
  trueValue,
  falseValue,
}: Omit<
  TensorIRCompareSelectExpression,
  '__type__' | 'dtype'
>): TensorIRCompareSelectExpression => {
  // Comparing Handle operands is not meaningful.
  promoteScalarTypes(lhs.dtype.scalarType, rhs.dtype.scalarType);
  const lanes = checkSameLanes('CompareSelect', lhs, rhs, trueValue, falseValue);
  return {
    __type__: 'TensorIRCompareSelectExpression',
    dtype: TIR_DTYPE(
      promoteScalarTypes(trueValue.dtype.scalarType, falseValue.dtype.scalarType),
      lanes
    ),
    operator,
    lhs,
    rhs,
    trueValue,
    falseValue,
  };
};

export const TIR_BROADCAST = (
  value: TensorIRExpression,
  lanes: number
): TensorIRBroadcastExpression => {
  checkScalar('Broadcast', value);
  checkLanes('Broadcast', lanes);
  return {
    __type__: 'TensorIRBroadcastExpression',
    dtype: TIR_DTYPE(value.dtype.scalarType, lanes),
    value,
    lanes,
  };
};

export const TIR_RAMP = (
  base: TensorIRExpression,
  stride: TensorIRExpression,
  lanes: number
): TensorIRRampExpression => {
  checkScalar('Ramp', base);
  checkScalar('Ramp', stride);
  checkLanes('Ramp', lanes);
  return {
    __type__: 'TensorIRRampExpression',
    dtype: TIR_DTYPE(promoteScalarTypes(base.dtype.scalarType, stride.dtype.scalarType), lanes),
    base,
    stride,
    lanes,
  };
};

/** Converts `source` to `scalarType`, keeping its lanes. */
export const TIR_CAST = (
  scalarType: TensorIRScalarType,
  source: TensorIRExpression
): TensorIRCastExpression => ({
  __type__: 'TensorIRCastExpression',
  dtype: TIR_DTYPE(scalarType, source.dtype.lanes),
  source,
});

export const TIR_INTRINSICS = (
  intrinsic: TensorIRIntrinsic,
  parameters: readonly TensorIRExpression[]
): TensorIRIntrinsicsExpression => {
  const arity = intrinsicArity(intrinsic);
  if (parameters.length !== arity) {
    throw new MalformedInputError(
      `Intrinsic ${intrinsic} expects ${arity} parameter(s), got ${parameters.length}.`
    );
  }
  const lanes = checkSameLanes(intrinsic, ...parameters);
  const promoted = parameters
    .map((parameter) => parameter.dtype.scalarType)
    .reduce<TensorIRScalarType>(promoteScalarTypes, parameters[0]?.dtype.scalarType ?? 'Float');
  return {
    __type__: 'TensorIRIntrinsicsExpression',
    dtype: TIR_DTYPE(isFloatingPointScalarType(promoted) ? promoted : 'Float', lanes),
    intrinsic,
    parameters,
  };
};

export const TIR_LOAD = (
  scalarType: TensorIRScalarType,
  buffer: TensorIRVariableExpression,
  index: TensorIRExpression,
  mask: TensorIRExpression
): TensorIRLoadExpression => {
  if (buffer.dtype.scalarType !== 'Handle') {
    throw new MalformedInputError(`Load expects a handle buffer, but \`${buffer.name}\` is not.`);
  }
  const lanes = checkSameLanes('Load', index, mask);
  return {
    __type__: 'TensorIRLoadExpression',
    dtype: TIR_DTYPE(scalarType, lanes),
    buffer,
    index,
    mask,
  };
};

/**
 * Immediates are constant. Other nodes are constant when they are pure and all their operands
 * are constant. Variables and loads never are.
 */
export const isTensorIRExpressionConstant = (expression: TensorIRExpression): boolean => {
  switch (expression.__type__) {
    case 'TensorIRIntImmediateExpression':
    case 'TensorIRFloatImmediateExpression':
      return true;
    case 'TensorIRVariableExpression':
    case 'TensorIRLoadExpression':
      return false;
    case 'TensorIRBinaryExpression':
      return (
        isTensorIRExpressionConstant(expression.lhs) && isTensorIRExpressionConstant(expression.rhs)
      );
    case 'TensorIRCompareSelectExpression':
      return (
        isTensorIRExpressionConstant(expression.lhs) &&
        isTensorIRExpressionConstant(expression.rhs) &&
        isTensorIRExpressionConstant(expression.trueValue) &&
        isTensorIRExpressionConstant(expression.falseValue)
      );
    case 'TensorIRBroadcastExpression':
      return isTensorIRExpressionConstant(expression.value);
    case 'TensorIRRampExpression':
      return (
        isTensorIRExpressionConstant(expression.base) &&
        isTensorIRExpressionConstant(expression.stride)
      );
    case 'TensorIRCastExpression':
      return isTensorIRExpressionConstant(expression.source);
    case 'TensorIRIntrinsicsExpression':
      return (
        isPureIntrinsic(expression.intrinsic) &&
        expression.parameters.every(isTensorIRExpressionConstant)
      );
  }
};

const BINARY_OPERATOR_SYMBOLS: Readonly<
  Record<Exclude<TensorIRBinaryOperator, 'Min' | 'Max'>, string>
> = {
  Add: '+',
  Sub: '-',
  Mul: '*',
  Div: '/',
  Mod: '%',
  And: '&',
  Or: '|',
  Xor: '^',
  Lshift: '<<',
  Rshift: '>>',
};

const COMPARE_OPERATOR_SYMBOLS: Readonly<Record<TensorIRCompareOperator, string>> = {
  EQ: '==',
  NE: '!=',
  GT: '>',
  GE: '>=',
  LT: '<',
  LE: '<=',
};

const prettyPrintFloatingPointNumber = (value: number): string =>
  Number.isInteger(value) && Math.abs(value) < 1e21 ? value.toFixed(1) : String(value);

export const prettyPrintTensorIRExpression = (expression: TensorIRExpression): string => {
  switch (expression.__type__) {
    case 'TensorIRIntImmediateExpression': {
      const value = expression.value.toString();
      const { scalarType } = expression.dtype;
      return scalarType === 'Int'
        ? value
        : `${prettyPrintTensorIRScalarType(scalarType)}(${value})`;
    }
    case 'TensorIRFloatImmediateExpression': {
      const value = prettyPrintFloatingPointNumber(expression.value);
      switch (expression.dtype.scalarType) {
        case 'Float':
          return `${value}f`;
        case 'Double':
          return value;
        case 'Half':
          return `half(${value})`;
      }
    }
    case 'TensorIRVariableExpression':
      return expression.name;
    case 'TensorIRBinaryExpression': {
      const lhs = prettyPrintTensorIRExpression(expression.lhs);
      const rhs = prettyPrintTensorIRExpression(expression.rhs);
      switch (expression.operator) {
        case 'Min':
        case 'Max':
          return `${expression.operator}(${lhs}, ${rhs}, ${expression.propagateNans ? 1 : 0})`;
        default:
          return `(${lhs} ${BINARY_OPERATOR_SYMBOLS[expression.operator]} ${rhs})`;
      }
    }
    case 'TensorIRCompareSelectExpression':
      return `((${prettyPrintTensorIRExpression(expression.lhs)} ${
        COMPARE_OPERATOR_SYMBOLS[expression.operator]
      } ${prettyPrintTensorIRExpression(expression.rhs)}) ? ${prettyPrintTensorIRExpression(
        expression.trueValue
      )} : ${prettyPrintTensorIRExpression(expression.falseValue)})`;
    case 'TensorIRBroadcastExpression':
      return `Broadcast(${prettyPrintTensorIRExpression(expression.value)}, ${expression.lanes})`;
    case 'TensorIRRampExpression':
      return `Ramp(${prettyPrintTensorIRExpression(
        expression.base
      )}, ${prettyPrintTensorIRExpression(expression.stride)}, ${expression.lanes})`;
    case 'TensorIRCastExpression':
      return `cast<${prettyPrintTensorIRScalarType(
        expression.dtype.scalarType
      )}>(${prettyPrintTensorIRExpression(expression.source)})`;
    case 'TensorIRIntrinsicsExpression':
      return `${expression.intrinsic}(${expression.parameters
        .map(prettyPrintTensorIRExpression)
        .join(', ')})`;
    case 'TensorIRLoadExpression':
      return `${expression.buffer.name}[${prettyPrintTensorIRExpression(
        expression.index
      )}, ${prettyPrintTensorIRExpression(expression.mask)}]`;
  }
};
