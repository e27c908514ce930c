import createBinaryOperatorExpression, {
  isTensorIRBinaryOperator,
} from './binary-operator-factory';
import {
  TensorIRExpression,
  TensorIRCompareOperator,
  TIR_INT,
  TIR_FLOAT,
  TIR_VARIABLE,
  TIR_BUFFER,
  TIR_COMPARE_SELECT,
  TIR_BROADCAST,
  TIR_RAMP,
  TIR_CAST,
  TIR_INTRINSICS,
  TIR_LOAD,
  isTensorIRIntrinsic,
} from './tensor-ir-expressions';
import {
  TensorIRScalarType,
  TIR_DTYPE,
  isIntegralScalarType,
  isFloatingPointScalarType,
  parseTensorIRScalarType,
  prettyPrintTensorIRScalarType,
} from './tensor-ir-types';

import { MalformedInputError, UnsupportedOperatorError } from 'tensorir-core-errors';
import { Long } from 'tensorir-core-utils';

export type JSONValue =
  | string
  | number
  | boolean
  | null
  | readonly JSONValue[]
  | { readonly [key: string]: JSONValue };
export type JSONObject = { readonly [key: string]: JSONValue };

// JSON has no spelling for -0, NaN or the infinities, so they travel as strings.
const encodeFloatingPointNumber = (value: number): JSONValue => {
  if (Object.is(value, -0)) return '-0';
  return Number.isFinite(value) ? value : String(value);
};

/** Drops leading zeros and the sign of zero, which is how `Long.prototype.toString` prints. */
const canonicalizeDecimal = (text: string): string => {
  const stripped = text.replace(/^(-?)0+(?=\d)/, '$1');
  return stripped === '-0' ? '0' : stripped;
};

export const encodeTensorIRExpression = (expression: TensorIRExpression): JSONObject => {
  switch (expression.__type__) {
    case 'TensorIRIntImmediateExpression':
      return {
        kind: 'IntImm',
        type: prettyPrintTensorIRScalarType(expression.dtype.scalarType),
        value: expression.value.toString(),
      };
    case 'TensorIRFloatImmediateExpression':
      return {
        kind: 'FloatImm',
        type: prettyPrintTensorIRScalarType(expression.dtype.scalarType),
        value: encodeFloatingPointNumber(expression.value),
      };
    case 'TensorIRVariableExpression':
      return {
        kind: 'Var',
        name: expression.name,
        type: prettyPrintTensorIRScalarType(expression.dtype.scalarType),
        lanes: expression.dtype.lanes,
      };
    case 'TensorIRBinaryExpression':
      return {
        kind: 'Binary',
        op: expression.operator,
        lhs: encodeTensorIRExpression(expression.lhs),
        rhs: encodeTensorIRExpression(expression.rhs),
        propagateNans: expression.propagateNans,
      };
    case 'TensorIRCompareSelectExpression':
      return {
        kind: 'CompareSelect',
        op: expression.operator,
        lhs: encodeTensorIRExpression(expression.lhs),
        rhs: encodeTensorIRExpression(expression.rhs),
        trueValue: encodeTensorIRExpression(expression.trueValue),
        falseValue: encodeTensorIRExpression(expression.falseValue),
      };
    case 'TensorIRBroadcastExpression':
      return {
        kind: 'Broadcast',
        value: encodeTensorIRExpression(expression.value),
        lanes: expression.lanes,
      };
    case 'TensorIRRampExpression':
      return {
        kind: 'Ramp',
        base: encodeTensorIRExpression(expression.base),
        stride: encodeTensorIRExpression(expression.stride),
        lanes: expression.lanes,
      };
    case 'TensorIRCastExpression':
      return {
        kind: 'Cast',
        type: prettyPrintTensorIRScalarType(expression.dtype.scalarType),
        source: encodeTensorIRExpression(expression.source),
      };
    case 'TensorIRIntrinsicsExpression':
      return {
        kind: 'Intrinsics',
        op: expression.intrinsic,
        params: expression.parameters.map(encodeTensorIRExpression),
      };
    case 'TensorIRLoadExpression':
      return {
        kind: 'Load',
        type: prettyPrintTensorIRScalarType(expression.dtype.scalarType),
        buffer: expression.buffer.name,
        index: encodeTensorIRExpression(expression.index),
        mask: encodeTensorIRExpression(expression.mask),
      };
  }
};

const COMPARE_OPERATORS: readonly TensorIRCompareOperator[] = ['EQ', 'NE', 'GT', 'GE', 'LT', 'LE'];

const isJSONObject = (json: unknown): json is { readonly [key: string]: unknown } =>
  typeof json === 'object' && json !== null && !Array.isArray(json);

class JSONFieldReader {
  constructor(
    private readonly json: { readonly [key: string]: unknown },
    private readonly path: string
  ) {}

  private fail(key: string, expected: string): never {
    throw new MalformedInputError(`Expected ${expected} at ${this.path}.${key}.`);
  }

  string(key: string): string {
    const value = this.json[key];
    return typeof value === 'string' ? value : this.fail(key, 'a string');
  }

  optionalBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.json[key];
    if (value === undefined) return defaultValue;
    return typeof value === 'boolean' ? value : this.fail(key, 'a boolean');
  }

  lanes(key: string): number {
    const value = this.json[key];
    if (value === undefined) return 1;
    return typeof value === 'number' && Number.isInteger(value) && value >= 1
      ? value
      : this.fail(key, 'a positive integer');
  }

  scalarType(key: string): TensorIRScalarType {
    return parseTensorIRScalarType(this.string(key)) ?? this.fail(key, 'a scalar type name');
  }

  integer(key: string): Long {
    const value = this.json[key];
    if (typeof value === 'number' && Number.isSafeInteger(value)) return Long.fromNumber(value);
    if (typeof value === 'string' && /^-?\d+$/.test(value)) {
      const parsed = Long.fromString(value);
      // Long.fromString wraps silently, so anything outside the 64-bit range reads back different.
      if (parsed.toString() === canonicalizeDecimal(value)) return parsed;
    }
    return this.fail(key, 'an integer');
  }

  floatingPointNumber(key: string): number {
    const value = this.json[key];
    if (typeof value === 'number') return value;
    switch (value) {
      case '-0':
        return -0;
      case 'NaN':
        return NaN;
      case 'Infinity':
        return Infinity;
      case '-Infinity':
        return -Infinity;
      default:
        return this.fail(key, 'a number');
    }
  }

  expression(key: string): TensorIRExpression {
    return decodeAt(this.json[key], `${this.path}.${key}`);
  }

  expressions(key: string): readonly TensorIRExpression[] {
    const value = this.json[key];
    if (!Array.isArray(value)) return this.fail(key, 'an array');
    return value.map((element: unknown, index) =>
      decodeAt(element, `${this.path}.${key}[${index}]`)
    );
  }
}

function decodeAt(json: unknown, path: string): TensorIRExpression {
  if (!isJSONObject(json)) throw new MalformedInputError(`Expected an object at ${path}.`);
  const reader = new JSONFieldReader(json, path);
  const kind = reader.string('kind');
  switch (kind) {
    case 'IntImm': {
      const scalarType = reader.scalarType('type');
      if (!isIntegralScalarType(scalarType)) {
        throw new MalformedInputError(`IntImm at ${path} must have an integral type.`);
      }
      return TIR_INT(reader.integer('value'), scalarType);
    }
    case 'FloatImm': {
      const scalarType = reader.scalarType('type');
      if (!isFloatingPointScalarType(scalarType)) {
        throw new MalformedInputError(`FloatImm at ${path} must have a floating point type.`);
      }
      return TIR_FLOAT(reader.floatingPointNumber('value'), scalarType);
    }
    case 'Var':
      return TIR_VARIABLE(
        reader.string('name'),
        TIR_DTYPE(reader.scalarType('type'), reader.lanes('lanes'))
      );
    case 'Binary': {
      const operator = reader.string('op');
      if (!isTensorIRBinaryOperator(operator)) throw new UnsupportedOperatorError(operator);
      return createBinaryOperatorExpression(
        operator,
        reader.expression('lhs'),
        reader.expression('rhs'),
        reader.optionalBoolean('propagateNans', false)
      );
    }
    case 'CompareSelect': {
      const name = reader.string('op');
      const operator = COMPARE_OPERATORS.find((it) => it === name);
      if (operator == null) throw new UnsupportedOperatorError(name);
      return TIR_COMPARE_SELECT({
        operator,
        lhs: reader.expression('lhs'),
        rhs: reader.expression('rhs'),
        trueValue: reader.expression('trueValue'),
        falseValue: reader.expression('falseValue'),
      });
    }
    case 'Broadcast':
      return TIR_BROADCAST(reader.expression('value'), reader.lanes('lanes'));
    case 'Ramp':
      return TIR_RAMP(
        reader.expression('base'),
        reader.expression('stride'),
        reader.lanes('lanes')
      );
    case 'Cast':
      return TIR_CAST(reader.scalarType('type'), reader.expression('source'));
    case 'Intrinsics': {
      const intrinsic = reader.string('op');
      if (!isTensorIRIntrinsic(intrinsic)) throw new UnsupportedOperatorError(intrinsic);
      return TIR_INTRINSICS(intrinsic, reader.expressions('params'));
    }
    case 'Load':
      return TIR_LOAD(
        reader.scalarType('type'),
        TIR_BUFFER(reader.string('buffer')),
        reader.expression('index'),
        reader.expression('mask')
      );
    default:
      throw new MalformedInputError(`Unknown expression kind \`${kind}\` at ${path}.`);
  }
}

export const decodeTensorIRExpression = (json: unknown): TensorIRExpression => decodeAt(json, '$');
