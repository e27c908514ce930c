import { interpretTensorIRExpression } from './tensor-ir-interpreter';
import type {
  TensorIRValue,
  TensorIRIntegralValue,
  TensorIRFloatingPointValue,
} from './tensor-ir-values';

import {
  TensorIRExpression,
  TensorIRScalarType,
  TensorIRIntegralScalarType,
  TensorIRFloatingPointScalarType,
  TIR_INT,
  TIR_FLOAT,
  TIR_BROADCAST,
  TIR_RAMP,
  isTensorIRExpressionConstant,
  normalizeIntegralValue,
  normalizeFloatingPointValue,
} from 'tensorir-core-ast';
import { UnsupportedDtypeError } from 'tensorir-core-errors';
import { Long, assert } from 'tensorir-core-utils';

const checkEvaluableScalarType = (
  scalarType: TensorIRScalarType
): TensorIRIntegralScalarType | TensorIRFloatingPointScalarType => {
  switch (scalarType) {
    case 'Byte':
    case 'Char':
    case 'Short':
    case 'Int':
    case 'Long':
    case 'Bool':
    case 'Half':
    case 'Float':
    case 'Double':
      return scalarType;
    case 'Handle':
      throw new UnsupportedDtypeError(scalarType, 'the constant evaluator');
  }
};

const materializeIntegralValue = ({
  scalarType,
  lanes,
}: TensorIRIntegralValue): TensorIRExpression | null => {
  const [first, second] = lanes;
  if (lanes.length === 1) return TIR_INT(first, scalarType);
  if (lanes.every((lane) => lane.equals(first))) {
    return TIR_BROADCAST(TIR_INT(first, scalarType), lanes.length);
  }
  const stride = normalizeIntegralValue(scalarType, second.subtract(first));
  const isRamp = lanes.every((lane, i) =>
    normalizeIntegralValue(scalarType, first.add(stride.multiply(Long.fromInt(i)))).equals(lane)
  );
  return isRamp
    ? TIR_RAMP(TIR_INT(first, scalarType), TIR_INT(stride, scalarType), lanes.length)
    : null;
};

const materializeFloatingPointValue = ({
  scalarType,
  lanes,
}: TensorIRFloatingPointValue): TensorIRExpression | null => {
  const [first, second] = lanes;
  if (lanes.length === 1) return TIR_FLOAT(first, scalarType);
  if (lanes.every((lane) => Object.is(lane, first))) {
    return TIR_BROADCAST(TIR_FLOAT(first, scalarType), lanes.length);
  }
  const stride = normalizeFloatingPointValue(scalarType, second - first);
  const isRamp = lanes.every((lane, i) =>
    Object.is(normalizeFloatingPointValue(scalarType, first + i * stride), lane)
  );
  return isRamp
    ? TIR_RAMP(TIR_FLOAT(first, scalarType), TIR_FLOAT(stride, scalarType), lanes.length)
    : null;
};

/**
 * Turns a value back into the simplest expression producing it: an immediate for a scalar, a
 * broadcast or ramp of immediates for a vector. Returns null for vectors of any other shape.
 */
export const materializeTensorIRValue = (value: TensorIRValue): TensorIRExpression | null => {
  switch (value.__type__) {
    case 'IntegralValue':
      return materializeIntegralValue(value);
    case 'FloatingPointValue':
      return materializeFloatingPointValue(value);
  }
};

/**
 * Computes a constant expression and re-materializes it at the same dtype. A vector result that
 * has no immediate form leaves the expression as it is.
 */
const evaluateConstantTensorIRExpression = (expression: TensorIRExpression): TensorIRExpression => {
  checkEvaluableScalarType(expression.dtype.scalarType);
  assert(
    isTensorIRExpressionConstant(expression),
    'Only constant expressions can be evaluated at compile time.'
  );
  return materializeTensorIRValue(interpretTensorIRExpression(expression)) ?? expression;
};

export default evaluateConstantTensorIRExpression;
