import {
  TensorIRScalarType,
  TensorIRIntegralScalarType,
  TensorIRFloatingPointScalarType,
  isIntegralScalarType,
  normalizeIntegralValue,
  normalizeFloatingPointValue,
} from 'tensorir-core-ast';
import { UnsupportedDtypeError } from 'tensorir-core-errors';
import { Long } from 'tensorir-core-utils';

export type TensorIRIntegralValue = {
  readonly __type__: 'IntegralValue';
  readonly scalarType: TensorIRIntegralScalarType;
  readonly lanes: readonly Long[];
};

export type TensorIRFloatingPointValue = {
  readonly __type__: 'FloatingPointValue';
  readonly scalarType: TensorIRFloatingPointScalarType;
  readonly lanes: readonly number[];
};

/** The run time value of an expression: one element per vector lane. */
export type TensorIRValue = TensorIRIntegralValue | TensorIRFloatingPointValue;

export const TIR_INTEGRAL_VALUE = (
  scalarType: TensorIRIntegralScalarType,
  lanes: readonly (number | Long)[]
): TensorIRIntegralValue => ({
  __type__: 'IntegralValue',
  scalarType,
  lanes: lanes.map((lane) =>
    normalizeIntegralValue(scalarType, typeof lane === 'number' ? Long.fromNumber(lane) : lane)
  ),
});

export const TIR_FLOATING_POINT_VALUE = (
  scalarType: TensorIRFloatingPointScalarType,
  lanes: readonly number[]
): TensorIRFloatingPointValue => ({
  __type__: 'FloatingPointValue',
  scalarType,
  lanes: lanes.map((lane) => normalizeFloatingPointValue(scalarType, lane)),
});

const floatingPointToIntegral = (scalarType: TensorIRIntegralScalarType, lane: number): Long => {
  if (scalarType === 'Bool') return lane !== 0 ? Long.ONE : Long.ZERO;
  // Long.fromNumber truncates towards zero, maps NaN to zero and saturates at the 64-bit range.
  return normalizeIntegralValue(scalarType, Long.fromNumber(lane));
};

export const castToIntegralValue = (
  value: TensorIRValue,
  scalarType: TensorIRIntegralScalarType
): TensorIRIntegralValue => {
  switch (value.__type__) {
    case 'IntegralValue':
      return value.scalarType === scalarType ? value : TIR_INTEGRAL_VALUE(scalarType, value.lanes);
    case 'FloatingPointValue':
      return {
        __type__: 'IntegralValue',
        scalarType,
        lanes: value.lanes.map((lane) => floatingPointToIntegral(scalarType, lane)),
      };
  }
};

/**
 * A lane as a double that rounds to `scalarType` the way the exact integer would. Narrower targets
 * first round the lane to odd at 53 bits, which keeps the dropped bits as a sticky bit.
 */
const integralToFloatingPoint = (
  scalarType: TensorIRFloatingPointScalarType,
  lane: Long
): number => {
  if (scalarType === 'Double') return lane.toNumber();
  const magnitude = (lane.isNegative() ? lane.negate() : lane).toUnsigned();
  const droppedBits = magnitude.getNumBitsAbs() - 53;
  if (droppedBits <= 0) return lane.toNumber();
  const kept = magnitude.shiftRightUnsigned(droppedBits);
  const exact = kept.shiftLeft(droppedBits).equals(magnitude);
  const rounded = (exact ? kept : kept.or(Long.UONE)).toNumber() * 2 ** droppedBits;
  return lane.isNegative() ? -rounded : rounded;
};

export const castToFloatingPointValue = (
  value: TensorIRValue,
  scalarType: TensorIRFloatingPointScalarType
): TensorIRFloatingPointValue => {
  switch (value.__type__) {
    case 'IntegralValue':
      return TIR_FLOATING_POINT_VALUE(
        scalarType,
        value.lanes.map((lane) => integralToFloatingPoint(scalarType, lane))
      );
    case 'FloatingPointValue':
      return value.scalarType === scalarType
        ? value
        : TIR_FLOATING_POINT_VALUE(scalarType, value.lanes);
  }
};

export const castTensorIRValue = (
  value: TensorIRValue,
  scalarType: TensorIRScalarType
): TensorIRValue => {
  if (scalarType === 'Handle') {
    throw new UnsupportedDtypeError(scalarType, 'value conversion');
  }
  return isIntegralScalarType(scalarType)
    ? castToIntegralValue(value, scalarType)
    : castToFloatingPointValue(value, scalarType);
};

export const prettyPrintTensorIRValue = (value: TensorIRValue): string => {
  const lanes: readonly string[] =
    value.__type__ === 'IntegralValue'
      ? value.lanes.map((lane) => lane.toString())
      : value.lanes.map(String);
  return lanes.length === 1 ? lanes.join('') : `[${lanes.join(', ')}]`;
};
