import { UnsupportedDtypeError } from 'tensorir-core-errors';
import { Long, roundToHalfPrecision } from 'tensorir-core-utils';

export type TensorIRIntegralScalarType = 'Byte' | 'Char' | 'Short' | 'Int' | 'Long' | 'Bool';
export type TensorIRFloatingPointScalarType = 'Half' | 'Float' | 'Double';
export type TensorIRScalarType =
  | TensorIRIntegralScalarType
  | TensorIRFloatingPointScalarType
  | 'Handle';

export type TensorIRDtype = {
  readonly scalarType: TensorIRScalarType;
  readonly lanes: number;
};

export const TIR_DTYPE = (scalarType: TensorIRScalarType, lanes = 1): TensorIRDtype => ({
  scalarType,
  lanes,
});

export const TIR_INT_TYPE: TensorIRDtype = TIR_DTYPE('Int');
export const TIR_FLOAT_TYPE: TensorIRDtype = TIR_DTYPE('Float');
export const TIR_HANDLE_TYPE: TensorIRDtype = TIR_DTYPE('Handle');

export const dtypeEquals = (dtype1: TensorIRDtype, dtype2: TensorIRDtype): boolean =>
  dtype1.scalarType === dtype2.scalarType && dtype1.lanes === dtype2.lanes;

export const isIntegralScalarType = (
  scalarType: TensorIRScalarType
): scalarType is TensorIRIntegralScalarType => {
  switch (scalarType) {
    case 'Byte':
    case 'Char':
    case 'Short':
    case 'Int':
    case 'Long':
    case 'Bool':
      return true;
    case 'Half':
    case 'Float':
    case 'Double':
    case 'Handle':
      return false;
  }
};

export const isFloatingPointScalarType = (
  scalarType: TensorIRScalarType
): scalarType is TensorIRFloatingPointScalarType =>
  scalarType === 'Half' || scalarType === 'Float' || scalarType === 'Double';

const PROMOTION_ORDER: readonly TensorIRScalarType[] = [
  'Bool',
  'Byte',
  'Char',
  'Short',
  'Int',
  'Long',
  'Half',
  'Float',
  'Double',
];

/** The smallest scalar type both sides convert to without losing their kind. */
export const promoteScalarTypes = (
  scalarType1: TensorIRScalarType,
  scalarType2: TensorIRScalarType
): TensorIRScalarType => {
  if (scalarType1 === 'Handle' || scalarType2 === 'Handle') {
    throw new UnsupportedDtypeError('Handle', 'type promotion');
  }
  if (scalarType1 === scalarType2) return scalarType1;
  // Neither side can represent the other.
  if (
    (scalarType1 === 'Byte' && scalarType2 === 'Char') ||
    (scalarType1 === 'Char' && scalarType2 === 'Byte')
  ) {
    return 'Short';
  }
  return PROMOTION_ORDER.indexOf(scalarType1) > PROMOTION_ORDER.indexOf(scalarType2)
    ? scalarType1
    : scalarType2;
};

const signExtend = (value: Long, bits: number): Long =>
  value.shiftLeft(64 - bits).shiftRight(64 - bits);

/** Wraps a 64-bit value into the range of the given integral type. */
export const normalizeIntegralValue = (
  scalarType: TensorIRIntegralScalarType,
  value: Long
): Long => {
  const signed = value.toSigned();
  switch (scalarType) {
    case 'Bool':
      return signed.isZero() ? Long.ZERO : Long.ONE;
    case 'Byte':
      return signed.and(Long.fromInt(0xff));
    case 'Char':
      return signExtend(signed, 8);
    case 'Short':
      return signExtend(signed, 16);
    case 'Int':
      return signExtend(signed, 32);
    case 'Long':
      return signed;
  }
};

/** Rounds a double to the precision of the given floating point type. */
export const normalizeFloatingPointValue = (
  scalarType: TensorIRFloatingPointScalarType,
  value: number
): number => {
  switch (scalarType) {
    case 'Half':
      return roundToHalfPrecision(value);
    case 'Float':
      return Math.fround(value);
    case 'Double':
      return value;
  }
};

const SCALAR_TYPE_NAMES: Readonly<Record<TensorIRScalarType, string>> = {
  Byte: 'uint8',
  Char: 'int8',
  Short: 'int16',
  Int: 'int',
  Long: 'int64',
  Half: 'half',
  Float: 'float',
  Double: 'double',
  Bool: 'bool',
  Handle: 'handle',
};

export const prettyPrintTensorIRScalarType = (scalarType: TensorIRScalarType): string =>
  SCALAR_TYPE_NAMES[scalarType];

export const prettyPrintTensorIRDtype = ({ scalarType, lanes }: TensorIRDtype): string =>
  lanes === 1
    ? prettyPrintTensorIRScalarType(scalarType)
    : `${prettyPrintTensorIRScalarType(scalarType)}x${lanes}`;

export const parseTensorIRScalarType = (name: string): TensorIRScalarType | null => {
  const entry = Object.entries(SCALAR_TYPE_NAMES).find(([, printed]) => printed === name);
  if (entry == null) return null;
  const scalarType = entry[0];
  return isTensorIRScalarType(scalarType) ? scalarType : null;
};

export const isTensorIRScalarType = (name: string): name is TensorIRScalarType =>
  Object.prototype.hasOwnProperty.call(SCALAR_TYPE_NAMES, name);
