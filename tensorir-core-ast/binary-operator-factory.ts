import {
  TensorIRBinaryOperator,
  TensorIRExpression,
  TensorIRBinaryExpression,
  TIR_ADD,
  TIR_SUB,
  TIR_MUL,
  TIR_DIV,
  TIR_MOD,
  TIR_AND,
  TIR_OR,
  TIR_XOR,
  TIR_LSHIFT,
  TIR_RSHIFT,
  TIR_MIN,
  TIR_MAX,
} from './tensor-ir-expressions';

import { UnsupportedOperatorError } from 'tensorir-core-errors';

const BINARY_OPERATORS: readonly TensorIRBinaryOperator[] = [
  'Add',
  'Sub',
  'Mul',
  'Div',
  'Mod',
  'And',
  'Or',
  'Xor',
  'Lshift',
  'Rshift',
  'Min',
  'Max',
];

export const isTensorIRBinaryOperator = (name: string): name is TensorIRBinaryOperator =>
  BINARY_OPERATORS.some((operator) => operator === name);

/**
 * Builds a binary node for `operator`. `option` is the NaN propagation mode of `Min` and `Max`
 * and is ignored by every other operator.
 */
const createBinaryOperatorExpression = (
  operator: TensorIRBinaryOperator,
  lhs: TensorIRExpression,
  rhs: TensorIRExpression,
  option: boolean
): TensorIRBinaryExpression => {
  switch (operator) {
    case 'Add':
      return TIR_ADD(lhs, rhs);
    case 'Sub':
      return TIR_SUB(lhs, rhs);
    case 'Mul':
      return TIR_MUL(lhs, rhs);
    case 'Div':
      return TIR_DIV(lhs, rhs);
    case 'Mod':
      return TIR_MOD(lhs, rhs);
    case 'And':
      return TIR_AND(lhs, rhs);
    case 'Or':
      return TIR_OR(lhs, rhs);
    case 'Xor':
      return TIR_XOR(lhs, rhs);
    case 'Lshift':
      return TIR_LSHIFT(lhs, rhs);
    case 'Rshift':
      return TIR_RSHIFT(lhs, rhs);
    case 'Min':
      return TIR_MIN(lhs, rhs, option);
    case 'Max':
      return TIR_MAX(lhs, rhs, option);
    default:
      throw new UnsupportedOperatorError(String(operator));
  }
};

export default createBinaryOperatorExpression;
