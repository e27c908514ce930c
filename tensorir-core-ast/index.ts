export * from './tensor-ir-types';
export * from './tensor-ir-expressions';
export * from './tensor-ir-json';
export {
  default as createBinaryOperatorExpression,
  isTensorIRBinaryOperator,
} from './binary-operator-factory';
