export { default as PanicException } from './panic-exception';
export * from './tensor-ir-values';
export * from './tensor-ir-interpreter';
export {
  default as evaluateConstantTensorIRExpression,
  materializeTensorIRValue,
} from './constant-evaluator';
