export {
  default as constantFoldTensorIRExpression,
  DEFAULT_CONSTANT_FOLDING_OPTIONS,
} from './constant-folding-optimization';
export type { ConstantFoldingOptions } from './constant-folding-optimization';
