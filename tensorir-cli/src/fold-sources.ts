import {
  TensorIRExpression,
  decodeTensorIRExpression,
  encodeTensorIRExpression,
  prettyPrintTensorIRExpression,
} from 'tensorir-core-ast';
import { TensorIRError } from 'tensorir-core-errors';
import {
  ConstantFoldingOptions,
  constantFoldTensorIRExpression,
} from 'tensorir-core-optimization';

type SourceResult<T> =
  | { readonly __type__: 'OK'; readonly results: readonly T[] }
  | { readonly __type__: 'ERROR'; readonly errors: readonly string[] };

export type FoldedTensorIRSource = {
  readonly relativePath: string;
  readonly before: TensorIRExpression;
  readonly after: TensorIRExpression;
};

/** Runs `transform` on every source, collecting input errors per file. */
function processSources<T>(
  sources: readonly (readonly [string, string])[],
  transform: (relativePath: string, expression: TensorIRExpression) => T
): SourceResult<T> {
  const results: T[] = [];
  const errors: string[] = [];
  sources.forEach(([relativePath, content]) => {
    try {
      results.push(transform(relativePath, decodeTensorIRExpression(JSON.parse(content))));
    } catch (e) {
      if (!(e instanceof SyntaxError) && !(e instanceof TensorIRError)) throw e;
      errors.push(`${relativePath}: ${e.message}`);
    }
  });
  return errors.length === 0 ? { __type__: 'OK', results } : { __type__: 'ERROR', errors };
}

export function foldTensorIRSources(
  sources: readonly (readonly [string, string])[],
  options: ConstantFoldingOptions
): SourceResult<FoldedTensorIRSource> {
  return processSources(sources, (relativePath, before) => ({
    relativePath,
    before,
    after: constantFoldTensorIRExpression(before, options),
  }));
}

export function printTensorIRSources(
  sources: readonly (readonly [string, string])[]
): SourceResult<string> {
  return processSources(
    sources,
    (relativePath, expression) => `${relativePath}: ${prettyPrintTensorIRExpression(expression)}`
  );
}

export const describeFoldedTensorIRSource = ({
  relativePath,
  before,
  after,
}: FoldedTensorIRSource): string =>
  `${relativePath}: ${prettyPrintTensorIRExpression(before)} => ${prettyPrintTensorIRExpression(
    after
  )}`;

export const serializeFoldedTensorIRSource = ({ after }: FoldedTensorIRSource): string =>
  `${JSON.stringify(encodeTensorIRExpression(after), undefined, 2)}\n`;
