import * as fs from 'fs';
import * as path from 'path';

import loadTensorIRProjectConfiguration, { TensorIRProjectConfiguration } from './configuration';

export const TENSOR_IR_SOURCE_EXTENSION = '.tir.json';

export function getConfiguration(): TensorIRProjectConfiguration {
  const configuration = loadTensorIRProjectConfiguration();
  if (
    configuration === 'NO_CONFIGURATION' ||
    configuration === 'UNPARSABLE_CONFIGURATION_FILE' ||
    configuration === 'UNREADABLE_CONFIGURATION_FILE'
  ) {
    // eslint-disable-next-line no-console
    console.error(configuration);
    process.exit(2);
  }
  return configuration;
}

/** Returns `[path relative to the source directory, content]` of every source, sorted by path. */
export function collectSources({
  sourceDirectory,
  outputDirectory,
}: Pick<
  TensorIRProjectConfiguration,
  'sourceDirectory' | 'outputDirectory'
>): readonly (readonly [string, string])[] {
  const sourcePath = path.resolve(sourceDirectory);
  const outputPath = path.resolve(outputDirectory);
  const sources: (readonly [string, string])[] = [];

  function walk(startPath: string, visitor: (file: string) => void): void {
    function recursiveVisit(p: string): void {
      const stats = fs.lstatSync(p);
      if (stats.isFile()) {
        visitor(p);
        return;
      }

      // Folded output may live inside the source directory.
      if (stats.isDirectory() && p !== outputPath) {
        fs.readdirSync(p).forEach((relativeChildPath) =>
          recursiveVisit(path.join(p, relativeChildPath))
        );
      }
    }

    recursiveVisit(startPath);
  }

  walk(sourcePath, (file) => {
    if (!file.endsWith(TENSOR_IR_SOURCE_EXTENSION)) return;
    sources.push([path.relative(sourcePath, file), fs.readFileSync(file).toString()]);
  });

  return sources.sort(([a], [b]) => a.localeCompare(b));
}

/**
 * Keeps the sources named in `files`, which are relative to the source directory. Every source is
 * kept when `files` is empty. Names that match no source come back in `missing`.
 */
export function selectSources(
  sources: readonly (readonly [string, string])[],
  files: readonly string[]
): {
  readonly selected: readonly (readonly [string, string])[];
  readonly missing: readonly string[];
} {
  if (files.length === 0) return { selected: sources, missing: [] };
  const requested = new Set(files.map((file) => path.normalize(file)));
  const selected = sources.filter(([relativePath]) => requested.has(relativePath));
  const found = new Set(selected.map(([relativePath]) => relativePath));
  return { selected, missing: Array.from(requested).filter((file) => !found.has(file)) };
}
