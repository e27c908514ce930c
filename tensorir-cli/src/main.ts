#!/usr/bin/env node
/* eslint-disable no-console */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';

import cliMainRunner, { CLIRunners, TensorIRCommandRequest } from './cli';
import type { TensorIRProjectConfiguration } from './configuration';
import {
  foldTensorIRSources,
  printTensorIRSources,
  describeFoldedTensorIRSource,
  serializeFoldedTensorIRSource,
} from './fold-sources';
import { collectSources, getConfiguration, selectSources } from './utils';

const TENSORIR_VERSION = '0.1.0';

function reportErrorsAndExit(errors: readonly string[]): never {
  console.error(`Found ${errors.length} error(s).`);
  errors.forEach((it) => console.error(it));
  process.exit(1);
}

function requestedSources(
  configuration: TensorIRProjectConfiguration,
  { files }: TensorIRCommandRequest
): readonly (readonly [string, string])[] {
  const { selected, missing } = selectSources(collectSources(configuration), files);
  if (missing.length > 0) reportErrorsAndExit(missing.map((file) => `${file}: No such source.`));
  return selected;
}

async function foldSources(request: TensorIRCommandRequest): Promise<void> {
  const configuration = getConfiguration();
  const result = foldTensorIRSources(requestedSources(configuration, request), {
    rebuildCastOnChange: request.rebuildCastOnChange ?? configuration.rebuildCastOnChange,
  });
  if (result.__type__ === 'ERROR') reportErrorsAndExit(result.errors);

  await Promise.all(
    result.results.map(async (folded) => {
      const outputPath = join(configuration.outputDirectory, folded.relativePath);
      await mkdir(dirname(outputPath), { recursive: true });
      await writeFile(outputPath, serializeFoldedTensorIRSource(folded));
      console.log(describeFoldedTensorIRSource(folded));
    })
  );
}

const runners: CLIRunners = {
  async fold(request) {
    if (request.needHelp) {
      console.log(`tensorir fold [--rebuild-cast | --keep-cast] [file.tir.json ...]:
Fold the named sources, or every source, into the output directory of tirconfig.json.
--rebuild-cast and --keep-cast override rebuildCastOnChange.`);
    } else {
      await foldSources(request);
    }
  },
  async print(request) {
    if (request.needHelp) {
      console.log('tensorir print [file.tir.json ...]: Print the named sources, or every source.');
    } else {
      const result = printTensorIRSources(requestedSources(getConfiguration(), request));
      if (result.__type__ === 'ERROR') reportErrorsAndExit(result.errors);
      result.results.forEach((line) => console.log(line));
    }
  },
  async version() {
    console.log(`tensorir ${TENSORIR_VERSION}`);
  },
  async help() {
    console.log(`Usage:
tensorir [command] [options] [file.tir.json ...]

Commands:
[no command]: defaults to fold command specified below.
fold: Fold the named sources, or every source found through tirconfig.json.
print: Print the named sources, or every source found through tirconfig.json.
version: Show the version.
help: Show this message.`);
  },
};

cliMainRunner(runners, process.argv.slice(2)).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
