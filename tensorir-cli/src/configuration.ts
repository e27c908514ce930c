import * as fs from 'fs';
import * as path from 'path';

export type TensorIRProjectConfiguration = {
  readonly sourceDirectory: string;
  readonly outputDirectory: string;
  readonly rebuildCastOnChange: boolean;
};

const CONFIGURATION_FILENAME = 'tirconfig.json';

const isJSONObject = (json: unknown): json is { readonly [key: string]: unknown } =>
  typeof json === 'object' && json !== null && !Array.isArray(json);

export function parseTensorIRProjectConfiguration(
  configurationString: string
): TensorIRProjectConfiguration | null {
  let json: unknown;
  try {
    json = JSON.parse(configurationString);
  } catch {
    return null;
  }
  if (!isJSONObject(json)) return null;
  const {
    sourceDirectory = '.',
    outputDirectory = 'out',
    rebuildCastOnChange = true,
  } = json;
  if (typeof sourceDirectory !== 'string' || typeof outputDirectory !== 'string') return null;
  if (typeof rebuildCastOnChange !== 'boolean') return null;
  return { sourceDirectory, outputDirectory, rebuildCastOnChange };
}

// Used for mock.
type ConfigurationLoader = {
  readonly startPath: string;
  readonly pathExistanceTester: (p: string) => boolean;
  readonly fileReader: (p: string) => string | null;
};

export const fileSystemLoader_EXPOSED_FOR_TESTING: ConfigurationLoader = {
  startPath: path.resolve('.'),
  pathExistanceTester: fs.existsSync,
  fileReader: (p) => {
    try {
      return fs.readFileSync(p).toString();
    } catch {
      return null;
    }
  },
};

export type ConfigurationLoadingResult =
  | TensorIRProjectConfiguration
  | 'UNREADABLE_CONFIGURATION_FILE'
  | 'UNPARSABLE_CONFIGURATION_FILE'
  | 'NO_CONFIGURATION';

export default function loadTensorIRProjectConfiguration({
  startPath,
  pathExistanceTester,
  fileReader,
}: ConfigurationLoader = fileSystemLoader_EXPOSED_FOR_TESTING): ConfigurationLoadingResult {
  let configurationDirectory = startPath;
  for (;;) {
    const configurationPath = path.join(configurationDirectory, CONFIGURATION_FILENAME);
    if (pathExistanceTester(configurationPath)) {
      const content = fileReader(configurationPath);
      if (content == null) {
        return 'UNREADABLE_CONFIGURATION_FILE';
      }
      const configuration = parseTensorIRProjectConfiguration(content);
      return configuration === null
        ? 'UNPARSABLE_CONFIGURATION_FILE'
        : {
            sourceDirectory: path.resolve(configurationDirectory, configuration.sourceDirectory),
            outputDirectory: path.resolve(configurationDirectory, configuration.outputDirectory),
            rebuildCastOnChange: configuration.rebuildCastOnChange,
          };
    }
    const parentDirectory = path.dirname(configurationDirectory);
    if (parentDirectory === configurationDirectory) return 'NO_CONFIGURATION';
    configurationDirectory = parentDirectory;
  }
}
