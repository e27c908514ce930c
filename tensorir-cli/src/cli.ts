import { TENSOR_IR_SOURCE_EXTENSION } from './utils';

/** What `fold` and `print` should work on, with overrides of tirconfig.json. */
export type TensorIRCommandRequest = {
  readonly needHelp: boolean;
  /** Sources relative to the source directory. Empty means every source. */
  readonly files: readonly string[];
  /** Null defers to tirconfig.json. */
  readonly rebuildCastOnChange: boolean | null;
};

export type ParsedCLIAction =
  | ({ readonly type: 'fold' | 'print' } & TensorIRCommandRequest)
  | { readonly type: 'version' }
  | { readonly type: 'help' };

const CAST_FLAGS: ReadonlyMap<string, boolean> = new Map([
  ['--rebuild-cast', true],
  ['--keep-cast', false],
]);

function parseCommandRequest(
  commandLineArguments: readonly string[],
  acceptsCastFlags: boolean
): TensorIRCommandRequest | null {
  let needHelp = false;
  let rebuildCastOnChange: boolean | null = null;
  const files: string[] = [];
  for (const argument of commandLineArguments) {
    const castFlag = CAST_FLAGS.get(argument);
    if (argument === '--help' || argument === '-h') {
      needHelp = true;
    } else if (castFlag != null && acceptsCastFlags) {
      rebuildCastOnChange = castFlag;
    } else if (argument.endsWith(TENSOR_IR_SOURCE_EXTENSION)) {
      files.push(argument);
    } else {
      return null;
    }
  }
  return { needHelp, files, rebuildCastOnChange };
}

export function parseCLIArguments(commandLineArguments: readonly string[]): ParsedCLIAction {
  const [command = 'fold', ...rest] = commandLineArguments;
  switch (command) {
    case 'fold':
    case 'print': {
      const request = parseCommandRequest(rest, command === 'fold');
      return request == null ? { type: 'help' } : { type: command, ...request };
    }
    case 'version':
      return { type: 'version' };
    default:
      return { type: 'help' };
  }
}

export interface CLIRunners {
  fold(request: TensorIRCommandRequest): Promise<void>;
  print(request: TensorIRCommandRequest): Promise<void>;
  version(): Promise<void>;
  help(): Promise<void>;
}

export default async function cliMainRunner(
  runners: CLIRunners,
  commandLineArguments: readonly string[]
): Promise<void> {
  const action = parseCLIArguments(commandLineArguments);
  switch (action.type) {
    case 'fold':
      await runners.fold(action);
      return;
    case 'print':
      await runners.print(action);
      return;
    case 'version':
      await runners.version();
      return;
    case 'help':
      await runners.help();
      return;
  }
}
