import { UsageError } from '../errors/ErrorHandling.js';

/**
 * Immutable description of one invocation, built once from argv
 */
export interface Configuration {
  readonly rootDir: string;
  readonly inputFile: string;
  /** Input path relative to rootDir without its extension, when it lies under rootDir */
  readonly testName?: string;
  readonly verbose: boolean;
  /** Scratch mode only: keep the scratch directory after the run */
  readonly keepScratch: boolean;
  readonly compilerOptions: readonly string[];
  /** Trailing positional arguments, the input file last */
  readonly forwardedArgs: readonly string[];
}

export interface ParseOptions {
  scratch: boolean;
  fileExtension?: string;
}

/** Single-letter option prefixes passed through to the compiler untouched */
const FORWARDED_OPTION_LETTERS = new Set(['D', 'I', 'T']);

export function usageText(programName: string, options: Pick<ParseOptions, 'scratch'>): string {
  const lines = [
    `${programName} usage:`,
    `${programName} rootdir [options] file.p4`,
    'Invokes compiler on the supplied file, possibly adding extra arguments',
    '`rootdir` is the root directory of the compiler source tree',
    'options:',
    '          -v: verbose operation',
    '          -a "args": pass args to the compiler',
  ];
  if (options.scratch) {
    lines.push('          -b: do not remove temporary results');
  }
  lines.push('          -D<arg>, -I<arg>, -T<arg>: forwarded to the compiler');
  return lines.join('\n');
}

/**
 * `/a/b` and `/a/b/c/d.p4` give `c/d`. Returns undefined for a file outside
 * the root directory.
 */
export function deriveTestName(
  rootDir: string,
  inputFile: string,
  extension = '.p4',
): string | undefined {
  const root = rootDir.endsWith('/') ? rootDir.slice(0, -1) : rootDir;
  if (!inputFile.startsWith(root)) {
    return undefined;
  }

  let name = inputFile.slice(root.length);
  if (!name.startsWith('/')) {
    // `/a/bc/d.p4` is not under `/a/b`
    return undefined;
  }
  name = name.slice(1);
  if (extension && name.endsWith(extension)) {
    name = name.slice(0, -extension.length);
  }
  return name;
}

/**
 * Parses `<root-directory> [options] <file>`. `argv` excludes the node binary
 * and the script path.
 */
export function parseCommandLine(argv: readonly string[], options: ParseOptions): Configuration {
  if (argv.length < 2) {
    throw new UsageError('Too few arguments');
  }

  const [rootDir, ...rest] = argv;
  let verbose = false;
  let keepScratch = false;
  const compilerOptions: string[] = [];

  let index = 0;
  while (index < rest.length && rest[index].startsWith('-')) {
    const arg = rest[index];
    if (arg === '-v') {
      verbose = true;
    } else if (arg === '-a') {
      if (index + 1 >= rest.length) {
        throw new UsageError('Missing argument for -a option');
      }
      index++;
      compilerOptions.push(...rest[index].split(/\s+/).filter(Boolean));
    } else if (arg === '-b' && options.scratch) {
      keepScratch = true;
    } else if (arg.length > 1 && FORWARDED_OPTION_LETTERS.has(arg[1])) {
      compilerOptions.push(arg);
    } else {
      throw new UsageError(`Unknown option ${arg}`, { option: arg });
    }
    index++;
  }

  const forwardedArgs = rest.slice(index);
  if (forwardedArgs.length === 0) {
    throw new UsageError('Missing input file');
  }
  const inputFile = forwardedArgs[forwardedArgs.length - 1];

  return Object.freeze({
    rootDir,
    inputFile,
    testName: deriveTestName(rootDir, inputFile, options.fileExtension),
    verbose,
    keepScratch,
    compilerOptions: Object.freeze(compilerOptions),
    forwardedArgs: Object.freeze(forwardedArgs),
  });
}
