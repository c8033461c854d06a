export interface CliArgs {
  input?: string;
  output?: string;
  tables?: string;
  version?: string;
  maxPages?: number;
  format?: string;
  help?: boolean;
}

export const EXIT_OK = 0;
/** Input unavailable, or at least one document failed. */
export const EXIT_FAILED = 1;
/** Bad arguments or an unexpected error. */
export const EXIT_USAGE = 2;

export const parseArgs = (argv: readonly string[]): CliArgs => {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--input':
        args.input = argv[++i];
        break;
      case '--output':
        args.output = argv[++i];
        break;
      case '--tables':
        args.tables = argv[++i];
        break;
      case '--version':
        args.version = argv[++i];
        break;
      case '--max-pages':
        args.maxPages = parseInt(argv[++i], 10);
        break;
      case '--format':
        args.format = argv[++i];
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
    }
  }

  return args;
};

/** Summary format once the arguments have passed `argumentError`. */
export const summaryFormat = (format: string | undefined): 'table' | 'json' =>
  format === 'json' ? 'json' : 'table';

/** First problem with the arguments, or null when they can run. */
export const argumentError = (args: CliArgs): string | null => {
  if (!args.input) return '--input is required';
  if (args.format !== undefined && args.format !== 'table' && args.format !== 'json') {
    return `unknown format "${args.format}"`;
  }
  if (args.maxPages !== undefined && (!Number.isInteger(args.maxPages) || args.maxPages < 1)) {
    return '--max-pages must be a positive integer';
  }
  return null;
};
