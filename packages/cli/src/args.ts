export type OutputFormat = 'text' | 'json';

export interface CliArgs {
  topic?: string;
  numQuestions: number;
  paths: string[];
  format: OutputFormat;
  interactive: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: doc-quiz [options] <file-or-directory...>

Generates a multiple-choice quiz grounded in the given Markdown, text or PDF files.

Options:
  --topic, -t <text>   Quiz topic (default: General Knowledge)
  --num, -n <count>    Number of questions, 1-10 (default: 1)
  --json               Print the quiz as JSON
  --interactive, -i    Answer the questions in the terminal
  --help, -h           Show help

Environment:
  OPENAI_API_KEY       Required unless MOCK_OPENAI=true
  MOCK_OPENAI          Use the offline mock synthesizer and hashing embedder
  LOG_LEVEL            DEBUG, INFO, WARN (default) or ERROR`;

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    numQuestions: 1,
    paths: [],
    format: 'text',
    interactive: false,
    help: false
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--topic':
      case '-t':
        args.topic = requireValue(argv, ++i, arg);
        break;
      case '--num':
      case '-n':
        args.numQuestions = parseCount(requireValue(argv, ++i, arg));
        break;
      case '--json':
        args.format = 'json';
        break;
      case '--interactive':
      case '-i':
        args.interactive = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option ${arg}`);
        }
        args.paths.push(arg);
    }
  }

  if (!args.help && args.paths.length === 0) {
    throw new UsageError('At least one document path is required');
  }
  if (args.interactive && args.format === 'json') {
    throw new UsageError('--json cannot be combined with --interactive');
  }

  return args;
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('-')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`--num expects a whole number, got "${value}"`);
  }
  return Number(value);
}
