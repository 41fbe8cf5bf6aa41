import {
  BuildArgsSchema,
  InspectArgsSchema,
  type BuildArgs,
  type InspectArgs,
} from './tools/schemas.js';
import { DocxError, DocxErrorCode } from './tools/docx/errors.js';
import type { ZodError } from 'zod';

export type CliCommand =
  | { command: 'build'; args: BuildArgs }
  | { command: 'inspect'; args: InspectArgs }
  | { command: 'help' };

export const USAGE = `Usage:
  slides-to-docx [build] [--dir <path>] [--output <file.docx>] [--count <n>]
                 [--title <text>] [--subtitle <text>] [--config <file>] [--verbose|--quiet]
  slides-to-docx inspect <file.docx>
  slides-to-docx --help`;

const VALUE_FLAGS = new Map<string, keyof BuildArgs>([
  ['--dir', 'dir'],
  ['--output', 'output'],
  ['--count', 'count'],
  ['--title', 'title'],
  ['--subtitle', 'subtitle'],
  ['--config', 'config'],
]);

function invalid(message: string, context?: Record<string, unknown>): DocxError {
  return new DocxError(message, DocxErrorCode.INVALID_ARGUMENT, context);
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<args>'}: ${issue.message}`)
    .join('; ');
}

function parseBuildArgs(argv: string[]): BuildArgs {
  const raw: Record<string, string> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--verbose') {
      raw.logLevel = 'debug';
      continue;
    }
    if (arg === '--quiet') {
      raw.logLevel = 'error';
      continue;
    }

    const key = VALUE_FLAGS.get(arg);
    if (!key) {
      throw invalid(`Unknown argument: ${arg}`, { arg });
    }
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw invalid(`Missing value for ${arg}`, { arg });
    }
    raw[key] = value;
    i++;
  }

  const parsed = BuildArgsSchema.safeParse(raw);
  if (!parsed.success) {
    throw invalid(`Invalid arguments: ${describeIssues(parsed.error)}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

function parseInspectArgs(argv: string[]): InspectArgs {
  if (argv.length !== 1) {
    throw invalid('inspect takes exactly one .docx path', { argv });
  }
  const parsed = InspectArgsSchema.safeParse({ path: argv[0] });
  if (!parsed.success) {
    throw invalid(`Invalid arguments: ${describeIssues(parsed.error)}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

/** Parse process arguments (without the node binary and script path). */
export function parseCliArgs(argv: string[]): CliCommand {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { command: 'help' };
  }

  const [first, ...rest] = argv;
  if (first === 'inspect') {
    return { command: 'inspect', args: parseInspectArgs(rest) };
  }
  if (first === 'build') {
    return { command: 'build', args: parseBuildArgs(rest) };
  }
  return { command: 'build', args: parseBuildArgs(argv) };
}
