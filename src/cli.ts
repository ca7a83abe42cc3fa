import { parseArgs } from 'node:util';

export interface CliValues {
  readonly help: boolean;
  readonly version: boolean;
  /** Analyze this URL once and print the result instead of serving HTTP. */
  readonly url: string | undefined;
}

interface CliParseSuccess {
  readonly ok: true;
  readonly values: CliValues;
}

interface CliParseFailure {
  readonly ok: false;
  readonly message: string;
}

export type CliParseResult = CliParseSuccess | CliParseFailure;

const usageLines = [
  'Web page analyzer',
  '',
  'Usage:',
  '  page-analyzer [--url|-u <url>] [--help|-h] [--version|-v]',
  '',
  'Options:',
  '  --url, -u     Analyze one page, print the JSON result and exit.',
  '  --help, -h    Show this help message.',
  '  --version, -v Show version.',
  '',
  'Without --url the HTTP server starts (POST /analyze, GET /ready, GET /health).',
  '',
] as const;

const optionSchema = {
  url: { type: 'string', short: 'u' },
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
} as const;

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function renderCliUsage(): string {
  return `${usageLines.join('\n')}\n`;
}

export function parseCliArgs(args: readonly string[]): CliParseResult {
  try {
    const { values } = parseArgs({
      args: [...args],
      options: optionSchema,
      strict: true,
      allowPositionals: false,
    });

    const url = values.url?.trim();
    if (url === '') {
      return { ok: false, message: 'Option --url requires a non-empty value' };
    }

    return {
      ok: true,
      values: {
        help: values.help,
        version: values.version,
        url,
      },
    };
  } catch (error: unknown) {
    return {
      ok: false,
      message: toErrorMessage(error),
    };
  }
}
