#!/usr/bin/env node
import process from 'node:process';

import { Analyzer } from './analyzer.js';
import { parseCliArgs, renderCliUsage } from './cli.js';
import { config, serverVersion } from './config.js';
import { closeAgents, HttpWebClient } from './fetch.js';
import { buildErrorResponse, startHttpServer } from './http.js';
import { logError } from './observability.js';

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logError('Unhandled rejection', error);
});

function writeJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

function createAnalyzer(): Analyzer {
  return new Analyzer({ webClient: new HttpWebClient() });
}

async function analyzeOnce(url: string): Promise<number> {
  try {
    const { result, error } = await createAnalyzer().analyze(url, {
      signal: AbortSignal.timeout(config.analysis.timeoutMs),
    });
    if (error) {
      writeJson(buildErrorResponse(error));
      return 1;
    }
    writeJson(result.toResponse());
    return 0;
  } finally {
    await closeAgents();
  }
}

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    process.stderr.write(`${parsed.message}\n\n${renderCliUsage()}`);
    process.exitCode = 1;
    return;
  }

  const { values } = parsed;
  if (values.help) {
    process.stdout.write(renderCliUsage());
    return;
  }
  if (values.version) {
    process.stdout.write(`${serverVersion}\n`);
    return;
  }
  if (values.url !== undefined) {
    process.exitCode = await analyzeOnce(values.url);
    return;
  }

  await startHttpServer({ analyzer: createAnalyzer() });
}

main().catch((error: unknown) => {
  logError(
    'Failed to start page-analyzer',
    error instanceof Error ? error : undefined
  );
  process.exit(1);
});
