import os from 'node:os';
import { performance } from 'node:perf_hooks';

import type { Document } from 'domhandler';

import { AnalysisResult } from './analysis-result.js';
import { config } from './config.js';
import { decodeHtml, parseDocument } from './document.js';
import {
  InvalidUrlError,
  PoolClosedError,
  TaskFailedError,
  UpstreamStatusError,
} from './errors.js';
import {
  classifyLinks,
  collectLinks,
  countHeadings,
  detectHtmlVersion,
  extractTitle,
  hasLoginForm,
  type HeadingCounts,
  type LinkCounts,
  type LinkInfo,
} from './extractors.js';
import type { WebClient } from './fetch.js';
import { logDebug, logInfo, logWarn, redactUrl } from './observability.js';
import { countInaccessible } from './pool/fan-out.js';
import {
  type PoolTask,
  type RunSummary,
  runTasks,
  TaskPool,
} from './pool/task-pool.js';

/** What a pipeline task hands back to the collector. */
export type StageOutput =
  | { readonly kind: 'baseUrl'; readonly url: URL }
  | {
      readonly kind: 'page';
      readonly body: Uint8Array;
      readonly document: Document;
      readonly status: number;
    }
  | { readonly kind: 'htmlVersion'; readonly version: string }
  | { readonly kind: 'title'; readonly title: string }
  | { readonly kind: 'headings'; readonly counts: HeadingCounts }
  | { readonly kind: 'links'; readonly counts: LinkCounts }
  | { readonly kind: 'inaccessibleLinks'; readonly count: number }
  | { readonly kind: 'loginForm'; readonly present: boolean };

export type AnalysisError = TaskFailedError;

export interface AnalysisOutcome {
  /** Populated as far as the run got. */
  readonly result: AnalysisResult;
  readonly error?: AnalysisError;
}

export interface AnalyzerOptions {
  readonly webClient: WebClient;
  /** Link probes in flight per analysis. */
  readonly probeConcurrency?: number;
  /** Workers for the analysis stage. Defaults to the host's available parallelism. */
  readonly parallelism?: number;
}

export interface AnalyzeOptions {
  readonly signal?: AbortSignal;
}

type StageTask = PoolTask<StageOutput>;

export function parseBaseUrl(raw: string): URL {
  const trimmed = raw.trim();
  if (!trimmed) throw new InvalidUrlError(raw, 'URL is empty');
  if (!URL.canParse(trimmed)) {
    throw new InvalidUrlError(raw, 'URL cannot be parsed');
  }

  const url = new URL(trimmed);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidUrlError(raw, 'only http and https URLs are supported');
  }
  return url;
}

function applyOutput(result: AnalysisResult, output: StageOutput): void {
  switch (output.kind) {
    case 'baseUrl':
      result.setBaseUrl(output.url);
      break;
    case 'page':
      result.setStatusCode(output.status);
      result.setBody(output.body);
      result.setDocument(output.document);
      break;
    case 'htmlVersion':
      result.setHtmlVersion(output.version);
      break;
    case 'title':
      result.setTitle(output.title);
      break;
    case 'headings':
      result.setHeadings(output.counts);
      break;
    case 'links':
      result.setLinkCounts(output.counts);
      break;
    case 'inaccessibleLinks':
      result.setInaccessibleLinks(output.count);
      break;
    case 'loginForm':
      result.setHasLoginForm(output.present);
      break;
  }
}

/**
 * Error a finished stage reports, if any. A stage whose tasks all delivered
 * succeeds even when the caller's signal fired afterwards; otherwise the
 * caller's abort reason takes precedence over the failure it caused.
 */
export function stageError(
  stage: string,
  summary: RunSummary,
  signal?: AbortSignal
): AnalysisError | undefined {
  if (summary.complete) return undefined;
  if (signal?.aborted) return new TaskFailedError(stage, signal.reason);
  if (summary.failure) {
    return new TaskFailedError(summary.failure.label, summary.failure.reason);
  }
  return new TaskFailedError(stage, new PoolClosedError(stage));
}

/**
 * Runs the two-stage analysis of one page. The prerequisite stage parses the
 * URL and fetches the document; only when both succeed does the analysis
 * stage start. Each stage runs on its own fail-fast pool, and outputs are
 * applied to the result by this class alone, in the order they arrive.
 */
export class Analyzer {
  private readonly webClient: WebClient;
  private readonly probeConcurrency: number;
  private readonly parallelism: number;

  constructor(options: AnalyzerOptions) {
    this.webClient = options.webClient;
    this.probeConcurrency =
      options.probeConcurrency ?? config.analysis.probeConcurrency;
    this.parallelism = Math.max(
      1,
      options.parallelism ?? os.availableParallelism()
    );
  }

  async analyze(
    url: string,
    options: AnalyzeOptions = {}
  ): Promise<AnalysisOutcome> {
    const { signal } = options;
    const result = new AnalysisResult();
    const startedAt = performance.now();
    logDebug('Analysis started', { url: redactUrl(url) });

    const prerequisiteError = await this.runStage(
      'prerequisites',
      2,
      this.prerequisiteTasks(url),
      result,
      signal
    );
    if (prerequisiteError) return this.fail(url, result, prerequisiteError);

    const analysisError = await this.runStage(
      'analysis',
      this.parallelism,
      this.analysisTasks(result),
      result,
      signal
    );
    if (analysisError) return this.fail(url, result, analysisError);

    logInfo('Analysis finished', {
      url: redactUrl(url),
      status: result.statusCode,
      links: result.internalLinks + result.externalLinks,
      duration: `${Math.round(performance.now() - startedAt)}ms`,
    });
    return { result };
  }

  private fail(
    url: string,
    result: AnalysisResult,
    error: AnalysisError
  ): AnalysisOutcome {
    logWarn('Analysis failed', {
      url: redactUrl(url),
      task: error.task,
      code: error.code,
      error: error.rootCause.message,
    });
    return { result, error };
  }

  private async runStage(
    stage: string,
    parallelism: number,
    tasks: readonly StageTask[],
    result: AnalysisResult,
    signal: AbortSignal | undefined
  ): Promise<AnalysisError | undefined> {
    const pool = new TaskPool<StageOutput>({
      parallelism,
      failFast: true,
      name: stage,
      ...(signal ? { signal } : {}),
    });

    let summary: RunSummary;
    try {
      summary = await runTasks(pool, tasks, (_label, output) => {
        applyOutput(result, output);
      });
    } catch (error: unknown) {
      return new TaskFailedError(stage, error);
    }

    const { failure } = summary;
    if (failure && failure.reason instanceof UpstreamStatusError) {
      result.setStatusCode(failure.reason.status);
    }
    return stageError(stage, summary, signal);
  }

  private prerequisiteTasks(url: string): StageTask[] {
    return [
      {
        label: 'parseUrl',
        work: async () => ({ kind: 'baseUrl', url: parseBaseUrl(url) }),
      },
      {
        label: 'getWebPage',
        work: async (signal) => this.getWebPage(url, signal),
      },
    ];
  }

  private async getWebPage(
    url: string,
    signal: AbortSignal
  ): Promise<StageOutput> {
    const target = parseBaseUrl(url).href;
    const page = await this.webClient.fetch(signal, target, 'GET');
    if (page.status !== 200) {
      throw new UpstreamStatusError(page.url, page.status);
    }

    const document = parseDocument(page.body, page.url);
    return { kind: 'page', body: page.body, document, status: page.status };
  }

  private analysisTasks(result: AnalysisResult): StageTask[] {
    const baseUrl = result.requireBaseUrl();
    const body = result.requireBody();
    const document = result.requireDocument();

    let links: readonly LinkInfo[] | undefined;
    const linkSnapshot = (): readonly LinkInfo[] =>
      (links ??= collectLinks(document, baseUrl));

    return [
      {
        label: 'getHtmlVersion',
        work: async () => ({
          kind: 'htmlVersion',
          version: detectHtmlVersion(decodeHtml(body)),
        }),
      },
      {
        label: 'getTitle',
        work: async () => ({ kind: 'title', title: extractTitle(document) }),
      },
      {
        label: 'countHeadings',
        work: async () => ({
          kind: 'headings',
          counts: countHeadings(document),
        }),
      },
      {
        label: 'countLinks',
        work: async () => ({
          kind: 'links',
          counts: classifyLinks(linkSnapshot()),
        }),
      },
      {
        label: 'checkLinksAccessibility',
        work: async (signal) => ({
          kind: 'inaccessibleLinks',
          count: await countInaccessible(
            linkSnapshot().map((link) => link.url),
            async (linkUrl, probeSignal) =>
              (await this.webClient.fetch(probeSignal, linkUrl, 'HEAD')).status,
            {
              concurrency: this.probeConcurrency,
              signal,
              name: 'link-probe',
            }
          ),
        }),
      },
      {
        label: 'hasLoginForm',
        work: async () => ({
          kind: 'loginForm',
          present: hasLoginForm(document),
        }),
      },
    ];
  }
}
