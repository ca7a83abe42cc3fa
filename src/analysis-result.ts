import type { Document } from 'domhandler';

import { AppError, DuplicateWriteError } from './errors.js';
import {
  emptyHeadingCounts,
  type HeadingCounts,
  type LinkCounts,
} from './extractors.js';

/** JSON body returned for a finished analysis. */
export interface AnalysisResponse {
  html_version: string;
  title: string;
  headings: HeadingCounts;
  internal_links: number;
  external_links: number;
  inaccessible_links: number;
  has_login_form: boolean;
}

class WriteOnce<T> {
  private value: T | undefined;
  private written = false;

  constructor(private readonly field: string) {}

  get isSet(): boolean {
    return this.written;
  }

  set(value: T): void {
    if (this.written) throw new DuplicateWriteError(this.field);
    this.value = value;
    this.written = true;
  }

  get(): T | undefined {
    return this.value;
  }

  require(): T {
    if (this.value === undefined) {
      throw new AppError(
        `Analysis field "${this.field}" is not available yet`,
        500,
        'FIELD_NOT_SET',
        { field: this.field }
      );
    }
    return this.value;
  }
}

/**
 * Per-run accumulator. Every field has one owning task and may be written once;
 * unwritten fields read as their zero value, so a failed run still reports
 * whatever was collected.
 */
export class AnalysisResult {
  private readonly baseUrlSlot = new WriteOnce<URL>('baseUrl');
  private readonly bodySlot = new WriteOnce<Uint8Array>('body');
  private readonly documentSlot = new WriteOnce<Document>('document');
  private readonly statusCodeSlot = new WriteOnce<number>('statusCode');
  private readonly htmlVersionSlot = new WriteOnce<string>('htmlVersion');
  private readonly titleSlot = new WriteOnce<string>('title');
  private readonly headingsSlot = new WriteOnce<HeadingCounts>('headings');
  private readonly linkCountsSlot = new WriteOnce<LinkCounts>('linkCounts');
  private readonly inaccessibleSlot = new WriteOnce<number>(
    'inaccessibleLinks'
  );
  private readonly loginFormSlot = new WriteOnce<boolean>('hasLoginForm');

  get baseUrl(): URL | undefined {
    return this.baseUrlSlot.get();
  }

  get body(): Uint8Array | undefined {
    return this.bodySlot.get();
  }

  get document(): Document | undefined {
    return this.documentSlot.get();
  }

  /** Last HTTP status seen for the primary document; 0 before any response. */
  get statusCode(): number {
    return this.statusCodeSlot.get() ?? 0;
  }

  get htmlVersion(): string {
    return this.htmlVersionSlot.get() ?? '';
  }

  get title(): string {
    return this.titleSlot.get() ?? '';
  }

  get headings(): HeadingCounts {
    return { ...(this.headingsSlot.get() ?? emptyHeadingCounts()) };
  }

  get internalLinks(): number {
    return this.linkCountsSlot.get()?.internal ?? 0;
  }

  get externalLinks(): number {
    return this.linkCountsSlot.get()?.external ?? 0;
  }

  get inaccessibleLinks(): number {
    return this.inaccessibleSlot.get() ?? 0;
  }

  get hasLoginForm(): boolean {
    return this.loginFormSlot.get() ?? false;
  }

  /** Both prerequisite fields are in place. */
  get isPrepared(): boolean {
    return this.baseUrlSlot.isSet && this.documentSlot.isSet;
  }

  requireBaseUrl(): URL {
    return this.baseUrlSlot.require();
  }

  requireBody(): Uint8Array {
    return this.bodySlot.require();
  }

  requireDocument(): Document {
    return this.documentSlot.require();
  }

  setBaseUrl(url: URL): void {
    this.baseUrlSlot.set(url);
  }

  setBody(body: Uint8Array): void {
    this.bodySlot.set(body);
  }

  setDocument(document: Document): void {
    this.documentSlot.set(document);
  }

  setStatusCode(status: number): void {
    this.statusCodeSlot.set(status);
  }

  setHtmlVersion(version: string): void {
    this.htmlVersionSlot.set(version);
  }

  setTitle(title: string): void {
    this.titleSlot.set(title);
  }

  setHeadings(counts: HeadingCounts): void {
    this.headingsSlot.set({ ...emptyHeadingCounts(), ...counts });
  }

  setLinkCounts(counts: LinkCounts): void {
    this.linkCountsSlot.set({ ...counts });
  }

  setInaccessibleLinks(count: number): void {
    this.inaccessibleSlot.set(count);
  }

  setHasLoginForm(present: boolean): void {
    this.loginFormSlot.set(present);
  }

  toResponse(): AnalysisResponse {
    return {
      html_version: this.htmlVersion,
      title: this.title,
      headings: this.headings,
      internal_links: this.internalLinks,
      external_links: this.externalLinks,
      inaccessible_links: this.inaccessibleLinks,
      has_login_form: this.hasLoginForm,
    };
  }
}
