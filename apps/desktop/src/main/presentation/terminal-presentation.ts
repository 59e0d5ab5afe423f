import {
  ViewClosedError,
  createNoOpLogger,
  getErrorMessage,
  type Logger,
  type PresentationLayer,
  type StatusTone,
  type ViewHandle,
  type ViewOptions,
  type ViewSource,
} from '@sidecar-launcher/core';
import { openInBrowser, type BrowserOpener } from './browser-opener.js';

const RED = '\x1b[31m';
const RESET = '\x1b[0m';
const CLEAR_LINE = '\r\x1b[2K';

export interface TerminalOutput {
  isTTY?: boolean;
  write(chunk: string): unknown;
}

export interface TerminalPresentationOptions {
  output?: TerminalOutput;
  /** Colour the error tone. Defaults to on for TTYs unless NO_COLOR is set. */
  color?: boolean;
  openBrowser?: boolean;
  opener?: BrowserOpener;
  logger?: Logger;
}

interface TerminalView {
  handle: ViewHandle;
  options: ViewOptions;
  hasStatusLine: boolean;
}

/**
 * PresentationLayer for a terminal session. The splash view is a title line
 * followed by a status line; URL views are handed to the system browser.
 */
export class TerminalPresentation implements PresentationLayer {
  private views = new Map<string, TerminalView>();
  private readonly output: TerminalOutput;
  private readonly interactive: boolean;
  private readonly color: boolean;
  private readonly openBrowser: boolean;
  private readonly opener: BrowserOpener;
  private readonly logger: Logger;

  constructor(options: TerminalPresentationOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.interactive = this.output.isTTY === true;
    this.color = options.color ?? (this.interactive && !process.env.NO_COLOR);
    this.openBrowser = options.openBrowser ?? true;
    this.opener = options.opener ?? ((url) => openInBrowser(url));
    this.logger = options.logger ?? createNoOpLogger();
  }

  async createView(id: string, source: ViewSource, options: ViewOptions): Promise<ViewHandle> {
    if (this.views.has(id)) {
      throw new Error(`View "${id}" already exists`);
    }
    const handle: ViewHandle = { id, source };
    this.views.set(id, { handle, options, hasStatusLine: false });
    return handle;
  }

  async showView(view: ViewHandle): Promise<void> {
    const entry = this.getOpenView(view);

    if (view.source.kind === 'splash') {
      this.output.write(`${entry.options.title}\n`);
      return;
    }

    const { url } = view.source;
    if (this.openBrowser) {
      try {
        await this.opener(url);
        this.output.write(`${entry.options.title} opened at ${url}\n`);
        return;
      } catch (err) {
        this.logger.warn('Could not open browser', { url, error: getErrorMessage(err) });
      }
    }
    this.output.write(`${entry.options.title} is ready at ${url}\n`);
  }

  async updateStatusText(view: ViewHandle, text: string, tone: StatusTone = 'info'): Promise<void> {
    const entry = this.getOpenView(view);
    const line = tone === 'error' && this.color ? `${RED}${text}${RESET}` : text;

    if (!this.interactive) {
      this.output.write(`${line}\n`);
      return;
    }

    this.output.write(entry.hasStatusLine ? `${CLEAR_LINE}${line}` : line);
    entry.hasStatusLine = true;
  }

  async closeView(view: ViewHandle): Promise<void> {
    const entry = this.getOpenView(view);
    if (entry.hasStatusLine) {
      this.output.write('\n');
    }
    this.views.delete(view.id);
  }

  isOpen(id: string): boolean {
    return this.views.has(id);
  }

  private getOpenView(view: ViewHandle): TerminalView {
    const entry = this.views.get(view.id);
    if (!entry) {
      throw new ViewClosedError(view.id);
    }
    return entry;
  }
}
