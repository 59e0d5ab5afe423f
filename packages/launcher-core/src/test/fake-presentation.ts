import type {
  PresentationLayer,
  StatusTone,
  ViewHandle,
  ViewOptions,
  ViewSource,
} from '../presentation.js';
import { ViewClosedError } from '../errors.js';

export type PresentationEvent =
  | { type: 'create'; id: string; source: ViewSource; options: ViewOptions }
  | { type: 'status'; id: string; text: string; tone: StatusTone }
  | { type: 'show'; id: string }
  | { type: 'close'; id: string };

/**
 * In-memory presentation host that records every call in order.
 */
export class FakePresentation implements PresentationLayer {
  readonly events: PresentationEvent[] = [];
  private open = new Set<string>();
  private createFailures = new Map<string, Error>();
  private failStatus: Error | null = null;
  private hangStatus = false;

  failCreate(id: string, error: Error): void {
    this.createFailures.set(id, error);
  }

  failStatusUpdates(error: Error): void {
    this.failStatus = error;
  }

  /** Status updates from now on never settle. */
  hangStatusUpdates(): void {
    this.hangStatus = true;
  }

  isOpen(id: string): boolean {
    return this.open.has(id);
  }

  statusTexts(id: string = 'splash'): string[] {
    return this.events.flatMap((event) =>
      event.type === 'status' && event.id === id ? [event.text] : []
    );
  }

  async createView(id: string, source: ViewSource, options: ViewOptions): Promise<ViewHandle> {
    const failure = this.createFailures.get(id);
    if (failure) {
      throw failure;
    }
    this.events.push({ type: 'create', id, source, options });
    this.open.add(id);
    return { id, source };
  }

  async updateStatusText(view: ViewHandle, text: string, tone: StatusTone = 'info'): Promise<void> {
    if (this.hangStatus) {
      return new Promise<void>(() => {});
    }
    if (this.failStatus) {
      throw this.failStatus;
    }
    if (!this.open.has(view.id)) {
      throw new ViewClosedError(view.id);
    }
    this.events.push({ type: 'status', id: view.id, text, tone });
  }

  async showView(view: ViewHandle): Promise<void> {
    this.events.push({ type: 'show', id: view.id });
  }

  async closeView(view: ViewHandle): Promise<void> {
    this.events.push({ type: 'close', id: view.id });
    this.open.delete(view.id);
  }
}
