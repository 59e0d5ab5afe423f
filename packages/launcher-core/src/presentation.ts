export type ViewSource = { kind: 'splash' } | { kind: 'url'; url: string };

export interface ViewOptions {
  title: string;
  width: number;
  height: number;
  minWidth?: number;
  minHeight?: number;
  resizable?: boolean;
  decorations?: boolean;
  center?: boolean;
}

export interface ViewHandle {
  readonly id: string;
  readonly source: ViewSource;
}

export type StatusTone = 'info' | 'error';

/**
 * Window-manager capability the orchestrator drives. Implementations may
 * throw from any method; `updateStatusText` failures are treated as
 * best-effort and ignored by callers.
 */
export interface PresentationLayer {
  createView(id: string, source: ViewSource, options: ViewOptions): Promise<ViewHandle>;
  updateStatusText(view: ViewHandle, text: string, tone?: StatusTone): Promise<void>;
  showView(view: ViewHandle): Promise<void>;
  closeView(view: ViewHandle): Promise<void>;
}

export const SPLASH_VIEW_ID = 'splash';
export const MAIN_VIEW_ID = 'main';

export function getSplashViewOptions(title: string): ViewOptions {
  return {
    title,
    width: 400,
    height: 300,
    resizable: false,
    decorations: false,
    center: true,
  };
}

export function getMainViewOptions(title: string): ViewOptions {
  return {
    title,
    width: 1200,
    height: 800,
    minWidth: 800,
    minHeight: 600,
  };
}
