export type Modifier = 'Shift' | 'Control' | 'Alt' | 'Meta';

export interface Viewport {
  width: number;
  height: number;
}

export type PageState = 'loading' | 'loaded';

export interface PageEvent {
  state: PageState;
  url: string;
}

export type PageEventListener = (event: PageEvent) => void;

export interface CaptureOptions {
  quality: number;
  timeoutMs: number;
}

/**
 * One headless browser tab. Implementations are not expected to tolerate
 * concurrent commands; BrowserSession serializes access.
 */
export interface BrowserCapability {
  capture(options: CaptureOptions): Promise<Buffer>;
  mouseMove(x: number, y: number): Promise<void>;
  mouseClick(x: number, y: number): Promise<void>;
  mouseDown(): Promise<void>;
  mouseUp(): Promise<void>;
  /** Presses `key` while holding `modifiers`; `key` is a DOM key name or one character. */
  keyPress(key: string, modifiers: readonly Modifier[]): Promise<void>;
  typeText(text: string): Promise<void>;
  wheel(deltaX: number, deltaY: number): Promise<void>;
  navigate(url: string, timeoutMs: number): Promise<void>;
  reload(timeoutMs: number): Promise<void>;
  setViewport(viewport: Viewport): Promise<void>;
  bringToFront(): Promise<void>;
  currentUrl(): string;
  isClosed(): boolean;
  /** Returns an unsubscribe function. */
  onPageEvent(listener: PageEventListener): () => void;
  close(): Promise<void>;
}

export interface BrowserFactory {
  open(sessionId: string, viewport: Viewport): Promise<BrowserCapability>;
  shutdown(): Promise<void>;
}
