import type { ScanHit, ScanResult, SessionState } from './types.js';

/** A live camera feed owned by one capture session. */
export interface VideoFeed {
  /** Encodes the current frame as a data URI, or `null` while the video has no dimensions yet. */
  grab(): string | null;
  stop(): void;
}

export interface CameraProvider {
  open(): Promise<VideoFeed>;
}

export interface FrameScanner {
  scan(image: string): Promise<ScanResult>;
}

export interface CaptureListeners {
  onStateChange?: (state: SessionState) => void;
  onResult?: (result: ScanResult) => void;
  onDetected?: (result: ScanHit) => void;
  onError?: (error: Error) => void;
}

export interface CaptureSessionOptions {
  camera: CameraProvider;
  client: FrameScanner;
  intervalMs?: number;
  /** Skip a tick while the previous frame is still being scanned. */
  serialize?: boolean;
  listeners?: CaptureListeners;
}

export const DEFAULT_INTERVAL_MS = 500;

export class CameraUnavailableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CameraUnavailableError';
  }
}

function describeCameraFailure(error: unknown): string {
  const name = error instanceof Error ? error.name : '';
  switch (name) {
    case 'NotAllowedError':
    case 'SecurityError':
      return 'Camera permission denied';
    case 'NotFoundError':
    case 'OverconstrainedError':
      return 'No camera found';
    case 'NotReadableError':
    case 'AbortError':
      return 'Camera is busy or unavailable';
    default:
      return error instanceof Error ? `Camera could not be opened: ${error.message}` : 'Camera could not be opened';
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class CaptureSession {
  private readonly camera: CameraProvider;
  private readonly client: FrameScanner;
  private readonly intervalMs: number;
  private readonly serialize: boolean;
  private readonly listeners: CaptureListeners;

  private currentState: SessionState = 'idle';
  private feed: VideoFeed | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private starting: Promise<void> | null = null;
  private latest: ScanHit | null = null;
  private inFlight = 0;
  // Bumped on every start and stop; responses from an older run are dropped.
  private generation = 0;

  constructor(options: CaptureSessionOptions) {
    this.camera = options.camera;
    this.client = options.client;
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.serialize = options.serialize ?? true;
    this.listeners = options.listeners ?? {};

    if (!Number.isFinite(this.intervalMs) || this.intervalMs <= 0) {
      throw new Error('intervalMs must be a positive number');
    }
  }

  get state(): SessionState {
    return this.currentState;
  }

  get lastResult(): ScanHit | null {
    return this.latest;
  }

  get pendingScans(): number {
    return this.inFlight;
  }

  start(): Promise<void> {
    if (this.currentState === 'scanning') {
      return Promise.resolve();
    }
    if (!this.starting) {
      this.starting = this.acquire().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  stop(): void {
    this.generation += 1;
    this.inFlight = 0;

    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }

    const feed = this.feed;
    this.feed = null;
    feed?.stop();

    if (this.currentState !== 'idle') {
      this.setState('idle');
    }
  }

  private async acquire(): Promise<void> {
    this.generation += 1;
    const generation = this.generation;

    let feed: VideoFeed;
    try {
      feed = await this.camera.open();
    } catch (error) {
      const failure = new CameraUnavailableError(describeCameraFailure(error), { cause: error });
      this.listeners.onError?.(failure);
      throw failure;
    }

    if (generation !== this.generation) {
      // stop() ran while the camera was opening
      feed.stop();
      return;
    }

    this.feed = feed;
    this.timer = setInterval(() => {
      void this.tick(generation);
    }, this.intervalMs);
    this.setState('scanning');
  }

  private async tick(generation: number): Promise<void> {
    if (generation !== this.generation || !this.feed) {
      return;
    }
    if (this.serialize && this.inFlight > 0) {
      return;
    }

    this.inFlight += 1;
    try {
      const frame = this.feed.grab();
      if (frame === null) {
        return;
      }

      const result = await this.client.scan(frame);
      if (generation !== this.generation) {
        return;
      }

      this.listeners.onResult?.(result);
      if (result.found) {
        this.latest = result;
        this.listeners.onDetected?.(result);
      }
    } catch (error) {
      if (generation === this.generation) {
        this.reportError(toError(error));
      }
    } finally {
      if (generation === this.generation) {
        this.inFlight -= 1;
      }
    }
  }

  private reportError(error: Error): void {
    if (this.listeners.onError) {
      this.listeners.onError(error);
      return;
    }
    console.warn('capture: scan request failed', error);
  }

  private setState(state: SessionState): void {
    this.currentState = state;
    this.listeners.onStateChange?.(state);
  }
}
