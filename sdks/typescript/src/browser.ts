import { ScanClient } from './client.js';
import { CaptureSession } from './session.js';
import type { CameraProvider, VideoFeed } from './session.js';

export interface CameraStream {
  getTracks(): Array<{ stop(): void }>;
}

export interface CameraDevices<S extends CameraStream> {
  getUserMedia(constraints: MediaStreamConstraints): Promise<S>;
}

/** Where the stream is shown and frames are drawn from. */
export interface VideoSurface<S extends CameraStream> {
  attach(stream: S): Promise<void>;
  detach(): void;
  snapshot(mediaType: string, quality: number): string | null;
}

export interface BrowserCameraOptions<S extends CameraStream> {
  surface: VideoSurface<S>;
  mediaDevices: CameraDevices<S> | undefined;
  constraints?: MediaStreamConstraints;
  mediaType?: string;
  quality?: number;
}

export const DEFAULT_CONSTRAINTS: MediaStreamConstraints = {
  video: { facingMode: 'environment' },
  audio: false,
};

function stopTracks(stream: CameraStream): void {
  for (const track of stream.getTracks()) {
    track.stop();
  }
}

export function createBrowserCamera<S extends CameraStream>(options: BrowserCameraOptions<S>): CameraProvider {
  const mediaType = options.mediaType ?? 'image/jpeg';
  const quality = options.quality ?? 0.8;

  return {
    async open(): Promise<VideoFeed> {
      const devices = options.mediaDevices;
      if (!devices || typeof devices.getUserMedia !== 'function') {
        const error = new Error('This browser does not expose a camera API');
        error.name = 'NotFoundError';
        throw error;
      }

      const stream = await devices.getUserMedia(options.constraints ?? DEFAULT_CONSTRAINTS);
      try {
        await options.surface.attach(stream);
      } catch (error) {
        stopTracks(stream);
        throw error;
      }

      let stopped = false;
      return {
        grab: () => (stopped ? null : options.surface.snapshot(mediaType, quality)),
        stop: () => {
          if (stopped) {
            return;
          }
          stopped = true;
          stopTracks(stream);
          options.surface.detach();
        },
      };
    },
  };
}

export interface VideoElementLike {
  videoWidth: number;
  videoHeight: number;
  srcObject: MediaProvider | null;
  play(): Promise<void>;
}

export interface FrameCanvas<V> {
  width: number;
  height: number;
  getContext(contextId: '2d'): { drawImage(image: V, dx: number, dy: number, dw: number, dh: number): void } | null;
  toDataURL(type?: string, quality?: number): string;
}

export function elementSurface<V extends VideoElementLike>(video: V, canvas: FrameCanvas<V>): VideoSurface<MediaStream> {
  return {
    async attach(stream) {
      video.srcObject = stream;
      await video.play();
    },
    detach() {
      video.srcObject = null;
    },
    snapshot(mediaType, quality) {
      const width = video.videoWidth;
      const height = video.videoHeight;
      if (width === 0 || height === 0) {
        return null;
      }
      const context = canvas.getContext('2d');
      if (!context) {
        return null;
      }
      canvas.width = width;
      canvas.height = height;
      context.drawImage(video, 0, 0, width, height);
      return canvas.toDataURL(mediaType, quality);
    },
  };
}

function requireElement<T extends HTMLElement>(root: Document, id: string, type: { new (): T }): T {
  const element = root.getElementById(id);
  if (!(element instanceof type)) {
    throw new Error(`Scanner page is missing #${id}`);
  }
  return element;
}

export interface MountOptions {
  baseUrl?: string;
  intervalMs?: number;
}

/** Wires the scanner page markup to a capture session. */
export function mountScanner(root: Document, options: MountOptions = {}): CaptureSession {
  const video = requireElement(root, 'camera', HTMLVideoElement);
  const canvas = requireElement(root, 'frame', HTMLCanvasElement);
  const startButton = requireElement(root, 'start', HTMLButtonElement);
  const stopButton = requireElement(root, 'stop', HTMLButtonElement);
  const status = requireElement(root, 'status', HTMLElement);
  const resultData = requireElement(root, 'result-data', HTMLElement);
  const resultType = requireElement(root, 'result-type', HTMLElement);

  const client = new ScanClient({ baseUrl: options.baseUrl ?? root.location.origin });
  const session = new CaptureSession({
    camera: createBrowserCamera({
      surface: elementSurface<HTMLVideoElement>(video, canvas),
      mediaDevices: root.defaultView?.navigator.mediaDevices,
    }),
    client,
    intervalMs: options.intervalMs,
    listeners: {
      onStateChange: (state) => {
        startButton.disabled = state === 'scanning';
        stopButton.disabled = state === 'idle';
        status.textContent = state === 'scanning' ? 'Scanning…' : 'Stopped';
      },
      onDetected: (result) => {
        resultData.textContent = result.data;
        resultType.textContent = result.type;
      },
      onError: (error) => {
        console.error(error);
        status.textContent = error.message;
      },
    },
  });

  startButton.addEventListener('click', () => {
    status.textContent = 'Opening camera…';
    session.start().catch((error: unknown) => {
      startButton.disabled = false;
      status.textContent = error instanceof Error ? error.message : String(error);
    });
  });
  stopButton.addEventListener('click', () => session.stop());
  stopButton.disabled = true;

  return session;
}
