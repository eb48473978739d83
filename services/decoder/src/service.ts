import { ZXingDetector } from "./detector.js";
import type { SymbolDetector } from "./detector.js";
import { InvalidImageError } from "./errors.js";
import { decodeToGrayscale, parseImagePayload } from "./frame.js";
import type { EncodedFrame, ScanResult } from "./types.js";

export type ScanInput = string | Buffer | EncodedFrame;

export interface ScanServiceOptions {
  detector?: SymbolDetector;
  log?: (message: string) => void;
}

function toFrame(input: ScanInput): EncodedFrame {
  if (typeof input === "string") {
    return parseImagePayload(input);
  }
  if (Buffer.isBuffer(input)) {
    return { bytes: input };
  }
  return input;
}

function isAcceptedMediaType(mediaType: string): boolean {
  const normalized = mediaType.toLowerCase();
  return normalized.startsWith("image/") || normalized === "application/octet-stream";
}

export class ScanService {
  private readonly detector: SymbolDetector;
  private readonly log: (message: string) => void;

  constructor(options: ScanServiceOptions = {}) {
    this.detector = options.detector ?? new ZXingDetector();
    this.log = options.log ?? ((message) => console.log(message));
  }

  /**
   * Decodes one frame. The first symbol reported by the detector wins and the
   * rest are dropped; an image without symbols is `{ found: false }`, while
   * bytes that are not an image at all reject with `InvalidImageError`.
   */
  async scan(input: ScanInput): Promise<ScanResult> {
    const frame = toFrame(input);
    if (frame.bytes.length === 0) {
      throw new InvalidImageError("Image payload is empty");
    }
    if (frame.mediaType && !isAcceptedMediaType(frame.mediaType)) {
      throw new InvalidImageError(`Unsupported media type: ${frame.mediaType}`);
    }

    const image = await decodeToGrayscale(frame.bytes);
    const symbols = this.detector.detect(image);
    if (symbols.length === 0) {
      return { found: false };
    }

    if (symbols.length > 1) {
      this.log(`scan: ${symbols.length} symbols in frame, keeping the first and discarding ${symbols.length - 1}`);
    }

    const [first] = symbols;
    return { found: true, data: first.payload, type: first.symbology };
  }
}
