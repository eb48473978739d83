import sharp from "sharp";

import { InvalidImageError } from "./errors.js";
import type { EncodedFrame, GrayscaleImage } from "./types.js";

const DATA_URI_PATTERN = /^data:([^;,]*)((?:;[^;,]*)*),/i;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export const SUPPORTED_FORMATS = new Set(["jpeg", "png", "webp", "gif", "tiff"]);

/**
 * Accepts either raw base64 or a `data:<type>;base64,<payload>` URI as sent by
 * `canvas.toDataURL()` and returns the decoded bytes.
 */
export function parseImagePayload(value: string): EncodedFrame {
  let payload = value.trim();
  let mediaType: string | undefined;

  const prefix = DATA_URI_PATTERN.exec(payload);
  if (prefix) {
    mediaType = prefix[1] ? prefix[1].toLowerCase() : undefined;
    payload = payload.slice(prefix[0].length);
  }

  payload = payload.replace(/\s+/g, "");
  if (payload.length === 0) {
    throw new InvalidImageError("Image payload is empty");
  }
  if (!BASE64_PATTERN.test(payload)) {
    throw new InvalidImageError("Image payload is not valid base64");
  }

  const bytes = Buffer.from(payload, "base64");
  if (bytes.length === 0) {
    throw new InvalidImageError("Image payload is empty");
  }

  return { bytes, mediaType };
}

export async function decodeToGrayscale(bytes: Buffer): Promise<GrayscaleImage> {
  if (bytes.length === 0) {
    throw new InvalidImageError("Image payload is empty");
  }

  try {
    const image = sharp(bytes, { failOn: "error" });
    const metadata = await image.metadata();
    if (!metadata.format || !SUPPORTED_FORMATS.has(metadata.format)) {
      throw new InvalidImageError(`Unsupported image format: ${metadata.format ?? "unknown"}`);
    }

    // Barcode readers binarize luminance, so alpha is flattened onto white first.
    const { data, info } = await image
      .flatten({ background: "#ffffff" })
      .grayscale()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      width: info.width,
      height: info.height,
      pixels: toLuminance(data, info.width * info.height, info.channels),
      format: metadata.format,
    };
  } catch (error) {
    if (error instanceof InvalidImageError) {
      throw error;
    }
    throw new InvalidImageError("Invalid image data");
  }
}

function toLuminance(data: Buffer, pixelCount: number, channels: number): Uint8ClampedArray {
  if (channels === 1) {
    return new Uint8ClampedArray(data.buffer, data.byteOffset, pixelCount);
  }

  const out = new Uint8ClampedArray(pixelCount);
  for (let i = 0; i < pixelCount; i += 1) {
    out[i] = data[i * channels];
  }
  return out;
}
