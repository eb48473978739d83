import * as zxing from "@zxing/library";
import type { BarcodeFormat, DecodeHintType, Result } from "@zxing/library";

import type { DetectedSymbol, GrayscaleImage, Symbology } from "./types.js";

/**
 * Anything that can find barcode symbols in a grayscale frame. Symbols are
 * returned in the detector's own scan order.
 */
export interface SymbolDetector {
  detect(image: GrayscaleImage): DetectedSymbol[];
}

const symbologyByFormat: Record<BarcodeFormat, Symbology> = {
  [zxing.BarcodeFormat.AZTEC]: "AZTEC",
  [zxing.BarcodeFormat.CODABAR]: "CODABAR",
  [zxing.BarcodeFormat.CODE_39]: "CODE39",
  [zxing.BarcodeFormat.CODE_93]: "CODE93",
  [zxing.BarcodeFormat.CODE_128]: "CODE128",
  [zxing.BarcodeFormat.DATA_MATRIX]: "DATA_MATRIX",
  [zxing.BarcodeFormat.EAN_8]: "EAN8",
  [zxing.BarcodeFormat.EAN_13]: "EAN13",
  [zxing.BarcodeFormat.ITF]: "I25",
  [zxing.BarcodeFormat.MAXICODE]: "MAXICODE",
  [zxing.BarcodeFormat.PDF_417]: "PDF417",
  [zxing.BarcodeFormat.QR_CODE]: "QR_CODE",
  [zxing.BarcodeFormat.RSS_14]: "DATABAR",
  [zxing.BarcodeFormat.RSS_EXPANDED]: "DATABAR_EXP",
  [zxing.BarcodeFormat.UPC_A]: "UPCA",
  [zxing.BarcodeFormat.UPC_E]: "UPCE",
  [zxing.BarcodeFormat.UPC_EAN_EXTENSION]: "UPC_EAN_EXTENSION",
};

export function toSymbology(format: BarcodeFormat): Symbology {
  return symbologyByFormat[format];
}

export interface ZXingDetectorOptions {
  possibleFormats?: BarcodeFormat[];
  tryHarder?: boolean;
}

function isNoSymbolError(error: unknown): boolean {
  return (
    error instanceof zxing.NotFoundException ||
    error instanceof zxing.ChecksumException ||
    error instanceof zxing.FormatException
  );
}

export class ZXingDetector implements SymbolDetector {
  private readonly hints = new Map<DecodeHintType, unknown>();

  constructor(options: ZXingDetectorOptions = {}) {
    if (options.tryHarder ?? true) {
      this.hints.set(zxing.DecodeHintType.TRY_HARDER, true);
    }
    if (options.possibleFormats && options.possibleFormats.length > 0) {
      this.hints.set(zxing.DecodeHintType.POSSIBLE_FORMATS, options.possibleFormats);
    }
  }

  detect(image: GrayscaleImage): DetectedSymbol[] {
    const source = new zxing.RGBLuminanceSource(image.pixels, image.width, image.height);
    const bitmap = new zxing.BinaryBitmap(new zxing.HybridBinarizer(source));
    const reader = new zxing.MultiFormatReader();

    let result: Result;
    try {
      result = reader.decode(bitmap, this.hints);
    } catch (error) {
      if (isNoSymbolError(error)) {
        return [];
      }
      throw error;
    }

    return [
      {
        payload: result.getText(),
        symbology: toSymbology(result.getBarcodeFormat()),
        points: (result.getResultPoints() ?? []).map((point) => ({ x: point.getX(), y: point.getY() })),
      },
    ];
  }
}
