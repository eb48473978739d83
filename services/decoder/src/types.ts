export type Symbology =
  | "AZTEC"
  | "CODABAR"
  | "CODE39"
  | "CODE93"
  | "CODE128"
  | "DATA_MATRIX"
  | "EAN8"
  | "EAN13"
  | "I25"
  | "MAXICODE"
  | "PDF417"
  | "QR_CODE"
  | "DATABAR"
  | "DATABAR_EXP"
  | "UPCA"
  | "UPCE"
  | "UPC_EAN_EXTENSION";

export interface ScanHit {
  found: true;
  data: string;
  type: Symbology;
}

export interface ScanMiss {
  found: false;
}

export type ScanResult = ScanHit | ScanMiss;

export interface ScanErrorResponse {
  error: string;
}

export type ScanApiResponse = ScanResult | ScanErrorResponse;

export interface HealthResponse {
  status: "ok";
}

export interface EncodedFrame {
  bytes: Buffer;
  mediaType?: string;
}

export interface GrayscaleImage {
  width: number;
  height: number;
  pixels: Uint8ClampedArray;
  format: string;
}

export interface SymbolPoint {
  x: number;
  y: number;
}

export interface DetectedSymbol {
  payload: string;
  symbology: Symbology;
  points: SymbolPoint[];
}
