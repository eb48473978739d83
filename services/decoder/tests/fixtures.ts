import * as zxing from "@zxing/library";
import sharp from "sharp";

const L_CODES = [
  "0001101", "0011001", "0010011", "0111101", "0100011",
  "0110001", "0101111", "0111011", "0110111", "0001011",
];
const G_CODES = [
  "0100111", "0110011", "0011011", "0100001", "0011101",
  "0111001", "0000101", "0010001", "0001001", "0010111",
];
const R_CODES = [
  "1110010", "1100110", "1101100", "1000010", "1011100",
  "1001110", "1010000", "1000100", "1001000", "1110100",
];
const PARITY = [
  "LLLLLL", "LLGLGG", "LLGGLG", "LLGGGL", "LGLLGG",
  "LGGLLG", "LGGGLL", "LGLGLG", "LGLGGL", "LGGLGL",
];

export function ean13Modules(code: string): string {
  if (!/^\d{13}$/.test(code)) {
    throw new Error(`EAN-13 needs 13 digits, got ${code}`);
  }
  const digits = code.split("").map(Number);
  const parity = PARITY[digits[0]];

  let modules = "101";
  for (let i = 1; i <= 6; i += 1) {
    modules += parity[i - 1] === "L" ? L_CODES[digits[i]] : G_CODES[digits[i]];
  }
  modules += "01010";
  for (let i = 7; i <= 12; i += 1) {
    modules += R_CODES[digits[i]];
  }
  modules += "101";
  return modules;
}

interface Raster {
  width: number;
  height: number;
  pixels: Buffer;
}

function rasterFromModules(modules: string, moduleWidth: number, barHeight: number, quietModules: number): Raster {
  const width = (modules.length + quietModules * 2) * moduleWidth;
  const margin = 20;
  const height = barHeight + margin * 2;
  const pixels = Buffer.alloc(width * height, 255);

  for (let m = 0; m < modules.length; m += 1) {
    if (modules[m] !== "1") {
      continue;
    }
    const left = (m + quietModules) * moduleWidth;
    for (let y = margin; y < margin + barHeight; y += 1) {
      pixels.fill(0, y * width + left, y * width + left + moduleWidth);
    }
  }
  return { width, height, pixels };
}

function encodeRaster(raster: Raster, format: "png" | "jpeg"): Promise<Buffer> {
  const image = sharp(raster.pixels, { raw: { width: raster.width, height: raster.height, channels: 1 } });
  return format === "png" ? image.png().toBuffer() : image.jpeg({ quality: 95 }).toBuffer();
}

export function ean13Image(code: string, format: "png" | "jpeg" = "png"): Promise<Buffer> {
  return encodeRaster(rasterFromModules(ean13Modules(code), 4, 120, 12), format);
}

export function qrImage(text: string): Promise<Buffer> {
  const matrix = new zxing.QRCodeWriter().encode(text, zxing.BarcodeFormat.QR_CODE, 240, 240, new Map());
  const width = matrix.getWidth();
  const height = matrix.getHeight();
  const pixels = Buffer.alloc(width * height, 255);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      if (matrix.get(x, y)) {
        pixels[y * width + x] = 0;
      }
    }
  }
  return encodeRaster({ width, height, pixels }, "png");
}

export function blankImage(format: "png" | "jpeg" = "jpeg"): Promise<Buffer> {
  const image = sharp({
    create: { width: 320, height: 240, channels: 3, background: { r: 200, g: 200, b: 200 } },
  });
  return format === "png" ? image.png().toBuffer() : image.jpeg().toBuffer();
}

export function toDataUri(bytes: Buffer, mediaType: string): string {
  return `data:${mediaType};base64,${bytes.toString("base64")}`;
}
