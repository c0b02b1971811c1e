import { Channels, DecodedImage } from "../models";
import { DecodeError, UnsupportedFormatError } from "../utils/error";

// sharp (libvips) can neither read nor write BMP, so both directions live here.

const FILE_HEADER_SIZE = 14;
const INFO_HEADER_SIZE = 40;
const V4_HEADER_SIZE = 108;
const BI_RGB = 0;
const BI_BITFIELDS = 3;
const PIXELS_PER_METRE = 2835; // 72 DPI
const LCS_SRGB = 0x73524742;

export function isBmp(buffer: Buffer): boolean {
  return buffer.length >= 2 && buffer[0] === 0x42 && buffer[1] === 0x4d;
}

function rowStride(bitCount: number, width: number): number {
  return Math.floor((bitCount * width + 31) / 32) * 4;
}

/**
 * Decodes uncompressed 8, 24 and 32-bit bitmaps into raw RGB(A) pixels.
 */
export function decodeBmp(buffer: Buffer): DecodedImage {
  if (!isBmp(buffer) || buffer.length < FILE_HEADER_SIZE + INFO_HEADER_SIZE) {
    throw new DecodeError("Invalid bitmap header");
  }

  const pixelOffset = buffer.readUInt32LE(10);
  const headerSize = buffer.readUInt32LE(14);
  if (headerSize < INFO_HEADER_SIZE) {
    throw new UnsupportedFormatError(`bmp (header size ${headerSize})`);
  }
  const width = buffer.readInt32LE(18);
  const rawHeight = buffer.readInt32LE(22);
  const bitCount = buffer.readUInt16LE(28);
  const compression = buffer.readUInt32LE(30);
  const colorsUsed = buffer.readUInt32LE(46);
  const topDown = rawHeight < 0;
  const height = Math.abs(rawHeight);

  if (width <= 0 || height === 0) {
    throw new DecodeError("Invalid image dimensions");
  }

  let channels: Channels;
  let hasAlpha = false;
  if (bitCount === 32 && compression === BI_BITFIELDS) {
    const masksAt = FILE_HEADER_SIZE + INFO_HEADER_SIZE;
    const red = buffer.readUInt32LE(masksAt);
    const green = buffer.readUInt32LE(masksAt + 4);
    const blue = buffer.readUInt32LE(masksAt + 8);
    const alpha = headerSize >= 56 ? buffer.readUInt32LE(masksAt + 12) : 0;
    if (red !== 0x00ff0000 || green !== 0x0000ff00 || blue !== 0x000000ff) {
      throw new UnsupportedFormatError("bmp (custom bit masks)");
    }
    hasAlpha = alpha === 0xff000000;
    channels = hasAlpha ? 4 : 3;
  } else if (compression === BI_RGB && (bitCount === 24 || bitCount === 32 || bitCount === 8)) {
    channels = 3;
  } else {
    throw new UnsupportedFormatError(`bmp (${bitCount}-bit, compression ${compression})`);
  }

  const stride = rowStride(bitCount, width);
  if (pixelOffset + stride * height > buffer.length) {
    throw new DecodeError("Truncated bitmap data");
  }

  let palette: Buffer | null = null;
  if (bitCount === 8) {
    const entries = colorsUsed || 256;
    const paletteStart = FILE_HEADER_SIZE + headerSize;
    palette = buffer.subarray(paletteStart, paletteStart + entries * 4);
    if (palette.length < entries * 4) {
      throw new DecodeError("Truncated bitmap palette");
    }
  }

  const pixels = Buffer.alloc(width * height * channels);
  for (let y = 0; y < height; y++) {
    const sourceRow = topDown ? y : height - 1 - y;
    const rowStart = pixelOffset + sourceRow * stride;
    for (let x = 0; x < width; x++) {
      const target = (y * width + x) * channels;
      let source: number;
      let table: Buffer;
      if (palette) {
        source = buffer[rowStart + x] * 4;
        table = palette;
        if (source + 2 >= palette.length) {
          throw new DecodeError("Palette index out of range");
        }
      } else {
        source = rowStart + x * (bitCount / 8);
        table = buffer;
      }
      pixels[target] = table[source + 2];
      pixels[target + 1] = table[source + 1];
      pixels[target + 2] = table[source];
      if (hasAlpha) {
        pixels[target + 3] = table[source + 3];
      }
    }
  }

  return {
    pixels,
    width,
    height,
    channels,
    colorMode: palette ? "palette" : hasAlpha ? "rgba" : "rgb",
    sourceFormat: "BMP",
  };
}

/**
 * Encodes raw pixels as a bottom-up bitmap: 24-bit without alpha, 32-bit with
 * a V4 header and an alpha mask otherwise. Grey input is expanded.
 */
export function encodeBmp(image: Pick<DecodedImage, "pixels" | "width" | "height" | "channels">): Buffer {
  const { pixels, width, height, channels } = image;
  if (pixels.length !== width * height * channels) {
    throw new RangeError("Pixel buffer does not match image dimensions");
  }

  const withAlpha = channels === 2 || channels === 4;
  const bitCount = withAlpha ? 32 : 24;
  const headerSize = withAlpha ? V4_HEADER_SIZE : INFO_HEADER_SIZE;
  const stride = rowStride(bitCount, width);
  const imageSize = stride * height;
  const pixelOffset = FILE_HEADER_SIZE + headerSize;
  const output = Buffer.alloc(pixelOffset + imageSize);

  output.write("BM", 0, "ascii");
  output.writeUInt32LE(output.length, 2);
  output.writeUInt32LE(pixelOffset, 10);

  output.writeUInt32LE(headerSize, 14);
  output.writeInt32LE(width, 18);
  output.writeInt32LE(height, 22);
  output.writeUInt16LE(1, 26);
  output.writeUInt16LE(bitCount, 28);
  output.writeUInt32LE(withAlpha ? BI_BITFIELDS : BI_RGB, 30);
  output.writeUInt32LE(imageSize, 34);
  output.writeInt32LE(PIXELS_PER_METRE, 38);
  output.writeInt32LE(PIXELS_PER_METRE, 42);
  if (withAlpha) {
    output.writeUInt32LE(0x00ff0000, 54);
    output.writeUInt32LE(0x0000ff00, 58);
    output.writeUInt32LE(0x000000ff, 62);
    output.writeUInt32LE(0xff000000, 66);
    output.writeUInt32LE(LCS_SRGB, 70);
  }

  const bytesPerPixel = bitCount / 8;
  for (let y = 0; y < height; y++) {
    const rowStart = pixelOffset + (height - 1 - y) * stride;
    for (let x = 0; x < width; x++) {
      const source = (y * width + x) * channels;
      const target = rowStart + x * bytesPerPixel;
      const grey = channels <= 2;
      const red = pixels[source];
      const green = grey ? red : pixels[source + 1];
      const blue = grey ? red : pixels[source + 2];
      output[target] = blue;
      output[target + 1] = green;
      output[target + 2] = red;
      if (withAlpha) {
        output[target + 3] = pixels[source + channels - 1];
      }
    }
  }

  return output;
}
