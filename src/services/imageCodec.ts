import sharp from "sharp";
import { DecodedImage, isTargetFormat, TARGET_FORMATS, TargetFormat } from "../models";
import {
  DecodeError,
  EncodeError,
  ImageProcessingError,
  toError,
} from "../utils/error";
import logger from "../utils/logger";
import { decodeBmp, encodeBmp, isBmp } from "./bmp";
import { colorModeForChannels, NormalizedColorMode, requiredColorMode } from "./colorMode";

export interface ImageCodec {
  /** Display name of the detected format (`JPEG`, `PNG`...), or null. */
  probe(input: Buffer): Promise<string | null>;
  decode(input: Buffer): Promise<DecodedImage>;
  convertColorMode(image: DecodedImage, mode: NormalizedColorMode): Promise<DecodedImage>;
  encode(image: DecodedImage, format: TargetFormat): Promise<Buffer>;
}

function displayFormat(metadata: sharp.Metadata): string | null {
  if (!metadata.format) {
    return null;
  }
  if (metadata.format === "heif" && metadata.compression === "av1") {
    return "AVIF";
  }
  return metadata.format.toUpperCase();
}

export class SharpImageCodec implements ImageCodec {
  async probe(input: Buffer): Promise<string | null> {
    if (isBmp(input)) {
      return "BMP";
    }
    try {
      const metadata = await sharp(input).metadata();
      return displayFormat(metadata);
    } catch (error) {
      logger.debug("Unable to probe image format", {
        operation: "codec.probe",
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async decode(input: Buffer): Promise<DecodedImage> {
    this.validateInput(input);
    if (isBmp(input)) {
      return decodeBmp(input);
    }

    try {
      const metadata = await sharp(input).metadata();
      if (!metadata.format) {
        throw new DecodeError("Unable to determine image format");
      }
      if (!metadata.width || !metadata.height || metadata.width <= 0 || metadata.height <= 0) {
        throw new DecodeError("Invalid image dimensions");
      }

      // Decode to 8-bit sRGB, or 8-bit grey for single-band sources
      const grey = metadata.space === "b-w" || metadata.channels === 1 || metadata.channels === 2;
      const { data, info } = await sharp(input)
        .toColourspace(grey ? "b-w" : "srgb")
        .raw()
        .toBuffer({ resolveWithObject: true });

      const palette =
        ("paletteBitDepth" in metadata && metadata.paletteBitDepth !== undefined) ||
        metadata.format === "gif";
      return {
        pixels: data,
        width: info.width,
        height: info.height,
        channels: info.channels,
        colorMode: palette ? "palette" : colorModeForChannels(info.channels),
        sourceFormat: displayFormat(metadata) ?? metadata.format,
      };
    } catch (error) {
      if (error instanceof ImageProcessingError) {
        throw error;
      }
      throw new DecodeError(
        `Unable to decode image: ${error instanceof Error ? error.message : "Unknown error"}`,
        toError(error)
      );
    }
  }

  async convertColorMode(image: DecodedImage, mode: NormalizedColorMode): Promise<DecodedImage> {
    try {
      let pipeline = this.fromRaw(image).toColourspace("srgb");
      pipeline = mode === "rgb" ? pipeline.removeAlpha() : pipeline.ensureAlpha();
      const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
      const expected = mode === "rgb" ? 3 : 4;
      if (info.channels !== expected) {
        throw new EncodeError(`expected ${expected} channels after colour conversion, got ${info.channels}`);
      }
      return {
        ...image,
        pixels: data,
        channels: info.channels,
        colorMode: colorModeForChannels(info.channels),
      };
    } catch (error) {
      if (error instanceof ImageProcessingError) {
        throw error;
      }
      throw new EncodeError(
        error instanceof Error ? error.message : "Unknown error",
        toError(error)
      );
    }
  }

  async encode(image: DecodedImage, format: TargetFormat): Promise<Buffer> {
    try {
      if (format === "BMP") {
        return encodeBmp(image);
      }
      const pipeline = this.fromRaw(image);
      switch (format) {
        case "JPEG":
          return await pipeline.jpeg().toBuffer();
        case "PNG":
          return await pipeline.png().toBuffer();
        case "WEBP":
          return await pipeline.webp().toBuffer();
        case "GIF":
          return await pipeline.gif().toBuffer();
        case "TIFF":
          return await pipeline.tiff().toBuffer();
        case "AVIF":
          return await pipeline.avif().toBuffer();
      }
    } catch (error) {
      if (error instanceof ImageProcessingError) {
        throw error;
      }
      throw new EncodeError(
        error instanceof Error ? error.message : "Unknown error",
        toError(error)
      );
    }
  }

  /**
   * Round-trips a generated semi-transparent image through every target format.
   */
  async validateCodec(): Promise<void> {
    try {
      const testBuffer = await sharp({
        create: {
          width: 10,
          height: 10,
          channels: 4,
          background: { r: 255, g: 255, b: 255, alpha: 0.5 },
        },
      })
        .png()
        .toBuffer();

      const decoded = await this.decode(testBuffer);
      if (decoded.width !== 10 || decoded.height !== 10) {
        throw new Error("Image decoding returned wrong dimensions");
      }

      for (const format of Object.keys(TARGET_FORMATS)) {
        if (!isTargetFormat(format)) continue;
        const mode = requiredColorMode(decoded.colorMode, format);
        const prepared = mode ? await this.convertColorMode(decoded, mode) : decoded;
        const output = await this.encode(prepared, format);
        if (output.length === 0) {
          throw new Error(`${format} encoding produced no output`);
        }
        await this.decode(output);
      }
    } catch (error) {
      throw new ImageProcessingError(
        `Image codec validation failed: ${
          error instanceof Error ? error.message : "Unknown error"
        }`,
        toError(error)
      );
    }
  }

  private validateInput(input: Buffer): void {
    if (!input || input.length === 0) {
      throw new DecodeError("Empty or invalid buffer");
    }
  }

  private fromRaw(image: DecodedImage): sharp.Sharp {
    return sharp(image.pixels, {
      raw: {
        width: image.width,
        height: image.height,
        channels: image.channels,
      },
    });
  }
}
