import sharp from "sharp";
import { describe, expect, it } from "vitest";
import { DecodeError } from "../utils/error";
import { decodeBmp } from "./bmp";
import { requiredColorMode } from "./colorMode";
import { SharpImageCodec } from "./imageCodec";

function transparentPng(): Promise<Buffer> {
  return sharp({
    create: {
      width: 4,
      height: 3,
      channels: 4,
      background: { r: 200, g: 50, b: 25, alpha: 0.5 },
    },
  })
    .png()
    .toBuffer();
}

function opaqueImage(): sharp.Sharp {
  return sharp({
    create: {
      width: 4,
      height: 3,
      channels: 3,
      background: { r: 10, g: 120, b: 240 },
    },
  });
}

describe("SharpImageCodec", () => {
  const codec = new SharpImageCodec();

  it("decodes a transparent PNG to RGBA pixels", async () => {
    const decoded = await codec.decode(await transparentPng());

    expect(decoded.width).toBe(4);
    expect(decoded.height).toBe(3);
    expect(decoded.channels).toBe(4);
    expect(decoded.colorMode).toBe("rgba");
    expect(decoded.sourceFormat).toBe("PNG");
    expect(decoded.pixels.length).toBe(4 * 3 * 4);
  });

  it("flattens an alpha source before encoding JPEG", async () => {
    const decoded = await codec.decode(await transparentPng());
    const mode = requiredColorMode(decoded.colorMode, "JPEG");
    expect(mode).toBe("rgb");

    const flattened = await codec.convertColorMode(decoded, "rgb");
    expect(flattened.channels).toBe(3);
    expect(flattened.colorMode).toBe("rgb");

    const output = await codec.encode(flattened, "JPEG");
    const metadata = await sharp(output).metadata();
    expect(metadata.format).toBe("jpeg");
    expect(metadata.channels).toBe(3);
    expect(metadata.hasAlpha).toBe(false);
  });

  it("promotes grey sources to RGBA", async () => {
    const grey = await opaqueImage().toColourspace("b-w").png().toBuffer();
    const decoded = await codec.decode(grey);
    expect(decoded.colorMode).toBe("grey");
    expect(decoded.channels).toBe(1);

    const promoted = await codec.convertColorMode(decoded, "rgba");
    expect(promoted.channels).toBe(4);
    expect(promoted.colorMode).toBe("rgba");

    const output = await codec.encode(promoted, "WEBP");
    expect((await sharp(output).metadata()).format).toBe("webp");
  });

  it("decodes 16-bit grey sources as grey", async () => {
    const grey16 = await opaqueImage().toColourspace("grey16").png().toBuffer();

    const decoded = await codec.decode(grey16);

    expect(decoded.colorMode).toBe("grey");
    expect(decoded.channels).toBe(1);
  });

  it("reports indexed PNG sources as palette images", async () => {
    const indexed = await opaqueImage().png({ palette: true }).toBuffer();

    const decoded = await codec.decode(indexed);

    expect(decoded.colorMode).toBe("palette");
    expect(decoded.sourceFormat).toBe("PNG");
  });

  it("reports GIF sources as palette images", async () => {
    const gif = await opaqueImage().gif().toBuffer();
    const decoded = await codec.decode(gif);

    expect(decoded.colorMode).toBe("palette");
    expect(decoded.sourceFormat).toBe("GIF");
  });

  it("encodes every target format", async () => {
    const decoded = await codec.decode(await opaqueImage().png().toBuffer());

    for (const format of ["JPEG", "PNG", "WEBP", "GIF", "TIFF", "AVIF"] as const) {
      const output = await codec.encode(decoded, format);
      expect(output.length).toBeGreaterThan(0);
      expect(await codec.probe(output)).toBe(format);
    }
  });

  it("writes and reads BMP without sharp support for it", async () => {
    const decoded = await codec.decode(await opaqueImage().png().toBuffer());
    const bmp = await codec.encode(decoded, "BMP");

    expect(await codec.probe(bmp)).toBe("BMP");
    const roundTrip = decodeBmp(bmp);
    expect(roundTrip.width).toBe(4);
    expect([...roundTrip.pixels.subarray(0, 3)]).toEqual([10, 120, 240]);

    const viaCodec = await codec.decode(bmp);
    expect(viaCodec.sourceFormat).toBe("BMP");
  });

  it("rejects unreadable input", async () => {
    await expect(codec.decode(Buffer.alloc(0))).rejects.toBeInstanceOf(DecodeError);
    await expect(codec.decode(Buffer.from("definitely not an image"))).rejects.toBeInstanceOf(
      DecodeError
    );
    expect(await codec.probe(Buffer.from("definitely not an image"))).toBeNull();
  });

  it("passes its own self-test", async () => {
    await expect(codec.validateCodec()).resolves.toBeUndefined();
  });
});
