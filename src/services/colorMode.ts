import { Channels, ColorMode, TargetFormat } from "../models";

export type NormalizedColorMode = "rgb" | "rgba";

/**
 * Colour mode an image must be converted to before it is encoded as
 * `format`, or null when the pixels can be encoded as they are.
 *
 * JPEG cannot carry alpha or a palette, so those sources are flattened to
 * RGB. WEBP and AVIF encoders are given RGB or RGBA only; anything else is
 * promoted to RGBA.
 */
export function requiredColorMode(mode: ColorMode, format: TargetFormat): NormalizedColorMode | null {
  switch (format) {
    case "JPEG":
      return mode === "rgba" || mode === "grey-alpha" || mode === "palette" ? "rgb" : null;
    case "WEBP":
    case "AVIF":
      return mode === "rgb" || mode === "rgba" ? null : "rgba";
    default:
      return null;
  }
}

export function colorModeForChannels(channels: Channels): ColorMode {
  switch (channels) {
    case 1:
      return "grey";
    case 2:
      return "grey-alpha";
    case 3:
      return "rgb";
    case 4:
      return "rgba";
  }
}
