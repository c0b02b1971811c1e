import { describe, expect, it } from "vitest";
import { colorModeForChannels, requiredColorMode } from "./colorMode";

describe("requiredColorMode", () => {
  it("flattens alpha and palette sources for JPEG", () => {
    expect(requiredColorMode("rgba", "JPEG")).toBe("rgb");
    expect(requiredColorMode("grey-alpha", "JPEG")).toBe("rgb");
    expect(requiredColorMode("palette", "JPEG")).toBe("rgb");
    expect(requiredColorMode("rgb", "JPEG")).toBeNull();
    expect(requiredColorMode("grey", "JPEG")).toBeNull();
  });

  it("promotes anything that is not RGB or RGBA for WEBP and AVIF", () => {
    for (const format of ["WEBP", "AVIF"] as const) {
      expect(requiredColorMode("grey", format)).toBe("rgba");
      expect(requiredColorMode("grey-alpha", format)).toBe("rgba");
      expect(requiredColorMode("palette", format)).toBe("rgba");
      expect(requiredColorMode("rgb", format)).toBeNull();
      expect(requiredColorMode("rgba", format)).toBeNull();
    }
  });

  it("passes pixels through for the other formats", () => {
    for (const format of ["PNG", "GIF", "TIFF", "BMP"] as const) {
      expect(requiredColorMode("rgba", format)).toBeNull();
      expect(requiredColorMode("palette", format)).toBeNull();
      expect(requiredColorMode("grey", format)).toBeNull();
    }
  });

  it("maps channel counts to colour modes", () => {
    expect(colorModeForChannels(1)).toBe("grey");
    expect(colorModeForChannels(2)).toBe("grey-alpha");
    expect(colorModeForChannels(3)).toBe("rgb");
    expect(colorModeForChannels(4)).toBe("rgba");
  });
});
