import { describe, test, expect } from "vitest";
import {
  buildAssStyleHeader,
  buildAssStyleLine,
  CAPTION_STYLE_NAME,
  createTextStyle,
  defaultCaptionStyle,
  hexToASSColor,
} from "./text-style.model";

describe("Text style model", () => {
  describe("hexToASSColor", () => {
    test("should reorder #RRGGBB into ASS blue-green-red", () => {
      expect(hexToASSColor("#FF8800")).toBe("&H000088FF");
    });

    test("should accept hex without a leading hash", () => {
      expect(hexToASSColor("00ff00")).toBe("&H0000FF00");
    });

    test("should pad a six digit ASS colour with an opaque alpha", () => {
      expect(hexToASSColor("&HFFFFFF")).toBe("&H00FFFFFF");
    });

    test("should keep an eight digit ASS colour and uppercase it", () => {
      expect(hexToASSColor("&h80112233&")).toBe("&H80112233");
    });

    test("should reject colour names", () => {
      expect(() => hexToASSColor("red")).toThrow('Unrecognised colour "red"');
    });
  });

  describe("createTextStyle", () => {
    test("should apply defaults", () => {
      const style = createTextStyle();
      expect(style.name).toBe("subtitle_style");
      expect(style.font).toBe("Arial");
      expect(style.fontSize).toBe(20);
      expect(style.outlineWidth).toBe(1);
      expect(style.alignment).toBe("bottom-center");
      expect(style.marginV).toBe(10);
    });

    test("should derive outline width from the font size", () => {
      expect(createTextStyle({ fontSize: 45 }).outlineWidth).toBe(2);
    });

    test("should reject a style name containing a comma", () => {
      expect(() => createTextStyle({ name: "a,b" })).toThrow("must be non-empty and contain no commas");
    });

    test("should reject a font containing a comma", () => {
      expect(() => createTextStyle({ font: "Arial,Bold" })).toThrow(
        'Text style font "Arial,Bold" must be non-empty and contain no commas'
      );
    });

    test("should reject a non-positive font size", () => {
      expect(() => createTextStyle({ fontSize: 0 })).toThrow("fontSize must be positive");
    });
  });

  describe("defaultCaptionStyle", () => {
    test("should take font and size from the subtitle style and anchor top-left", () => {
      const caption = defaultCaptionStyle(createTextStyle({ font: "Impact", fontSize: 40 }));
      expect(caption.name).toBe(CAPTION_STYLE_NAME);
      expect(caption.font).toBe("Impact");
      expect(caption.fontSize).toBe(40);
      expect(caption.alignment).toBe("top-left");
      expect(caption.marginL).toBe(15);
      expect(caption.marginV).toBe(10);
    });

    test("should keep the caption style name even when overridden", () => {
      const caption = defaultCaptionStyle(createTextStyle(), { name: "other", bold: true });
      expect(caption.name).toBe(CAPTION_STYLE_NAME);
      expect(caption.bold).toBe(true);
    });
  });

  describe("ASS style lines", () => {
    test("should build the default style line", () => {
      expect(buildAssStyleLine(createTextStyle())).toBe(
        "Style: subtitle_style,Arial,20,&H00FFFFFF,&H00000000,&H00000000,&H00000000,0,0,0,0,100,100,0,0,1,1,0,2,0,0,10,1"
      );
    });

    test("should encode flags and alignment", () => {
      const line = buildAssStyleLine(
        createTextStyle({ name: "x", bold: true, italic: true, shadow: true, alignment: "top-right", marginL: 5 })
      );
      expect(line).toBe(
        "Style: x,Arial,20,&H00FFFFFF,&H00000000,&H00000000,&H00000000,1,1,0,0,100,100,0,0,1,1,1,9,5,0,10,1"
      );
    });

    test("should start the header with the section name", () => {
      expect(buildAssStyleHeader().split("\n")[0]).toBe("[V4+ Styles]");
    });
  });
});
