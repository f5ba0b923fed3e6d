/**
 * Text styles for burned-in subtitles and captions (ASS V4+ styles)
 */

import { ConfigurationError } from "../lib/errors";

export const TEXT_ALIGNMENTS = [
  "bottom-left",
  "bottom-center",
  "bottom-right",
  "middle-left",
  "middle-center",
  "middle-right",
  "top-left",
  "top-center",
  "top-right",
] as const;

export type TextAlignment = (typeof TEXT_ALIGNMENTS)[number];

// Numpad layout used by the ASS `Alignment` field
export const ASS_ALIGNMENT: Record<TextAlignment, number> = {
  "bottom-left": 1,
  "bottom-center": 2,
  "bottom-right": 3,
  "middle-left": 4,
  "middle-center": 5,
  "middle-right": 6,
  "top-left": 7,
  "top-center": 8,
  "top-right": 9,
};

export interface TextStyle {
  readonly name: string;
  readonly font: string;
  readonly fontSize: number;
  /** ASS colour, &HAABBGGRR */
  readonly color: string;
  readonly outlineColor: string;
  readonly outlineWidth: number;
  readonly bold: boolean;
  readonly italic: boolean;
  readonly shadow: boolean;
  readonly alignment: TextAlignment;
  readonly marginL: number;
  readonly marginR: number;
  readonly marginV: number;
}

export interface TextStyleInput {
  name?: string;
  font?: string;
  fontSize?: number;
  color?: string;
  outlineColor?: string;
  outlineWidth?: number;
  bold?: boolean;
  italic?: boolean;
  shadow?: boolean;
  alignment?: TextAlignment;
  marginL?: number;
  marginR?: number;
  marginV?: number;
}

export const SUBTITLE_STYLE_NAME = "subtitle_style";
export const CAPTION_STYLE_NAME = "caption_style";

const DEFAULT_FONT = "Arial";
const DEFAULT_FONT_SIZE = 20;

/**
 * Convert hex color (#RRGGBB) or ASS color (&HBBGGRR / &HAABBGGRR) to &HAABBGGRR
 */
export function hexToASSColor(color: string): string {
  const hex = /^#?([0-9a-fA-F]{6})$/.exec(color);
  if (hex) {
    const clean = hex[1];
    const r = clean.substring(0, 2);
    const g = clean.substring(2, 4);
    const b = clean.substring(4, 6);
    return `&H00${b}${g}${r}`.toUpperCase();
  }

  const ass = /^&H([0-9a-fA-F]{6}|[0-9a-fA-F]{8})&?$/i.exec(color);
  if (ass) {
    return `&H${ass[1].padStart(8, "0")}`.toUpperCase();
  }

  throw new ConfigurationError(`Unrecognised colour "${color}", expected #RRGGBB or &HAABBGGRR`);
}

function assertNonNegative(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`Text style ${field} must be a non-negative number, got ${value}`);
  }
}

export function createTextStyle(input: TextStyleInput = {}): TextStyle {
  const fontSize = input.fontSize ?? DEFAULT_FONT_SIZE;
  if (!Number.isFinite(fontSize) || fontSize <= 0) {
    throw new ConfigurationError(`Text style fontSize must be positive, got ${fontSize}`);
  }

  const name = input.name ?? SUBTITLE_STYLE_NAME;
  if (!/^[^,\r\n]+$/.test(name)) {
    throw new ConfigurationError(`Text style name "${name}" must be non-empty and contain no commas`);
  }

  // Both go into comma-separated fields of the Style: line
  const font = input.font ?? DEFAULT_FONT;
  if (!/^[^,\r\n]+$/.test(font)) {
    throw new ConfigurationError(`Text style font "${font}" must be non-empty and contain no commas`);
  }

  const style: TextStyle = {
    name,
    font,
    fontSize,
    color: hexToASSColor(input.color ?? "#FFFFFF"),
    outlineColor: hexToASSColor(input.outlineColor ?? "#000000"),
    outlineWidth: input.outlineWidth ?? Math.floor(fontSize / 20),
    bold: input.bold ?? false,
    italic: input.italic ?? false,
    shadow: input.shadow ?? false,
    alignment: input.alignment ?? "bottom-center",
    marginL: input.marginL ?? 0,
    marginR: input.marginR ?? 0,
    marginV: input.marginV ?? 10,
  };

  assertNonNegative(style.outlineWidth, "outlineWidth");
  assertNonNegative(style.marginL, "marginL");
  assertNonNegative(style.marginR, "marginR");
  assertNonNegative(style.marginV, "marginV");

  return Object.freeze(style);
}

/**
 * Caption style derived from the subtitle style: same font size, anchored top-left
 */
export function defaultCaptionStyle(subtitleStyle: TextStyle, overrides: TextStyleInput = {}): TextStyle {
  return createTextStyle({
    font: subtitleStyle.font,
    fontSize: subtitleStyle.fontSize,
    alignment: "top-left",
    marginL: 15,
    marginR: 0,
    marginV: 10,
    ...overrides,
    name: CAPTION_STYLE_NAME,
  });
}

export function buildAssStyleHeader(): string {
  return [
    "[V4+ Styles]",
    "Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding",
  ].join("\n");
}

export function buildAssStyleLine(style: TextStyle): string {
  const flag = (value: boolean) => (value ? 1 : 0);
  return (
    `Style: ${style.name},${style.font},${style.fontSize},${style.color},&H00000000,` +
    `${style.outlineColor},&H00000000,${flag(style.bold)},${flag(style.italic)},0,0,100,100,0,0,1,` +
    `${style.outlineWidth},${flag(style.shadow)},${ASS_ALIGNMENT[style.alignment]},` +
    `${style.marginL},${style.marginR},${style.marginV},1`
  );
}
