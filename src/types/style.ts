/**
 * Style document types.
 *
 * Per-element overrides are optional per sub-style: an override may set
 * only `pressed`, only `loose`, both, or neither. Missing halves inherit
 * from the style's defaults at lookup time.
 */

/** Float channels, conventionally 0–255. */
export interface Rgb {
  red: number;
  green: number;
  blue: number;
}

export const FontStyle = {
  Bold: 0b0001,
  Italic: 0b0010,
  Underline: 0b0100,
  Strikethrough: 0b1000,
} as const;

export const FONT_STYLE_MASK = 0b1111;

export interface Font {
  family: string;
  size: number;
  /** Bitfield of {@link FontStyle} flags. */
  style: number;
}

export interface KeySubStyle {
  background: Rgb;
  text: Rgb;
  outline: Rgb;
  showOutline: boolean;
  outlineWidth: number;
  font: Font;
  backgroundImageFileName?: string | null;
}

export interface DefaultKeyStyle {
  loose: KeySubStyle;
  pressed: KeySubStyle;
}

export interface KeyStyle {
  kind: 'KeyStyle';
  loose?: KeySubStyle | null;
  pressed?: KeySubStyle | null;
}

export interface MouseSpeedIndicatorStyle {
  innerColor: Rgb;
  outerColor: Rgb;
  outlineWidth: number;
}

export interface MouseSpeedIndicatorStyleOverride extends MouseSpeedIndicatorStyle {
  kind: 'MouseSpeedIndicatorStyle';
}

export type ElementStyle = KeyStyle | MouseSpeedIndicatorStyleOverride;

export interface ElementStyleEntry {
  key: number;
  value: ElementStyle;
}

export interface Style {
  backgroundColor: Rgb;
  backgroundImageFileName?: string | null;
  defaultKeyStyle: DefaultKeyStyle;
  defaultMouseSpeedIndicatorStyle: MouseSpeedIndicatorStyle;
  /** Kept as an ordered list; duplicate keys survive a round trip. */
  elementStyles: ElementStyleEntry[];
}

export const BLACK: Rgb = { red: 0, green: 0, blue: 0 };
export const WHITE: Rgb = { red: 255, green: 255, blue: 255 };
export const DEFAULT_GRAY: Rgb = { red: 100, green: 100, blue: 100 };

const DEFAULT_OUTLINE: Rgb = { red: 0, green: 255, blue: 0 };

export function defaultFont(): Font {
  return { family: 'Courier New', size: 10, style: 0 };
}

export function defaultStyle(): Style {
  return {
    backgroundColor: { red: 0, green: 0, blue: 100 },
    defaultKeyStyle: {
      loose: {
        background: { ...DEFAULT_GRAY },
        text: { ...BLACK },
        outline: { ...DEFAULT_OUTLINE },
        showOutline: false,
        outlineWidth: 1,
        font: defaultFont(),
      },
      pressed: {
        background: { ...WHITE },
        text: { ...BLACK },
        outline: { ...DEFAULT_OUTLINE },
        showOutline: false,
        outlineWidth: 1,
        font: defaultFont(),
      },
    },
    defaultMouseSpeedIndicatorStyle: {
      innerColor: { ...DEFAULT_GRAY },
      outerColor: { ...WHITE },
      outlineWidth: 1,
    },
    elementStyles: [],
  };
}
