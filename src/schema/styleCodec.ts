import { z } from 'zod';
import {
    FONT_STYLE_MASK,
    type ElementStyle,
    type ElementStyleEntry,
    type Font,
    type KeyStyle,
    type KeySubStyle,
    type MouseSpeedIndicatorStyle,
    type Style,
} from '../types/style';
import {
    RgbJsonSchema,
    decodeRgb,
    encodeRgb,
    finiteNumber,
    isRecord,
    parseJsonText,
    parseWith,
    u32,
    type RgbJson,
} from './common';
import { SchemaError, joinPath } from './errors';

/* ------------------------------------------------------------------ */
/*  Wire schemas                                                      */
/* ------------------------------------------------------------------ */

const FontJsonSchema = z.object({
    FontFamily: z.string(),
    Size: finiteNumber.nonnegative(),
    Style: z
        .number()
        .int()
        .min(0)
        .max(255)
        .refine((bits) => (bits & ~FONT_STYLE_MASK) === 0, { message: 'Extraneous bits set' }),
});

const KeySubStyleJsonSchema = z.object({
    Background: RgbJsonSchema,
    Text: RgbJsonSchema,
    Outline: RgbJsonSchema,
    ShowOutline: z.boolean(),
    OutlineWidth: u32,
    Font: FontJsonSchema,
    BackgroundImageFileName: z.string().nullish(),
});

const DefaultKeyStyleJsonSchema = z.object({
    Loose: KeySubStyleJsonSchema,
    Pressed: KeySubStyleJsonSchema,
});

const KeyStyleJsonSchema = z.object({
    Loose: KeySubStyleJsonSchema.nullish(),
    Pressed: KeySubStyleJsonSchema.nullish(),
});

const MouseSpeedIndicatorStyleJsonSchema = z.object({
    InnerColor: RgbJsonSchema,
    OuterColor: RgbJsonSchema,
    OutlineWidth: finiteNumber.nonnegative(),
});

const ElementStyleEntryJsonSchema = z.object({
    Key: u32,
    Value: z.unknown(),
});

const StyleJsonSchema = z.object({
    BackgroundColor: RgbJsonSchema,
    BackgroundImageFileName: z.string().nullish(),
    DefaultKeyStyle: DefaultKeyStyleJsonSchema,
    DefaultMouseSpeedIndicatorStyle: MouseSpeedIndicatorStyleJsonSchema,
    ElementStyles: z.array(z.unknown()),
});

type KeySubStyleJson = z.infer<typeof KeySubStyleJsonSchema>;
type MouseSpeedIndicatorStyleJson = z.infer<typeof MouseSpeedIndicatorStyleJsonSchema>;

export type ElementStyleJson =
    | { __type: 'KeyStyle'; Loose?: KeySubStyleJson | null; Pressed?: KeySubStyleJson | null }
    | ({ __type: 'MouseSpeedIndicatorStyle' } & MouseSpeedIndicatorStyleJson);

type KeyStyleJson = Extract<ElementStyleJson, { __type: 'KeyStyle' }>;

export interface StyleJson {
    BackgroundColor: RgbJson;
    BackgroundImageFileName?: string | null;
    DefaultKeyStyle: { Loose: KeySubStyleJson; Pressed: KeySubStyleJson };
    DefaultMouseSpeedIndicatorStyle: MouseSpeedIndicatorStyleJson;
    ElementStyles: { Key: number; Value: ElementStyleJson }[];
}

/* ------------------------------------------------------------------ */
/*  Decode                                                            */
/* ------------------------------------------------------------------ */

function decodeFont(json: KeySubStyleJson['Font']): Font {
    return { family: json.FontFamily, size: json.Size, style: json.Style };
}

function decodeKeySubStyle(json: KeySubStyleJson): KeySubStyle {
    const sub: KeySubStyle = {
        background: decodeRgb(json.Background),
        text: decodeRgb(json.Text),
        outline: decodeRgb(json.Outline),
        showOutline: json.ShowOutline,
        outlineWidth: json.OutlineWidth,
        font: decodeFont(json.Font),
    };
    if (json.BackgroundImageFileName !== undefined) {
        sub.backgroundImageFileName = json.BackgroundImageFileName;
    }
    return sub;
}

function decodeIndicatorStyle(json: MouseSpeedIndicatorStyleJson): MouseSpeedIndicatorStyle {
    return {
        innerColor: decodeRgb(json.InnerColor),
        outerColor: decodeRgb(json.OuterColor),
        outlineWidth: json.OutlineWidth,
    };
}

/** `null` and absent both mean "inherit", but each re-encodes as it was read. */
function decodeOptionalSubStyle(json: KeySubStyleJson | null | undefined): KeySubStyle | null | undefined {
    if (json === undefined || json === null) return json;
    return decodeKeySubStyle(json);
}

export function decodeElementStyle(raw: unknown, path = ''): ElementStyle {
    if (!isRecord(raw)) {
        throw new SchemaError('Expected an object', path);
    }

    const tag = raw.__type;
    switch (tag) {
        case 'KeyStyle': {
            const json = parseWith(KeyStyleJsonSchema, raw, path);
            const style: KeyStyle = { kind: 'KeyStyle' };
            const loose = decodeOptionalSubStyle(json.Loose);
            const pressed = decodeOptionalSubStyle(json.Pressed);
            if (loose !== undefined) style.loose = loose;
            if (pressed !== undefined) style.pressed = pressed;
            return style;
        }
        case 'MouseSpeedIndicatorStyle':
            return {
                kind: 'MouseSpeedIndicatorStyle',
                ...decodeIndicatorStyle(parseWith(MouseSpeedIndicatorStyleJsonSchema, raw, path)),
            };
        case undefined:
            throw new SchemaError('Required', joinPath(path, '__type'));
        default:
            throw new SchemaError(`Unknown style type ${JSON.stringify(tag)}`, joinPath(path, '__type'));
    }
}

export function decodeStyle(raw: unknown): Style {
    const json = parseWith(StyleJsonSchema, raw, '');

    const elementStyles: ElementStyleEntry[] = json.ElementStyles.map((entry, index) => {
        const path = joinPath('ElementStyles', index);
        const pair = parseWith(ElementStyleEntryJsonSchema, entry, path);
        return { key: pair.Key, value: decodeElementStyle(pair.Value, joinPath(path, 'Value')) };
    });

    const style: Style = {
        backgroundColor: decodeRgb(json.BackgroundColor),
        defaultKeyStyle: {
            loose: decodeKeySubStyle(json.DefaultKeyStyle.Loose),
            pressed: decodeKeySubStyle(json.DefaultKeyStyle.Pressed),
        },
        defaultMouseSpeedIndicatorStyle: decodeIndicatorStyle(json.DefaultMouseSpeedIndicatorStyle),
        elementStyles,
    };
    if (json.BackgroundImageFileName !== undefined) {
        style.backgroundImageFileName = json.BackgroundImageFileName;
    }
    return style;
}

export function parseStyleJson(text: string): Style {
    return decodeStyle(parseJsonText(text));
}

/* ------------------------------------------------------------------ */
/*  Encode                                                            */
/* ------------------------------------------------------------------ */

function encodeKeySubStyle(sub: KeySubStyle): KeySubStyleJson {
    const json: KeySubStyleJson = {
        Background: encodeRgb(sub.background),
        Text: encodeRgb(sub.text),
        Outline: encodeRgb(sub.outline),
        ShowOutline: sub.showOutline,
        OutlineWidth: sub.outlineWidth,
        Font: {
            FontFamily: sub.font.family,
            Size: sub.font.size,
            Style: sub.font.style,
        },
    };
    if (sub.backgroundImageFileName !== undefined) {
        json.BackgroundImageFileName = sub.backgroundImageFileName;
    }
    return json;
}

function encodeIndicatorStyle(style: MouseSpeedIndicatorStyle): MouseSpeedIndicatorStyleJson {
    return {
        InnerColor: encodeRgb(style.innerColor),
        OuterColor: encodeRgb(style.outerColor),
        OutlineWidth: style.outlineWidth,
    };
}

export function encodeElementStyle(style: ElementStyle): ElementStyleJson {
    if (style.kind === 'MouseSpeedIndicatorStyle') {
        return { __type: 'MouseSpeedIndicatorStyle', ...encodeIndicatorStyle(style) };
    }
    const json: KeyStyleJson = { __type: 'KeyStyle' };
    if (style.loose !== undefined) {
        json.Loose = style.loose === null ? null : encodeKeySubStyle(style.loose);
    }
    if (style.pressed !== undefined) {
        json.Pressed = style.pressed === null ? null : encodeKeySubStyle(style.pressed);
    }
    return json;
}

export function encodeStyle(style: Style): StyleJson {
    const head: Pick<StyleJson, 'BackgroundColor' | 'BackgroundImageFileName'> = {
        BackgroundColor: encodeRgb(style.backgroundColor),
    };
    if (style.backgroundImageFileName !== undefined) {
        head.BackgroundImageFileName = style.backgroundImageFileName;
    }
    return {
        ...head,
        DefaultKeyStyle: {
            Loose: encodeKeySubStyle(style.defaultKeyStyle.loose),
            Pressed: encodeKeySubStyle(style.defaultKeyStyle.pressed),
        },
        DefaultMouseSpeedIndicatorStyle: encodeIndicatorStyle(style.defaultMouseSpeedIndicatorStyle),
        ElementStyles: style.elementStyles.map((entry) => ({
            Key: entry.key,
            Value: encodeElementStyle(entry.value),
        })),
    };
}

export function stringifyStyle(style: Style): string {
    return JSON.stringify(encodeStyle(style), null, 2);
}
