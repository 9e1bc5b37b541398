/**
 * Layout JSON codec.
 *
 * The legacy format flattens tagged unions: `__type` sits beside the
 * variant's own fields instead of wrapping them. Decoding therefore reads
 * the tag first and then validates the whole object against that
 * variant's flat schema. `MouseKey` and `MouseScroll` share a schema but
 * never share a variant.
 */
import { z } from 'zod';
import type { BoardElement, KeyDefinition, Layout } from '../types/board';
import {
    PointJsonSchema,
    decodePoint,
    encodePoint,
    finiteNumber,
    isRecord,
    parseJsonText,
    parseWith,
    u32,
    type PointJson,
} from './common';
import { SchemaError, joinPath } from './errors';

/* ------------------------------------------------------------------ */
/*  Wire schemas                                                      */
/* ------------------------------------------------------------------ */

const keyFields = {
    Id: u32,
    Boundaries: z.array(PointJsonSchema),
    TextPosition: PointJsonSchema,
    KeyCodes: z.array(u32),
    Text: z.string(),
};

const KeyboardKeyJsonSchema = z.object({
    ...keyFields,
    ShiftText: z.string(),
    ChangeOnCaps: z.boolean(),
});

const MouseKeyJsonSchema = z.object(keyFields);

const MouseSpeedIndicatorJsonSchema = z.object({
    Id: u32,
    Location: PointJsonSchema,
    Radius: finiteNumber.positive(),
});

const LayoutJsonSchema = z.object({
    $schema: z.string().optional(),
    Version: z.number().int().min(0).max(255).nullish(),
    Width: finiteNumber.positive(),
    Height: finiteNumber.positive(),
    Elements: z.array(z.unknown()),
});

interface KeyJsonFields {
    Id: number;
    Boundaries: PointJson[];
    TextPosition: PointJson;
    KeyCodes: number[];
    Text: string;
}

export type ElementJson =
    | ({ __type: 'KeyboardKey' } & KeyJsonFields & { ShiftText: string; ChangeOnCaps: boolean })
    | ({ __type: 'MouseKey' } & KeyJsonFields)
    | ({ __type: 'MouseScroll' } & KeyJsonFields)
    | { __type: 'MouseSpeedIndicator'; Id: number; Location: PointJson; Radius: number };

export interface LayoutJson {
    Version?: number | null;
    Width: number;
    Height: number;
    Elements: ElementJson[];
    $schema?: string;
}

export const ELEMENT_TAGS = ['KeyboardKey', 'MouseKey', 'MouseScroll', 'MouseSpeedIndicator'] as const;

/* ------------------------------------------------------------------ */
/*  Decode                                                            */
/* ------------------------------------------------------------------ */

function decodeKeyFields(json: z.infer<typeof MouseKeyJsonSchema>): KeyDefinition {
    return {
        id: json.Id,
        boundaries: json.Boundaries.map(decodePoint),
        textPosition: decodePoint(json.TextPosition),
        keyCodes: [...json.KeyCodes],
        text: json.Text,
    };
}

export function decodeElement(raw: unknown, path = ''): BoardElement {
    if (!isRecord(raw)) {
        throw new SchemaError('Expected an object', path);
    }

    const tag = raw.__type;
    switch (tag) {
        case 'KeyboardKey': {
            const json = parseWith(KeyboardKeyJsonSchema, raw, path);
            return {
                kind: 'KeyboardKey',
                ...decodeKeyFields(json),
                shiftText: json.ShiftText,
                changeOnCaps: json.ChangeOnCaps,
            };
        }
        case 'MouseKey':
            return { kind: 'MouseKey', ...decodeKeyFields(parseWith(MouseKeyJsonSchema, raw, path)) };
        case 'MouseScroll':
            return { kind: 'MouseScroll', ...decodeKeyFields(parseWith(MouseKeyJsonSchema, raw, path)) };
        case 'MouseSpeedIndicator': {
            const json = parseWith(MouseSpeedIndicatorJsonSchema, raw, path);
            return {
                kind: 'MouseSpeedIndicator',
                id: json.Id,
                location: decodePoint(json.Location),
                radius: json.Radius,
            };
        }
        case undefined:
            throw new SchemaError('Required', joinPath(path, '__type'));
        default:
            throw new SchemaError(`Unknown element type ${JSON.stringify(tag)}`, joinPath(path, '__type'));
    }
}

export function decodeLayout(raw: unknown): Layout {
    const json = parseWith(LayoutJsonSchema, raw, '');

    const elements: BoardElement[] = [];
    const seen = new Map<number, number>();
    json.Elements.forEach((entry, index) => {
        const path = joinPath('Elements', index);
        const element = decodeElement(entry, path);
        const previous = seen.get(element.id);
        if (previous !== undefined) {
            throw new SchemaError(
                `Duplicate element id ${element.id} (first used by Elements[${previous}])`,
                joinPath(path, 'Id'),
            );
        }
        seen.set(element.id, index);
        elements.push(element);
    });

    const layout: Layout = {
        width: json.Width,
        height: json.Height,
        elements,
    };
    if (json.Version !== undefined) layout.version = json.Version;
    if (json.$schema !== undefined) layout.schemaUrl = json.$schema;
    return layout;
}

export function parseLayoutJson(text: string): Layout {
    return decodeLayout(parseJsonText(text));
}

/* ------------------------------------------------------------------ */
/*  Encode                                                            */
/* ------------------------------------------------------------------ */

function encodeKeyFields(element: KeyDefinition): KeyJsonFields {
    return {
        Id: element.id,
        Boundaries: element.boundaries.map(encodePoint),
        TextPosition: encodePoint(element.textPosition),
        KeyCodes: [...element.keyCodes],
        Text: element.text,
    };
}

export function encodeElement(element: BoardElement): ElementJson {
    switch (element.kind) {
        case 'KeyboardKey':
            return {
                __type: 'KeyboardKey',
                ...encodeKeyFields(element),
                ShiftText: element.shiftText,
                ChangeOnCaps: element.changeOnCaps,
            };
        case 'MouseKey':
            return { __type: 'MouseKey', ...encodeKeyFields(element) };
        case 'MouseScroll':
            return { __type: 'MouseScroll', ...encodeKeyFields(element) };
        case 'MouseSpeedIndicator':
            return {
                __type: 'MouseSpeedIndicator',
                Id: element.id,
                Location: encodePoint(element.location),
                Radius: element.radius,
            };
    }
}

export function encodeLayout(layout: Layout): LayoutJson {
    const json: LayoutJson = {
        Width: layout.width,
        Height: layout.height,
        Elements: layout.elements.map(encodeElement),
    };
    // Rebuild so `Version` keeps its leading position when present.
    const ordered: LayoutJson =
        layout.version !== undefined ? { Version: layout.version, ...json } : json;
    if (layout.schemaUrl !== undefined) ordered.$schema = layout.schemaUrl;
    return ordered;
}

export function stringifyLayout(layout: Layout): string {
    return JSON.stringify(encodeLayout(layout), null, 2);
}
