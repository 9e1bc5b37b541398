import { z } from 'zod';
import type { Point } from '../types/board';
import type { Rgb } from '../types/style';
import { SchemaError, firstIssue, formatIssuePath } from './errors';

export const finiteNumber = z.number().finite();

export const u32 = z.number().int().min(0).max(0xffffffff);

export const PointJsonSchema = z.object({
    X: finiteNumber,
    Y: finiteNumber,
});

export type PointJson = z.infer<typeof PointJsonSchema>;

export const RgbJsonSchema = z.object({
    Red: finiteNumber,
    Green: finiteNumber,
    Blue: finiteNumber,
});

export type RgbJson = z.infer<typeof RgbJsonSchema>;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validate `raw` against `schema`, reporting the first issue under `base`. */
export function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown, base: string): z.output<T> {
    const result = schema.safeParse(raw);
    if (!result.success) {
        const issue = firstIssue(result.error.issues);
        throw new SchemaError(issue.message, formatIssuePath(issue.path, base));
    }
    return result.data;
}

export function parseJsonText(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new SchemaError(`Invalid JSON: ${reason}`);
    }
}

export function decodePoint(json: PointJson): Point {
    return { x: json.X, y: json.Y };
}

export function encodePoint(point: Point): PointJson {
    return { X: point.x, Y: point.y };
}

export function decodeRgb(json: RgbJson): Rgb {
    return { red: json.Red, green: json.Green, blue: json.Blue };
}

export function encodeRgb(color: Rgb): RgbJson {
    return { Red: color.red, Green: color.green, Blue: color.blue };
}
