import type { ZodIssue } from 'zod';

/** Base class for every recoverable error raised by the engine. */
export class BoardError extends Error {
    /** Dotted field path, e.g. `Elements[2].Boundaries[0].X`. Empty for the document root. */
    readonly path: string;

    constructor(message: string, path = '') {
        super(path ? `${path}: ${message}` : message);
        this.name = 'BoardError';
        this.path = path;
    }
}

/** A layout or style document failed to decode. */
export class SchemaError extends BoardError {
    constructor(message: string, path = '') {
        super(message, path);
        this.name = 'SchemaError';
    }
}

/** A settings object failed to validate. */
export class ConfigError extends BoardError {
    constructor(message: string, path = '') {
        super(message, path);
        this.name = 'ConfigError';
    }
}

export function joinPath(base: string, segment: string | number): string {
    if (typeof segment === 'number') return `${base}[${segment}]`;
    return base ? `${base}.${segment}` : segment;
}

export function formatIssuePath(
    segments: readonly (string | number)[],
    base = '',
): string {
    return segments.reduce<string>((path, segment) => joinPath(path, segment), base);
}

export function firstIssue(issues: readonly ZodIssue[]): { path: readonly (string | number)[]; message: string } {
    const [issue] = issues;
    if (!issue) return { path: [], message: 'Invalid value' };
    return { path: issue.path, message: issue.message };
}
