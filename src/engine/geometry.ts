import type { Point } from '../types/board';

export interface Vector {
    x: number;
    y: number;
}

export interface Bounds {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

export function distance(a: Point, b: Point): number {
    return Math.hypot(a.x - b.x, a.y - b.y);
}

export function distanceSq(a: Point, b: Point): number {
    const dx = a.x - b.x;
    const dy = a.y - b.y;
    return dx * dx + dy * dy;
}

export function magnitudeOf(vector: Vector): number {
    return Math.hypot(vector.x, vector.y);
}

/** Angle of a vector in radians, measured from +x towards +y (screen space). */
export function angleOf(vector: Vector): number {
    return Math.atan2(vector.y, vector.x);
}

export function translatePoint(point: Point, delta: Vector): Point {
    return { x: point.x + delta.x, y: point.y + delta.y };
}

export function subtractPoints(a: Point, b: Point): Vector {
    return { x: a.x - b.x, y: a.y - b.y };
}

export function distancePointToSegment(point: Point, a: Point, b: Point): number {
    const vx = b.x - a.x;
    const vy = b.y - a.y;
    const wx = point.x - a.x;
    const wy = point.y - a.y;

    const c1 = vx * wx + vy * wy;
    if (c1 <= 0) {
        return Math.hypot(point.x - a.x, point.y - a.y);
    }

    const c2 = vx * vx + vy * vy;
    if (c2 <= c1) {
        return Math.hypot(point.x - b.x, point.y - b.y);
    }

    const t = c1 / c2;
    const projX = a.x + t * vx;
    const projY = a.y + t * vy;
    return Math.hypot(point.x - projX, point.y - projY);
}

/**
 * Even-odd ray cast against the implicitly closed polygon.
 * Degenerate polygons (fewer than three vertices) contain nothing.
 */
export function pointInPolygon(point: Point, vertices: readonly Point[]): boolean {
    if (vertices.length < 3) return false;

    let inside = false;
    for (let i = 0, j = vertices.length - 1; i < vertices.length; j = i++) {
        const a = vertices[i];
        const b = vertices[j];
        if (a.y > point.y === b.y > point.y) continue;
        const crossX = ((b.x - a.x) * (point.y - a.y)) / (b.y - a.y) + a.x;
        if (point.x < crossX) {
            inside = !inside;
        }
    }
    return inside;
}

export function pointInCircle(point: Point, center: Point, radius: number): boolean {
    return distanceSq(point, center) <= radius * radius;
}

export function polygonBounds(vertices: readonly Point[]): Bounds | null {
    if (vertices.length === 0) return null;
    let minX = Number.POSITIVE_INFINITY;
    let minY = Number.POSITIVE_INFINITY;
    let maxX = Number.NEGATIVE_INFINITY;
    let maxY = Number.NEGATIVE_INFINITY;
    for (const vertex of vertices) {
        if (vertex.x < minX) minX = vertex.x;
        if (vertex.y < minY) minY = vertex.y;
        if (vertex.x > maxX) maxX = vertex.x;
        if (vertex.y > maxY) maxY = vertex.y;
    }
    return { minX, minY, maxX, maxY };
}

export function clamp(value: number, min: number, max: number): number {
    if (!Number.isFinite(value)) return min;
    return Math.min(max, Math.max(min, value));
}

export function lerp(a: number, b: number, t: number): number {
    return a + (b - a) * t;
}
