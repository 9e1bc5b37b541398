/**
 * Pure geometry edits on a single element. Each function returns a new
 * element and leaves its input untouched, so a gesture can always be
 * recomputed from its pre-gesture snapshot.
 */
import type { BoardElement, Point, Size } from '../types/board';
import { distance, polygonBounds, subtractPoints, translatePoint, type Vector } from './geometry';
import type { Grab } from './hitTest';

export const MIN_INDICATOR_RADIUS = 1;

export function cloneElement<T extends BoardElement>(element: T): T {
    return structuredClone(element);
}

export function translateElement(element: BoardElement, delta: Vector, moveText: boolean): BoardElement {
    if (element.kind === 'MouseSpeedIndicator') {
        return { ...element, location: translatePoint(element.location, delta) };
    }
    return {
        ...element,
        boundaries: element.boundaries.map((vertex) => translatePoint(vertex, delta)),
        keyCodes: [...element.keyCodes],
        textPosition: moveText ? translatePoint(element.textPosition, delta) : element.textPosition,
    };
}

function mapVertices(element: BoardElement, indices: readonly number[], delta: Vector): BoardElement {
    if (element.kind === 'MouseSpeedIndicator') return element;
    const moved = new Set(indices);
    return {
        ...element,
        boundaries: element.boundaries.map((vertex, index) =>
            moved.has(index) ? translatePoint(vertex, delta) : vertex,
        ),
        keyCodes: [...element.keyCodes],
    };
}

export function moveVertex(element: BoardElement, index: number, delta: Vector): BoardElement {
    return mapVertices(element, [index], delta);
}

/** Moves both endpoints of edge `index`, i.e. vertex `index` and its successor. */
export function moveEdge(element: BoardElement, index: number, delta: Vector): BoardElement {
    if (element.kind === 'MouseSpeedIndicator' || element.boundaries.length === 0) return element;
    const next = (index + 1) % element.boundaries.length;
    return mapVertices(element, [index, next], delta);
}

export function setIndicatorRadius(element: BoardElement, radius: number): BoardElement {
    if (element.kind !== 'MouseSpeedIndicator') return element;
    return { ...element, radius: Math.max(MIN_INDICATOR_RADIUS, radius) };
}

/** Moves the label anchor to the centre of the element's bounding box. */
export function centerTextPosition(element: BoardElement): BoardElement {
    if (element.kind === 'MouseSpeedIndicator') return element;
    const bounds = polygonBounds(element.boundaries);
    if (!bounds) return element;
    return {
        ...element,
        textPosition: { x: (bounds.minX + bounds.maxX) / 2, y: (bounds.minY + bounds.maxY) / 2 },
    };
}

/** Replaces the outline with an axis-aligned rectangle, clockwise from its top-left corner. */
export function makeRectangle(element: BoardElement, position: Point, size: Size): BoardElement {
    if (element.kind === 'MouseSpeedIndicator') return element;
    const { x, y } = position;
    return {
        ...element,
        boundaries: [
            { x, y },
            { x: x + size.width, y },
            { x: x + size.width, y: y + size.height },
            { x, y: y + size.height },
        ],
    };
}

/** Swaps two outline vertices; indices outside the outline leave it unchanged. */
export function swapVertices(element: BoardElement, a: number, b: number): BoardElement {
    if (element.kind === 'MouseSpeedIndicator') return element;
    const count = element.boundaries.length;
    const inRange = (index: number) => Number.isInteger(index) && index >= 0 && index < count;
    if (a === b || !inRange(a) || !inRange(b)) return element;
    const boundaries = [...element.boundaries];
    [boundaries[a], boundaries[b]] = [boundaries[b], boundaries[a]];
    return { ...element, boundaries };
}

export interface GestureOptions {
    moveText: boolean;
}

/**
 * Geometry of `snapshot` after dragging `grab` from `origin` to `cursor`.
 */
export function applyGrab(
    snapshot: BoardElement,
    grab: Grab,
    origin: Point,
    cursor: Point,
    options: GestureOptions,
): BoardElement {
    const delta = subtractPoints(cursor, origin);
    switch (grab.kind) {
        case 'body':
            return translateElement(snapshot, delta, options.moveText);
        case 'vertex':
            return moveVertex(snapshot, grab.index, delta);
        case 'edge':
            return moveEdge(snapshot, grab.index, delta);
        case 'radius':
            if (snapshot.kind !== 'MouseSpeedIndicator') return snapshot;
            return setIndicatorRadius(snapshot, distance(cursor, snapshot.location));
    }
}

export function sameGeometry(a: BoardElement, b: BoardElement): boolean {
    if (a.kind === 'MouseSpeedIndicator' || b.kind === 'MouseSpeedIndicator') {
        if (a.kind !== 'MouseSpeedIndicator' || b.kind !== 'MouseSpeedIndicator') return false;
        return a.radius === b.radius && a.location.x === b.location.x && a.location.y === b.location.y;
    }
    if (a.boundaries.length !== b.boundaries.length) return false;
    if (a.textPosition.x !== b.textPosition.x || a.textPosition.y !== b.textPosition.y) return false;
    return a.boundaries.every((vertex, index) => {
        const other = b.boundaries[index];
        return vertex.x === other.x && vertex.y === other.y;
    });
}
