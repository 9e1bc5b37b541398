/**
 * Core semantic types for a board layout.
 *
 * A layout is a flat, ordered list of elements. Order is z-order:
 * later elements draw on top and win hit-tests. Style files refer to
 * elements by `id`, never by position.
 */

/** Immutable 2D value used for vertices, anchors and cursor positions. */
export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Size {
  width: number;
  height: number;
}

export type ElementKind = 'KeyboardKey' | 'MouseKey' | 'MouseScroll' | 'MouseSpeedIndicator';

/** Fields shared by every element that reacts to keycodes. */
export interface KeyDefinition {
  id: number;
  /** Implicitly closed polygon. Fewer than three points is allowed but never hit. */
  boundaries: Point[];
  /** Top-left of the label. Window-relative, not element-relative. */
  textPosition: Point;
  keyCodes: number[];
  text: string;
}

export interface KeyboardKey extends KeyDefinition {
  kind: 'KeyboardKey';
  /** Label shown while the shift text rule applies. */
  shiftText: string;
  changeOnCaps: boolean;
}

export interface MouseKey extends KeyDefinition {
  kind: 'MouseKey';
}

export interface MouseScroll extends KeyDefinition {
  kind: 'MouseScroll';
}

export interface MouseSpeedIndicator {
  kind: 'MouseSpeedIndicator';
  id: number;
  /** Centre of the indicator. */
  location: Point;
  /** Radius of the outer ring. */
  radius: number;
}

export type KeyElement = KeyboardKey | MouseKey | MouseScroll;

export type BoardElement = KeyElement | MouseSpeedIndicator;

export interface Layout {
  /** `$schema` pointer carried by some layout files; re-emitted when present. */
  schemaUrl?: string;
  /** No meaning. Kept so files re-encode the way the legacy tool wrote them. */
  version?: number | null;
  width: number;
  height: number;
  elements: BoardElement[];
}

export function isKeyElement(element: BoardElement): element is KeyElement {
  return element.kind !== 'MouseSpeedIndicator';
}

export function findElement(layout: Layout, id: number): BoardElement | undefined {
  return layout.elements.find((element) => element.id === id);
}

export function nextElementId(layout: Layout): number {
  let max = -1;
  for (const element of layout.elements) {
    if (element.id > max) max = element.id;
  }
  return max + 1;
}
