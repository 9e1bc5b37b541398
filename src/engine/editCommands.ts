/**
 * Undo entries for the layout editor. Commands hold whole-element (or
 * whole-style) snapshots rather than deltas, so applying one in either
 * direction is a plain splice or swap.
 */
import { isDeepStrictEqual } from 'node:util';
import { SchemaError } from '../schema/errors';
import type {
    BoardElement,
    KeyboardKey,
    Layout,
    MouseKey,
    MouseScroll,
    MouseSpeedIndicator,
    Size,
} from '../types/board';
import type { Style } from '../types/style';

export type LayoutCommand =
    | { kind: 'replace'; index: number; before: BoardElement; after: BoardElement }
    | { kind: 'add'; index: number; element: BoardElement }
    | { kind: 'remove'; index: number; element: BoardElement }
    | { kind: 'resizeLayout'; before: Size; after: Size };

export interface StyleCommand {
    kind: 'style';
    before: Style;
    after: Style;
}

export type EditCommand = LayoutCommand | StyleCommand;

export type Direction = 'forward' | 'backward';

/** An element as supplied to `addElement`; the id is assigned on insert. */
export type ElementDraft =
    | Omit<KeyboardKey, 'id'>
    | Omit<MouseKey, 'id'>
    | Omit<MouseScroll, 'id'>
    | Omit<MouseSpeedIndicator, 'id'>;

/** Fields editable through `updateElement`; fields foreign to the element's kind are ignored. */
export interface ElementPatch {
    text?: string;
    shiftText?: string;
    changeOnCaps?: boolean;
    keyCodes?: number[];
    boundaries?: KeyboardKey['boundaries'];
    textPosition?: KeyboardKey['textPosition'];
    location?: MouseSpeedIndicator['location'];
    radius?: number;
}

function spliceElement(layout: Layout, index: number, remove: number, insert: BoardElement[]): Layout {
    const elements = [...layout.elements];
    elements.splice(index, remove, ...insert);
    return { ...layout, elements };
}

export function applyCommand(layout: Layout, command: LayoutCommand, direction: Direction): Layout {
    const forward = direction === 'forward';
    switch (command.kind) {
        case 'replace':
            return spliceElement(layout, command.index, 1, [forward ? command.after : command.before]);
        case 'add':
            return forward
                ? spliceElement(layout, command.index, 0, [command.element])
                : spliceElement(layout, command.index, 1, []);
        case 'remove':
            return forward
                ? spliceElement(layout, command.index, 1, [])
                : spliceElement(layout, command.index, 0, [command.element]);
        case 'resizeLayout': {
            const size = forward ? command.after : command.before;
            return { ...layout, width: size.width, height: size.height };
        }
    }
}

export function applyStyleCommand(command: StyleCommand, direction: Direction): Style {
    return direction === 'forward' ? command.after : command.before;
}

/** Element id the command touches, or null for layout- and style-level commands. */
export function commandTarget(command: EditCommand): number | null {
    switch (command.kind) {
        case 'replace':
            return command.after.id;
        case 'add':
        case 'remove':
            return command.element.id;
        case 'resizeLayout':
        case 'style':
            return null;
    }
}

export function patchElement(element: BoardElement, patch: ElementPatch): BoardElement {
    if (patch.radius !== undefined && !(patch.radius > 0)) {
        throw new SchemaError('Radius must be greater than 0', 'Radius');
    }
    if (element.kind === 'MouseSpeedIndicator') {
        return {
            ...element,
            location: patch.location ? { ...patch.location } : element.location,
            radius: patch.radius ?? element.radius,
        };
    }

    const common = {
        boundaries: patch.boundaries ? patch.boundaries.map((vertex) => ({ ...vertex })) : element.boundaries,
        textPosition: patch.textPosition ? { ...patch.textPosition } : element.textPosition,
        keyCodes: patch.keyCodes ? [...patch.keyCodes] : element.keyCodes,
        text: patch.text ?? element.text,
    };
    if (element.kind === 'KeyboardKey') {
        return {
            ...element,
            ...common,
            shiftText: patch.shiftText ?? element.shiftText,
            changeOnCaps: patch.changeOnCaps ?? element.changeOnCaps,
        };
    }
    return { ...element, ...common };
}

export function sameElement(a: BoardElement, b: BoardElement): boolean {
    return isDeepStrictEqual(a, b);
}

export function sameStyle(a: Style, b: Style): boolean {
    return isDeepStrictEqual(a, b);
}

export function validateLayoutSize(size: Size): void {
    if (!(size.width > 0)) throw new SchemaError('Width must be greater than 0', 'Width');
    if (!(size.height > 0)) throw new SchemaError('Height must be greater than 0', 'Height');
}

export function validateRectangleSize(size: Size): void {
    if (!(size.width >= 0)) throw new SchemaError('Width must not be negative', 'Width');
    if (!(size.height >= 0)) throw new SchemaError('Height must not be negative', 'Height');
}
