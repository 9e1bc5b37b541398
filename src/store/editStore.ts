/**
 * Edit-mode store: pointer gestures, selection and a linear undo
 * history over the board session's layout and style.
 *
 * Gestures mutate the layout live through `applyLayoutEdit` and only
 * the finished gesture becomes an undo entry. Loading or unloading a
 * layout, or loading a style, on the board drops the history.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import {
    applyCommand,
    applyStyleCommand,
    commandTarget,
    patchElement,
    sameElement,
    sameStyle,
    validateLayoutSize,
    validateRectangleSize,
    type Direction,
    type EditCommand,
    type ElementDraft,
    type ElementPatch,
} from '../engine/editCommands';
import { DEFAULT_GRAB_TOLERANCE, elementContains, hitTestElement, resolveGrab, type Grab } from '../engine/hitTest';
import { expectedStyleKind, withElementStyle, withoutElementStyle } from '../engine/styleLookup';
import {
    applyGrab,
    centerTextPosition,
    cloneElement,
    makeRectangle,
    sameGeometry,
    swapVertices,
} from '../engine/transform';
import { createLogger } from '../lib/logger';
import { SchemaError } from '../schema/errors';
import { decodeStyle, encodeStyle } from '../schema/styleCodec';
import { findElement, nextElementId, type BoardElement, type Layout, type Point, type Size } from '../types/board';
import type { ElementStyle, Style } from '../types/style';
import type { BoardStoreApi } from './boardStore';

const log = createLogger('editor');

export const MAX_HISTORY_ENTRIES = 250;

/** Style fields editable through `updateStyle`; element overrides go through `setElementStyle`. */
export type StylePatch = Partial<
    Pick<Style, 'backgroundColor' | 'backgroundImageFileName' | 'defaultKeyStyle' | 'defaultMouseSpeedIndicatorStyle'>
>;

/* ------------------------------------------------------------------ */
/*  State + actions                                                   */
/* ------------------------------------------------------------------ */

export interface EditState {
    hoveredId: number | null;
    heldId: number | null;
    selectedId: number | null;
    /** What the current gesture holds, if a pointer is down. */
    grab: Grab | null;
    canUndo: boolean;
    canRedo: boolean;
}

export interface EditActions {
    hover: (point: Point) => void;
    pointerDown: (point: Point) => void;
    pointerMove: (point: Point) => void;
    pointerUp: () => void;
    /** Abandon the gesture in progress and restore its starting geometry. */
    cancelGesture: () => void;
    select: (id: number | null) => void;
    undo: () => void;
    redo: () => void;
    /** Append a new element on top; returns its id, or null with no layout loaded. */
    addElement: (draft: ElementDraft) => number | null;
    removeElement: (id: number) => void;
    updateElement: (id: number, patch: ElementPatch) => void;
    centerTextPosition: (id: number) => void;
    makeRectangle: (id: number, position: Point, size: Size) => void;
    swapBoundaries: (id: number, a: number, b: number) => void;
    setLayoutSize: (width: number, height: number) => void;
    /** Set or, with null, drop the override style of one element. */
    setElementStyle: (id: number, value: ElementStyle | null) => void;
    updateStyle: (patch: StylePatch) => void;
    clearHistory: () => void;
    /** Detach from the board store. */
    dispose: () => void;
}

export type EditStore = EditState & EditActions;

export type EditStoreApi = StoreApi<EditStore>;

export interface EditStoreOptions {
    tolerance?: number;
}

interface Gesture {
    index: number;
    grab: Grab;
    origin: Point;
    snapshot: BoardElement;
}

/* ------------------------------------------------------------------ */
/*  Store definition                                                  */
/* ------------------------------------------------------------------ */

export function createEditStore(board: BoardStoreApi, options: EditStoreOptions = {}): EditStoreApi {
    const tolerance = options.tolerance ?? DEFAULT_GRAB_TOLERANCE;

    return createStore<EditStore>()((set, get) => {
        const past: EditCommand[] = [];
        const future: EditCommand[] = [];
        let gesture: Gesture | null = null;

        const currentLayout = (): Layout | null => board.getState().layout;

        const publish = (): void => {
            const { hoveredId, heldId, selectedId } = get();
            board.getState().setEditOverlay({ hoveredId, heldId, selectedId });
        };

        const syncFlags = (): void => {
            set({ canUndo: past.length > 0, canRedo: future.length > 0 });
        };

        const record = (command: EditCommand): void => {
            past.push(command);
            if (past.length > MAX_HISTORY_ENTRIES) {
                past.shift();
            }
            future.length = 0;
            syncFlags();
        };

        const run = (command: EditCommand, direction: Direction): void => {
            if (command.kind === 'style') {
                board.getState().applyStyleEdit(applyStyleCommand(command, direction));
                return;
            }
            const layout = currentLayout();
            if (layout) {
                board.getState().applyLayoutEdit(applyCommand(layout, command, direction));
            }
        };

        const commit = (command: EditCommand): void => {
            gesture = null;
            run(command, 'forward');
            record(command);
        };

        const replaceElement = (id: number, edit: (element: BoardElement) => BoardElement): void => {
            const layout = currentLayout();
            if (!layout) return;
            const index = layout.elements.findIndex((element) => element.id === id);
            if (index < 0) {
                log.debug(`No element ${id} to edit`);
                return;
            }
            const before = layout.elements[index];
            const after = edit(before);
            if (sameElement(before, after)) return;
            commit({ kind: 'replace', index, before, after });
        };

        const commitStyle = (after: Style): void => {
            const before = board.getState().style;
            if (sameStyle(before, after)) return;
            // Reject anything the style file format could not carry.
            decodeStyle(encodeStyle(after));
            commit({ kind: 'style', before, after });
        };

        const dropStaleSelection = (layout: Layout | null): void => {
            const exists = (id: number | null) =>
                id !== null && layout !== null && layout.elements.some((element) => element.id === id);
            const { hoveredId, selectedId } = get();
            set({
                hoveredId: exists(hoveredId) ? hoveredId : null,
                selectedId: exists(selectedId) ? selectedId : null,
                heldId: null,
                grab: null,
            });
            publish();
        };

        const reset = (): void => {
            gesture = null;
            past.length = 0;
            future.length = 0;
            set({ hoveredId: null, heldId: null, selectedId: null, grab: null, canUndo: false, canRedo: false });
        };

        const unsubscribe = board.subscribe((state, previous) => {
            if (
                state.layoutGeneration !== previous.layoutGeneration ||
                state.styleGeneration !== previous.styleGeneration
            ) {
                reset();
            } else if (state.editMode !== previous.editMode && !state.editMode) {
                get().cancelGesture();
                set({ hoveredId: null, heldId: null, selectedId: null });
            }
        });

        const hitId = (layout: Layout, point: Point): number | null => hitTestElement(layout, point)?.id ?? null;

        return {
            // --- Initial state ---
            hoveredId: null,
            heldId: null,
            selectedId: null,
            grab: null,
            canUndo: false,
            canRedo: false,

            // --- Gestures ---

            hover(point) {
                const layout = currentLayout();
                const hoveredId = layout ? hitId(layout, point) : null;
                if (hoveredId === get().hoveredId) return;
                set({ hoveredId });
                publish();
            },

            pointerDown(point) {
                const { layout, editMode } = board.getState();
                if (!layout || !editMode) return;
                get().hover(point);

                // A selected element keeps the grab while the pointer is on it or its handles.
                const { selectedId, hoveredId } = get();
                let index = selectedId === null ? -1 : layout.elements.findIndex((element) => element.id === selectedId);
                if (index >= 0) {
                    const selected = layout.elements[index];
                    if (!elementContains(selected, point) && resolveGrab(selected, point, tolerance).kind === 'body') {
                        index = -1;
                    }
                }
                if (index < 0 && hoveredId !== null) {
                    index = layout.elements.findIndex((element) => element.id === hoveredId);
                }
                if (index < 0) {
                    gesture = null;
                    return;
                }

                const target = layout.elements[index];
                const grab = resolveGrab(target, point, tolerance);
                gesture = { index, grab, origin: { ...point }, snapshot: cloneElement(target) };
                set({ heldId: target.id, selectedId: null, grab });
                publish();
            },

            pointerMove(point) {
                const layout = currentLayout();
                if (!gesture || !layout) {
                    get().hover(point);
                    return;
                }
                const live = applyGrab(gesture.snapshot, gesture.grab, gesture.origin, point, {
                    moveText: board.getState().settings.updateTextPosition,
                });
                const elements = [...layout.elements];
                elements[gesture.index] = live;
                board.getState().applyLayoutEdit({ ...layout, elements });
            },

            pointerUp() {
                const layout = currentLayout();
                const finished = gesture;
                gesture = null;
                if (!finished || !layout) {
                    set({ selectedId: get().hoveredId, heldId: null, grab: null });
                    publish();
                    return;
                }

                const current = layout.elements[finished.index];
                if (current && !sameGeometry(current, finished.snapshot)) {
                    // The layout already shows `current`; record the step without re-applying it.
                    record({ kind: 'replace', index: finished.index, before: finished.snapshot, after: current });
                    set({ selectedId: current.id, heldId: null, grab: null });
                    log.debug(`Moved element ${current.id}`);
                } else {
                    set({ selectedId: get().hoveredId, heldId: null, grab: null });
                }
                publish();
            },

            cancelGesture() {
                const layout = currentLayout();
                const abandoned = gesture;
                gesture = null;
                if (abandoned && layout) {
                    const elements = [...layout.elements];
                    elements[abandoned.index] = abandoned.snapshot;
                    board.getState().applyLayoutEdit({ ...layout, elements });
                }
                set({ heldId: null, grab: null });
                publish();
            },

            select(id) {
                set({ selectedId: id });
                publish();
            },

            // --- History ---

            undo() {
                // A half-finished drag is not in the history; put its element back first.
                get().cancelGesture();
                const command = past.pop();
                if (!command) return;
                run(command, 'backward');
                future.push(command);
                syncFlags();
                dropStaleSelection(currentLayout());
                log.debug(`Undid ${command.kind} of ${commandTarget(command) ?? 'document'}`);
            },

            redo() {
                get().cancelGesture();
                const command = future.pop();
                if (!command) return;
                run(command, 'forward');
                past.push(command);
                if (past.length > MAX_HISTORY_ENTRIES) {
                    past.shift();
                }
                syncFlags();
                dropStaleSelection(currentLayout());
            },

            clearHistory() {
                past.length = 0;
                future.length = 0;
                syncFlags();
            },

            // --- Element commands ---

            addElement(draft) {
                const layout = currentLayout();
                if (!layout) {
                    log.warn('Cannot add an element without a loaded layout');
                    return null;
                }
                const element: BoardElement = { ...structuredClone(draft), id: nextElementId(layout) };
                commit({ kind: 'add', index: layout.elements.length, element });
                return element.id;
            },

            removeElement(id) {
                const layout = currentLayout();
                if (!layout) return;
                const index = layout.elements.findIndex((element) => element.id === id);
                if (index < 0) {
                    log.debug(`No element ${id} to remove`);
                    return;
                }
                commit({ kind: 'remove', index, element: layout.elements[index] });
                dropStaleSelection(currentLayout());
            },

            updateElement(id, patch) {
                replaceElement(id, (element) => patchElement(element, patch));
            },

            centerTextPosition(id) {
                replaceElement(id, centerTextPosition);
            },

            makeRectangle(id, position, size) {
                validateRectangleSize(size);
                replaceElement(id, (element) => makeRectangle(element, position, size));
            },

            swapBoundaries(id, a, b) {
                replaceElement(id, (element) => swapVertices(element, a, b));
            },

            setLayoutSize(width, height) {
                const layout = currentLayout();
                if (!layout) return;
                const after = { width, height };
                validateLayoutSize(after);
                if (layout.width === width && layout.height === height) return;
                commit({
                    kind: 'resizeLayout',
                    before: { width: layout.width, height: layout.height },
                    after,
                });
            },

            // --- Style commands ---

            setElementStyle(id, value) {
                const layout = currentLayout();
                const element = layout ? findElement(layout, id) : undefined;
                if (!element) {
                    log.debug(`No element ${id} to style`);
                    return;
                }
                const expected = expectedStyleKind(element.kind);
                if (value && value.kind !== expected) {
                    throw new SchemaError(`Element ${id} takes a ${expected}`, 'ElementStyles');
                }
                const { style } = board.getState();
                commitStyle(value ? withElementStyle(style, id, value) : withoutElementStyle(style, id));
            },

            updateStyle(patch) {
                commitStyle({ ...board.getState().style, ...patch });
            },

            dispose() {
                unsubscribe();
            },
        };
    });
}
