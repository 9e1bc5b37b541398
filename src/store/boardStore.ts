/**
 * Board session store: the single owner of the loaded documents, the
 * settings and the runtime input state.
 *
 * Input is funnelled through one queue. `dispatch` and connected sources
 * only enqueue; `tick` drains the queue in arrival order, expires
 * deadlines and projects the next frame. The tracker and the mouse
 * dynamics live in this closure and are never handed out.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import { mergeSettings, parseSettings, type Settings, type SettingsInput } from '../config/settings';
import { findMismatchedStyles } from '../engine/styleLookup';
import { InputTracker } from '../engine/inputTracker';
import { displayCenter, MouseDynamics, type Display, type DynamicsOptions } from '../engine/mouseDynamics';
import { projectFrame, type DrawInstruction, type EditOverlay } from '../engine/projector';
import type { Vector } from '../engine/geometry';
import { createLogger, setLogLevel } from '../lib/logger';
import { BoardError } from '../schema/errors';
import { parseLayoutJson } from '../schema/layoutCodec';
import { parseStyleJson } from '../schema/styleCodec';
import type { Layout } from '../types/board';
import type { InputEvent, InputSource, ModifierState } from '../types/input';
import { defaultStyle, type Style } from '../types/style';

const log = createLogger('session');

/* ------------------------------------------------------------------ */
/*  State + actions                                                   */
/* ------------------------------------------------------------------ */

export interface BoardState {
    layout: Layout | null;
    style: Style;
    settings: Settings;
    displays: Display[];
    editMode: boolean;
    editOverlay: EditOverlay | null;
    /** Bumped whenever a layout is loaded or unloaded, but not on edits. */
    layoutGeneration: number;
    /** Bumped whenever a style is loaded, but not on edits. */
    styleGeneration: number;
    /** Last projected frame; empty while no layout is loaded. */
    frame: DrawInstruction[];
    lastTick: number | null;
}

export interface BoardActions {
    loadLayout: (layout: Layout) => void;
    /** Parses, validates and loads; a `SchemaError` is logged and rethrown. */
    loadLayoutJson: (text: string) => Layout;
    loadStyle: (style: Style) => void;
    loadStyleJson: (text: string) => Style;
    /** Replace the style after an edit. */
    applyStyleEdit: (style: Style) => void;
    /** Replace the layout after an edit, keeping press state of surviving elements. */
    applyLayoutEdit: (layout: Layout) => void;
    unloadLayout: () => void;
    updateSettings: (patch: Partial<Settings>) => Settings;
    setDisplays: (displays: Display[]) => void;
    setEditMode: (on: boolean) => void;
    setEditOverlay: (overlay: EditOverlay | null) => void;
    /** Enqueue one event, stamped with the clock if it carries no time. Nothing changes until the next `tick`. */
    dispatch: (event: InputEvent) => void;
    connect: (source: InputSource) => void;
    disconnect: () => void;
    pendingEvents: () => number;
    tick: (now?: number) => DrawInstruction[];
    /** Forget every held key, button and scroll pulse. */
    clearPressed: () => void;
    isPressed: (elementId: number) => boolean;
    modifiers: () => ModifierState;
    velocity: () => Vector;
}

export type BoardStore = BoardState & BoardActions;

export type BoardStoreApi = StoreApi<BoardStore>;

export interface BoardStoreOptions {
    settings?: SettingsInput;
    style?: Style;
    layout?: Layout;
    /** Monotonic milliseconds; defaults to `performance.now()`. */
    clock?: () => number;
}

function dynamicsOptions(settings: Settings): Omit<DynamicsOptions, 'center'> {
    return {
        mouseFromCenter: settings.mouseFromCenter,
        mouseSmoothing: settings.mouseSmoothing,
        minMouseSampleInterval: settings.minMouseSampleInterval,
    };
}

/* ------------------------------------------------------------------ */
/*  Store definition                                                  */
/* ------------------------------------------------------------------ */

export function createBoardStore(options: BoardStoreOptions = {}): BoardStoreApi {
    const settings = parseSettings(options.settings ?? {});
    if (options.settings?.logLevel !== undefined) {
        setLogLevel(settings.logLevel);
    }
    const clock = options.clock ?? (() => performance.now());

    return createStore<BoardStore>()((set, get) => {
        const queue: InputEvent[] = [];
        const subscriptions: (() => void)[] = [];
        const tracker = new InputTracker(
            { minPressTime: settings.minPressTime, scrollHoldTime: settings.scrollHoldTime },
            options.layout ?? null,
        );
        const dynamics = new MouseDynamics({ ...dynamicsOptions(settings), center: { x: 0, y: 0 } });

        const warnMismatchedStyles = (layout: Layout | null, style: Style): void => {
            if (!layout) return;
            for (const id of findMismatchedStyles(style, layout.elements)) {
                log.warn(`Style entry for element ${id} does not match the element kind; using the default`);
            }
        };

        const recenter = (): void => {
            const { displays, settings: current } = get();
            dynamics.configure({ center: displayCenter(displays, current.displayChoice) });
        };

        const drain = (now: number): void => {
            // Events enqueued while draining wait for the next tick.
            const batch = queue.splice(0, queue.length);
            for (const event of batch) {
                const time = event.time ?? now;
                switch (event.kind) {
                    case 'mouseMove':
                        dynamics.recordPosition({ x: event.x, y: event.y }, time);
                        break;
                    case 'mouseDelta':
                        dynamics.recordDelta(event.dx, event.dy, time);
                        break;
                    default:
                        tracker.apply(event, time);
                }
            }
        };

        const project = (now: number): DrawInstruction[] => {
            const state = get();
            const frame = state.layout
                ? projectFrame({
                      layout: state.layout,
                      style: state.style,
                      pressedIds: new Set(tracker.pressedIds()),
                      modifiers: tracker.modifiers(),
                      velocity: dynamics.getVelocity(),
                      settings: state.settings,
                      edit: state.editMode ? state.editOverlay : null,
                  })
                : [];
            set({ frame, lastTick: now });
            return frame;
        };

        const loadJson = <T>(kind: string, text: string, parse: (text: string) => T): T => {
            try {
                return parse(text);
            } catch (error) {
                if (error instanceof BoardError) {
                    log.error(`Failed to load ${kind}: ${error.message}`);
                }
                throw error;
            }
        };

        return {
            // --- Initial state ---
            layout: options.layout ?? null,
            style: options.style ?? defaultStyle(),
            settings,
            displays: [],
            editMode: false,
            editOverlay: null,
            layoutGeneration: 0,
            styleGeneration: 0,
            frame: [],
            lastTick: null,

            // --- Documents ---

            loadLayout(layout) {
                tracker.loadLayout(layout);
                set((state) => ({
                    layout,
                    layoutGeneration: state.layoutGeneration + 1,
                    editOverlay: null,
                }));
                log.info(`Loaded layout with ${layout.elements.length} elements`);
                warnMismatchedStyles(layout, get().style);
            },

            loadLayoutJson(text) {
                const layout = loadJson('layout', text, parseLayoutJson);
                get().loadLayout(layout);
                return layout;
            },

            loadStyle(style) {
                set((state) => ({ style, styleGeneration: state.styleGeneration + 1 }));
                warnMismatchedStyles(get().layout, style);
            },

            loadStyleJson(text) {
                const style = loadJson('style', text, parseStyleJson);
                get().loadStyle(style);
                return style;
            },

            applyStyleEdit(style) {
                set({ style });
            },

            applyLayoutEdit(layout) {
                tracker.syncLayout(layout, clock());
                set({ layout });
            },

            unloadLayout() {
                tracker.unload();
                queue.length = 0;
                set((state) => ({
                    layout: null,
                    layoutGeneration: state.layoutGeneration + 1,
                    editOverlay: null,
                    frame: [],
                }));
            },

            // --- Settings ---

            updateSettings(patch) {
                let next: Settings;
                try {
                    next = mergeSettings(get().settings, patch);
                } catch (error) {
                    if (error instanceof BoardError) {
                        log.error(`Rejected settings update: ${error.message}`);
                    }
                    throw error;
                }
                tracker.setTiming({ minPressTime: next.minPressTime, scrollHoldTime: next.scrollHoldTime });
                dynamics.configure(dynamicsOptions(next));
                if (patch.logLevel !== undefined) setLogLevel(next.logLevel);
                set({ settings: next });
                recenter();
                return next;
            },

            setDisplays(displays) {
                set({ displays: [...displays] });
                recenter();
            },

            setEditMode(on) {
                if (get().editMode === on) return;
                set({ editMode: on, editOverlay: null });
            },

            setEditOverlay(overlay) {
                set({ editOverlay: overlay });
            },

            // --- Input ---

            dispatch(event) {
                // Untimed events take their arrival time, not the drain time.
                queue.push(event.time === undefined ? { ...event, time: clock() } : event);
            },

            connect(source) {
                subscriptions.push(source.subscribe((event) => get().dispatch(event)));
            },

            disconnect() {
                for (const unsubscribe of subscriptions.splice(0, subscriptions.length)) {
                    unsubscribe();
                }
            },

            pendingEvents() {
                return queue.length;
            },

            tick(now = clock()) {
                drain(now);
                tracker.expire(now);
                return project(now);
            },

            clearPressed() {
                queue.length = 0;
                tracker.clear();
                dynamics.reset();
            },

            isPressed(elementId) {
                return tracker.isPressed(elementId);
            },

            modifiers() {
                return tracker.modifiers();
            },

            velocity() {
                return dynamics.getVelocity();
            },
        };
    });
}
