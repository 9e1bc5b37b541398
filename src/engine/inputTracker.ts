/**
 * Input state tracker: raw input events in, per-element press state out.
 *
 * Three global held sets are kept, one per input namespace (keyboard
 * keys, mouse buttons, active scroll pulses). An element is pressed when
 * every keycode it lists is held in its namespace at once (chord/AND).
 * When the chord breaks the element stays pressed until a release
 * deadline passes; deadlines are polled, never scheduled.
 *
 * The tracker is single-consumer: only the session's drain loop calls
 * `apply` and `expire`.
 */
import type { Settings } from '../config/settings';
import { createLogger } from '../lib/logger';
import { isKeyElement, type KeyElement, type Layout } from '../types/board';
import type { InputEvent, ModifierState } from '../types/input';
import {
    KEY_CAPS_LOCK,
    SHIFT_KEYCODES,
    isScrollDirection,
    keycodeName,
    mouseButtonName,
    scrollDirectionName,
} from './keycodes';

const log = createLogger('tracker');

export type TrackerTiming = Pick<Settings, 'minPressTime' | 'scrollHoldTime'>;

export interface PressState {
    readonly elementId: number;
    /** Member keycodes of this element that are currently down. */
    heldKeycodes: Set<number>;
    isPressed: boolean;
    /** When a broken chord (or expiring scroll pulse) flips the element loose. */
    releaseDeadline: number | null;
}

type Namespace = 'key' | 'button' | 'scroll';

function namespaceOf(element: KeyElement): Namespace {
    switch (element.kind) {
        case 'KeyboardKey':
            return 'key';
        case 'MouseKey':
            return 'button';
        case 'MouseScroll':
            return 'scroll';
    }
}

function createPressState(elementId: number): PressState {
    return { elementId, heldKeycodes: new Set(), isPressed: false, releaseDeadline: null };
}

export class InputTracker {
    private readonly keys = new Set<number>();
    private readonly buttons = new Set<number>();
    /** Scroll direction → time the latest pulse stops holding. */
    private readonly scrollDeadlines = new Map<number, number>();
    private hardwareCaps = false;

    private elements: KeyElement[] = [];
    private readonly states = new Map<number, PressState>();
    private readonly referenced: Record<Namespace, Set<number>> = {
        key: new Set(),
        button: new Set(),
        scroll: new Set(),
    };
    private readonly reportedUnmapped = new Set<string>();

    private timing: TrackerTiming;

    constructor(timing: TrackerTiming, layout?: Layout | null) {
        this.timing = { ...timing };
        if (layout) this.loadLayout(layout);
    }

    setTiming(timing: TrackerTiming): void {
        this.timing = { ...timing };
    }

    /** Replace the layout and start every element loose. */
    loadLayout(layout: Layout): void {
        this.states.clear();
        this.indexLayout(layout);
        for (const element of this.elements) {
            this.states.set(element.id, createPressState(element.id));
        }
    }

    /** Replace the layout, keeping runtime state of elements whose id survives. */
    syncLayout(layout: Layout, now: number): void {
        const previous = new Map(this.states);
        this.states.clear();
        this.indexLayout(layout);
        for (const element of this.elements) {
            this.states.set(element.id, previous.get(element.id) ?? createPressState(element.id));
        }
        this.evaluateAll(now);
    }

    unload(): void {
        this.elements = [];
        this.states.clear();
        this.indexLayout(null);
    }

    apply(event: InputEvent, now: number): void {
        switch (event.kind) {
            case 'key':
                if (event.pressed) {
                    this.pressKey(event.keycode);
                } else {
                    this.release(this.keys, event.keycode, 'key');
                }
                break;
            case 'button':
                if (event.pressed) {
                    this.noteUnmapped('button', event.button);
                    this.buttons.add(event.button);
                } else {
                    this.release(this.buttons, event.button, 'button');
                }
                break;
            case 'scroll':
                this.pulseScroll(event.direction, now);
                break;
            case 'capsLock':
                this.hardwareCaps = event.on;
                return;
            case 'mouseMove':
            case 'mouseDelta':
                return;
        }
        this.evaluateAll(now);
    }

    /** Tick: drop expired scroll pulses and flip elements whose deadline passed. */
    expire(now: number): void {
        for (const [direction, deadline] of this.scrollDeadlines) {
            if (deadline <= now) this.scrollDeadlines.delete(direction);
        }
        this.evaluateAll(now);
    }

    /** Forget every held code and pulse; all elements go loose immediately. */
    clear(): void {
        this.keys.clear();
        this.buttons.clear();
        this.scrollDeadlines.clear();
        for (const state of this.states.values()) {
            state.heldKeycodes.clear();
            state.isPressed = false;
            state.releaseDeadline = null;
        }
    }

    isPressed(elementId: number): boolean {
        return this.states.get(elementId)?.isPressed ?? false;
    }

    pressState(elementId: number): Readonly<PressState> | undefined {
        return this.states.get(elementId);
    }

    pressedIds(): number[] {
        const ids: number[] = [];
        for (const state of this.states.values()) {
            if (state.isPressed) ids.push(state.elementId);
        }
        return ids;
    }

    heldKeys(): ReadonlySet<number> {
        return this.keys;
    }

    modifiers(): ModifierState {
        return {
            shift: SHIFT_KEYCODES.some((code) => this.keys.has(code)),
            hardwareCapsLock: this.hardwareCaps,
        };
    }

    /* -------------------------------------------------------------- */

    private indexLayout(layout: Layout | null): void {
        this.elements = layout ? layout.elements.filter(isKeyElement) : [];
        for (const set of Object.values(this.referenced)) set.clear();
        this.reportedUnmapped.clear();
        for (const element of this.elements) {
            const codes = this.referenced[namespaceOf(element)];
            for (const code of element.keyCodes) codes.add(code);
        }
    }

    private pressKey(keycode: number): void {
        if (this.keys.has(keycode)) return; // auto-repeat
        if (keycode === KEY_CAPS_LOCK) {
            this.hardwareCaps = !this.hardwareCaps;
        }
        this.noteUnmapped('key', keycode);
        this.keys.add(keycode);
    }

    private release(held: Set<number>, code: number, namespace: Namespace): void {
        if (!held.delete(code)) {
            log.debug(`Ignoring release of ${describe(namespace, code)} with no recorded press`);
        }
    }

    private pulseScroll(direction: number, now: number): void {
        if (!isScrollDirection(direction)) {
            log.debug(`Ignoring scroll pulse with unknown direction ${direction}`);
            return;
        }
        this.noteUnmapped('scroll', direction);
        const deadline = now + this.timing.scrollHoldTime;
        const existing = this.scrollDeadlines.get(direction);
        this.scrollDeadlines.set(direction, existing === undefined ? deadline : Math.max(existing, deadline));
    }

    private noteUnmapped(namespace: Namespace, code: number): void {
        if (this.referenced[namespace].has(code)) return;
        if (namespace === 'scroll' && this.hasCatchAllScroll()) return;
        const token = `${namespace}:${code}`;
        if (this.reportedUnmapped.has(token)) return;
        this.reportedUnmapped.add(token);
        log.debug(`No element listens for ${describe(namespace, code)}`);
    }

    private hasCatchAllScroll(): boolean {
        return this.elements.some((element) => element.kind === 'MouseScroll' && element.keyCodes.length === 0);
    }

    private isHeld(namespace: Namespace, code: number, now: number): boolean {
        switch (namespace) {
            case 'key':
                return this.keys.has(code);
            case 'button':
                return this.buttons.has(code);
            case 'scroll': {
                const deadline = this.scrollDeadlines.get(code);
                return deadline !== undefined && deadline > now;
            }
        }
    }

    private evaluateAll(now: number): void {
        for (const element of this.elements) {
            const state = this.states.get(element.id);
            if (state) this.evaluate(element, state, now);
        }
    }

    private evaluate(element: KeyElement, state: PressState, now: number): void {
        const namespace = namespaceOf(element);
        state.heldKeycodes.clear();
        for (const code of element.keyCodes) {
            if (this.isHeld(namespace, code, now)) state.heldKeycodes.add(code);
        }

        if (namespace === 'scroll') {
            this.evaluateScroll(element, state, now);
            return;
        }

        const chordHeld = element.keyCodes.length > 0 && state.heldKeycodes.size === new Set(element.keyCodes).size;
        if (chordHeld) {
            state.isPressed = true;
            state.releaseDeadline = null;
            return;
        }
        if (!state.isPressed) return;

        if (state.releaseDeadline === null) {
            state.releaseDeadline = now + this.timing.minPressTime;
        }
        if (now >= state.releaseDeadline) {
            state.isPressed = false;
            state.releaseDeadline = null;
        }
    }

    /** Scroll elements hold for the pulse duration only; minimum press time does not apply. */
    private evaluateScroll(element: KeyElement, state: PressState, now: number): void {
        const directions = new Set(element.keyCodes.length > 0 ? element.keyCodes : this.scrollDeadlines.keys());
        const deadlines: number[] = [];
        for (const direction of directions) {
            const deadline = this.scrollDeadlines.get(direction);
            if (deadline !== undefined && deadline > now) deadlines.push(deadline);
        }

        const active =
            element.keyCodes.length > 0 ? deadlines.length === directions.size : deadlines.length > 0;
        state.isPressed = active;
        if (!active) {
            state.releaseDeadline = null;
        } else {
            // A chord lets go when its first member expires; a catch-all when its last does.
            state.releaseDeadline = element.keyCodes.length > 0 ? Math.min(...deadlines) : Math.max(...deadlines);
        }
    }
}

function describe(namespace: Namespace, code: number): string {
    switch (namespace) {
        case 'key':
            return `key ${keycodeName(code)} (${code})`;
        case 'button':
            return `mouse button ${mouseButtonName(code)} (${code})`;
        case 'scroll':
            return `scroll ${scrollDirectionName(code)} (${code})`;
    }
}
