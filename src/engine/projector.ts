/**
 * Projector: turns the static layout/style documents plus the runtime
 * press state, modifiers and mouse velocity into draw instructions.
 *
 * The output is plain data. Identical input always yields an identical
 * instruction list; the renderer on the other side owns rasterization.
 */
import type { Settings } from '../config/settings';
import type { BoardElement, KeyElement, Layout, MouseSpeedIndicator, Point } from '../types/board';
import type { ModifierState } from '../types/input';
import { FontStyle, type Font, type Rgb, type Style } from '../types/style';
import { lerp, magnitudeOf, translatePoint, type Vector } from './geometry';
import { indicatorGeometry, INNER_RADIUS_RATIO } from './mouseDynamics';
import { resolveIndicatorStyle, resolveKeySubStyle } from './styleLookup';
import { resolveKeyText, type TextPolicy } from './textPolicy';

/* ------------------------------------------------------------------ */
/*  Instruction types                                                 */
/* ------------------------------------------------------------------ */

export type EditHighlight = 'none' | 'hovered' | 'held' | 'selected';

export interface FontFlags {
    family: string;
    size: number;
    bold: boolean;
    italic: boolean;
    underline: boolean;
    strikethrough: boolean;
}

export interface BackgroundInstruction {
    kind: 'background';
    width: number;
    height: number;
    color: Rgb;
    image: string | null;
}

export interface KeyInstruction {
    kind: 'key';
    elementId: number;
    elementKind: KeyElement['kind'];
    polygon: Point[];
    /** False for boundaries with fewer than three vertices. */
    fillable: boolean;
    pressed: boolean;
    fill: Rgb;
    outline: { color: Rgb; width: number } | null;
    image: string | null;
    text: {
        content: string;
        position: Point;
        color: Rgb;
        font: FontFlags;
    };
    edit: EditHighlight;
}

export interface MouseSpeedIndicatorInstruction {
    kind: 'mouseSpeedIndicator';
    elementId: number;
    center: Point;
    radius: number;
    innerRadius: number;
    innerColor: Rgb;
    outerColor: Rgb;
    outlineWidth: number;
    angle: number;
    magnitude: number;
    normalized: number;
    /** Ball centre; equals `center` while the mouse is still. */
    tip: Point;
    /** Triangle corners flanking the tip, both at `center` while still. */
    base: [Point, Point];
    ballColor: Rgb;
    edit: EditHighlight;
}

export type DrawInstruction = BackgroundInstruction | KeyInstruction | MouseSpeedIndicatorInstruction;

export interface EditOverlay {
    hoveredId: number | null;
    heldId: number | null;
    selectedId: number | null;
}

export interface FrameInput {
    layout: Layout;
    style: Style;
    pressedIds: ReadonlySet<number>;
    modifiers: ModifierState;
    velocity: Vector;
    settings: TextPolicy & Pick<Settings, 'mouseSensitivity'>;
    /** Present only in edit mode. */
    edit?: EditOverlay | null;
}

/* ------------------------------------------------------------------ */
/*  Helpers                                                           */
/* ------------------------------------------------------------------ */

export function fontFlags(font: Font): FontFlags {
    return {
        family: font.family,
        size: font.size,
        bold: (font.style & FontStyle.Bold) !== 0,
        italic: (font.style & FontStyle.Italic) !== 0,
        underline: (font.style & FontStyle.Underline) !== 0,
        strikethrough: (font.style & FontStyle.Strikethrough) !== 0,
    };
}

export function mixColor(from: Rgb, to: Rgb, t: number): Rgb {
    return {
        red: lerp(from.red, to.red, t),
        green: lerp(from.green, to.green, t),
        blue: lerp(from.blue, to.blue, t),
    };
}

/** Hover only shows while nothing is held or selected. */
export function editHighlight(id: number, edit: EditOverlay | null | undefined): EditHighlight {
    if (!edit) return 'none';
    if (edit.heldId === id) return 'held';
    if (edit.selectedId === id) return 'selected';
    if (edit.hoveredId === id && edit.heldId === null && edit.selectedId === null) return 'hovered';
    return 'none';
}

/* ------------------------------------------------------------------ */
/*  Element projection                                                */
/* ------------------------------------------------------------------ */

function projectKey(element: KeyElement, input: FrameInput): KeyInstruction {
    const edit = editHighlight(element.id, input.edit);
    // A key being dragged is drawn loose so the pressed colour never hides the drag.
    const pressed = edit !== 'held' && input.pressedIds.has(element.id);
    const sub = resolveKeySubStyle(input.style, element.id, pressed);
    const content =
        element.kind === 'KeyboardKey'
            ? resolveKeyText(element, input.modifiers, input.settings)
            : element.text;

    return {
        kind: 'key',
        elementId: element.id,
        elementKind: element.kind,
        polygon: element.boundaries.map((vertex) => ({ ...vertex })),
        fillable: element.boundaries.length >= 3,
        pressed,
        fill: { ...sub.background },
        outline: sub.showOutline ? { color: { ...sub.outline }, width: sub.outlineWidth } : null,
        image: sub.backgroundImageFileName ?? null,
        text: {
            content,
            position: { ...element.textPosition },
            color: { ...sub.text },
            font: fontFlags(sub.font),
        },
        edit,
    };
}

function projectIndicator(element: MouseSpeedIndicator, input: FrameInput): MouseSpeedIndicatorInstruction {
    const style = resolveIndicatorStyle(input.style, element.id);
    const geometry = indicatorGeometry(input.velocity, element.radius, input.settings.mouseSensitivity);
    const center = { ...element.location };

    let tip: Point = { ...center };
    let base: [Point, Point] = [{ ...center }, { ...center }];
    const speed = magnitudeOf(input.velocity);
    if (speed > 0 && Number.isFinite(speed)) {
        const along: Vector = { x: input.velocity.x / speed, y: input.velocity.y / speed };
        const across: Vector = { x: -along.y, y: along.x };
        const t = geometry.normalized;
        const half = INNER_RADIUS_RATIO * element.radius;
        tip = translatePoint(center, { x: along.x * geometry.magnitude, y: along.y * geometry.magnitude });
        base = [
            translatePoint(tip, { x: -across.x * half * t, y: -across.y * half * t }),
            translatePoint(tip, { x: across.x * half * t, y: across.y * half * t }),
        ];
    }

    return {
        kind: 'mouseSpeedIndicator',
        elementId: element.id,
        center,
        radius: element.radius,
        innerRadius: geometry.innerRadius,
        innerColor: { ...style.innerColor },
        outerColor: { ...style.outerColor },
        outlineWidth: style.outlineWidth,
        angle: geometry.angle,
        magnitude: geometry.magnitude,
        normalized: geometry.normalized,
        tip,
        base,
        ballColor: mixColor(style.innerColor, style.outerColor, geometry.normalized),
        edit: editHighlight(element.id, input.edit),
    };
}

export function projectElement(element: BoardElement, input: FrameInput): DrawInstruction {
    return element.kind === 'MouseSpeedIndicator' ? projectIndicator(element, input) : projectKey(element, input);
}

/* ------------------------------------------------------------------ */
/*  Frame                                                             */
/* ------------------------------------------------------------------ */

export function projectFrame(input: FrameInput): DrawInstruction[] {
    const background: BackgroundInstruction = {
        kind: 'background',
        width: input.layout.width,
        height: input.layout.height,
        color: { ...input.style.backgroundColor },
        image: input.style.backgroundImageFileName ?? null,
    };
    return [background, ...input.layout.elements.map((element) => projectElement(element, input))];
}
