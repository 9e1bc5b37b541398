import assert from 'node:assert/strict';
import test from 'node:test';
import {
    editHighlight,
    projectFrame,
    type FrameInput,
    type KeyInstruction,
    type MouseSpeedIndicatorInstruction,
} from '../src/engine/projector.ts';
import type { KeyboardKey, Layout, MouseSpeedIndicator } from '../src/types/board.ts';
import { defaultStyle, FontStyle, type KeySubStyle, type Style } from '../src/types/style.ts';

const key: KeyboardKey = {
    kind: 'KeyboardKey',
    id: 1,
    boundaries: [
        { x: 0, y: 0 },
        { x: 20, y: 0 },
        { x: 20, y: 20 },
    ],
    textPosition: { x: 4, y: 4 },
    keyCodes: [65],
    text: 'a',
    shiftText: 'A',
    changeOnCaps: true,
};

const indicator: MouseSpeedIndicator = {
    kind: 'MouseSpeedIndicator',
    id: 2,
    location: { x: 100, y: 100 },
    radius: 20,
};

const layout: Layout = { width: 300, height: 200, elements: [key, indicator] };

const redPressed: KeySubStyle = {
    background: { red: 255, green: 0, blue: 0 },
    text: { red: 1, green: 2, blue: 3 },
    outline: { red: 9, green: 9, blue: 9 },
    showOutline: true,
    outlineWidth: 3,
    font: { family: 'Mono', size: 14, style: FontStyle.Italic | FontStyle.Strikethrough },
    backgroundImageFileName: 'pressed.png',
};

function styleWithPressedOverride(): Style {
    return {
        ...defaultStyle(),
        elementStyles: [{ key: 1, value: { kind: 'KeyStyle', pressed: redPressed } }],
    };
}

function frameInput(overrides: Partial<FrameInput> = {}): FrameInput {
    return {
        layout,
        style: defaultStyle(),
        pressedIds: new Set(),
        modifiers: { shift: false, hardwareCapsLock: false },
        velocity: { x: 0, y: 0 },
        settings: {
            capitalization: 'followCapsLock',
            followShiftForCapsSensitive: true,
            followShiftForCapsInsensitive: true,
            mouseSensitivity: 50,
        },
        ...overrides,
    };
}

function keyOf(frame: ReturnType<typeof projectFrame>): KeyInstruction {
    const found = frame.find((instruction): instruction is KeyInstruction => instruction.kind === 'key');
    assert.ok(found);
    return found;
}

function indicatorOf(frame: ReturnType<typeof projectFrame>): MouseSpeedIndicatorInstruction {
    const found = frame.find(
        (instruction): instruction is MouseSpeedIndicatorInstruction => instruction.kind === 'mouseSpeedIndicator',
    );
    assert.ok(found);
    return found;
}

test('a frame starts with the background and follows layout order', () => {
    const frame = projectFrame(frameInput());
    assert.deepEqual(
        frame.map((instruction) => instruction.kind),
        ['background', 'key', 'mouseSpeedIndicator'],
    );
    assert.deepEqual(frame[0], {
        kind: 'background',
        width: 300,
        height: 200,
        color: { red: 0, green: 0, blue: 100 },
        image: null,
    });
});

test('a loose key uses the default loose style', () => {
    const instruction = keyOf(projectFrame(frameInput()));
    assert.deepEqual(instruction, {
        kind: 'key',
        elementId: 1,
        elementKind: 'KeyboardKey',
        polygon: key.boundaries,
        fillable: true,
        pressed: false,
        fill: { red: 100, green: 100, blue: 100 },
        outline: null,
        image: null,
        text: {
            content: 'a',
            position: { x: 4, y: 4 },
            color: { red: 0, green: 0, blue: 0 },
            font: {
                family: 'Courier New',
                size: 10,
                bold: false,
                italic: false,
                underline: false,
                strikethrough: false,
            },
        },
        edit: 'none',
    });
});

test('a pressed key takes the override pressed style, and loose inherits the default', () => {
    const pressed = keyOf(projectFrame(frameInput({ style: styleWithPressedOverride(), pressedIds: new Set([1]) })));
    assert.equal(pressed.pressed, true);
    assert.deepEqual(pressed.fill, { red: 255, green: 0, blue: 0 });
    assert.deepEqual(pressed.outline, { color: { red: 9, green: 9, blue: 9 }, width: 3 });
    assert.equal(pressed.image, 'pressed.png');
    assert.equal(pressed.text.font.italic, true);
    assert.equal(pressed.text.font.strikethrough, true);
    assert.equal(pressed.text.font.bold, false);

    const loose = keyOf(projectFrame(frameInput({ style: styleWithPressedOverride() })));
    assert.deepEqual(loose.fill, { red: 100, green: 100, blue: 100 });
});

test('an override of the wrong kind falls back to the default', () => {
    const style: Style = {
        ...defaultStyle(),
        elementStyles: [
            {
                key: 1,
                value: {
                    kind: 'MouseSpeedIndicatorStyle',
                    innerColor: { red: 1, green: 1, blue: 1 },
                    outerColor: { red: 2, green: 2, blue: 2 },
                    outlineWidth: 5,
                },
            },
        ],
    };
    const instruction = keyOf(projectFrame(frameInput({ style, pressedIds: new Set([1]) })));
    assert.deepEqual(instruction.fill, { red: 255, green: 255, blue: 255 });
});

test('text follows the modifiers', () => {
    const frame = projectFrame(frameInput({ modifiers: { shift: false, hardwareCapsLock: true } }));
    assert.equal(keyOf(frame).text.content, 'A');
});

test('degenerate polygons are projected but not fillable', () => {
    const flat: KeyboardKey = { ...key, boundaries: [{ x: 0, y: 0 }, { x: 5, y: 5 }] };
    const frame = projectFrame(frameInput({ layout: { ...layout, elements: [flat] } }));
    assert.equal(keyOf(frame).fillable, false);
});

test('the held element projects loose while edited', () => {
    const edit = { hoveredId: 1, heldId: 1, selectedId: null };
    const instruction = keyOf(projectFrame(frameInput({ pressedIds: new Set([1]), edit })));
    assert.equal(instruction.pressed, false);
    assert.equal(instruction.edit, 'held');
});

test('hover shows only while nothing is held or selected', () => {
    assert.equal(editHighlight(1, { hoveredId: 1, heldId: null, selectedId: null }), 'hovered');
    assert.equal(editHighlight(1, { hoveredId: 1, heldId: null, selectedId: 2 }), 'none');
    assert.equal(editHighlight(2, { hoveredId: 1, heldId: null, selectedId: 2 }), 'selected');
    assert.equal(editHighlight(1, null), 'none');
});

test('a still mouse collapses the pointer onto the centre', () => {
    const instruction = indicatorOf(projectFrame(frameInput()));
    assert.deepEqual(instruction.tip, { x: 100, y: 100 });
    assert.deepEqual(instruction.base, [
        { x: 100, y: 100 },
        { x: 100, y: 100 },
    ]);
    assert.equal(instruction.innerRadius, 4);
    assert.deepEqual(instruction.ballColor, { red: 100, green: 100, blue: 100 });
});

test('a fast mouse points at the ring in the direction of motion', () => {
    const instruction = indicatorOf(projectFrame(frameInput({ velocity: { x: 1e9, y: 0 } })));
    assert.equal(instruction.magnitude, 20);
    assert.equal(instruction.normalized, 1);
    assert.equal(instruction.angle, 0);
    assert.deepEqual(instruction.tip, { x: 120, y: 100 });
    assert.deepEqual(instruction.base, [
        { x: 120, y: 96 },
        { x: 120, y: 104 },
    ]);
    assert.deepEqual(instruction.ballColor, { red: 255, green: 255, blue: 255 });
});

test('projection is deterministic', () => {
    const input = frameInput({ style: styleWithPressedOverride(), pressedIds: new Set([1]), velocity: { x: 30, y: -40 } });
    assert.deepEqual(projectFrame(input), projectFrame(input));
});
