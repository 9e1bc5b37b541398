import assert from 'node:assert/strict';
import test from 'node:test';
import {
    applyCommand,
    applyStyleCommand,
    commandTarget,
    patchElement,
    validateLayoutSize,
    validateRectangleSize,
    type LayoutCommand,
    type StyleCommand,
} from '../src/engine/editCommands.ts';
import { SchemaError } from '../src/schema/errors.ts';
import type { Layout, MouseKey, MouseSpeedIndicator } from '../src/types/board.ts';
import { defaultStyle } from '../src/types/style.ts';

const button: MouseKey = {
    kind: 'MouseKey',
    id: 1,
    boundaries: [],
    textPosition: { x: 0, y: 0 },
    keyCodes: [0],
    text: 'L',
};

const ring: MouseSpeedIndicator = { kind: 'MouseSpeedIndicator', id: 2, location: { x: 5, y: 5 }, radius: 4 };

const layout: Layout = { width: 50, height: 40, elements: [button, ring] };

test('commands apply forward and backward as splices', () => {
    const add: LayoutCommand = { kind: 'add', index: 1, element: { ...button, id: 3 } };
    const added = applyCommand(layout, add, 'forward');
    assert.deepEqual(added.elements.map((element) => element.id), [1, 3, 2]);
    assert.deepEqual(applyCommand(added, add, 'backward'), layout);

    const remove: LayoutCommand = { kind: 'remove', index: 0, element: button };
    const removed = applyCommand(layout, remove, 'forward');
    assert.deepEqual(removed.elements.map((element) => element.id), [2]);
    assert.deepEqual(applyCommand(removed, remove, 'backward'), layout);

    const grown = { ...ring, radius: 9 };
    const replace: LayoutCommand = { kind: 'replace', index: 1, before: ring, after: grown };
    assert.deepEqual(applyCommand(layout, replace, 'forward').elements[1], grown);

    const resize: LayoutCommand = { kind: 'resizeLayout', before: { width: 50, height: 40 }, after: { width: 80, height: 60 } };
    const resized = applyCommand(layout, resize, 'forward');
    assert.equal(resized.width, 80);
    assert.equal(applyCommand(resized, resize, 'backward').height, 40);
});

test('applyCommand never mutates its input', () => {
    applyCommand(layout, { kind: 'remove', index: 0, element: button }, 'forward');
    assert.equal(layout.elements.length, 2);
});

test('patchElement applies only the fields that fit the element', () => {
    const patched = patchElement(button, { text: 'Left', keyCodes: [0, 1], radius: 10, shiftText: 'X' });
    assert.deepEqual(patched, { ...button, text: 'Left', keyCodes: [0, 1] });

    const moved = patchElement(ring, { location: { x: 9, y: 9 }, text: 'ignored' });
    assert.deepEqual(moved, { ...ring, location: { x: 9, y: 9 } });

    assert.throws(() => patchElement(ring, { radius: 0 }), SchemaError);
});

test('validateLayoutSize rejects non-positive sizes', () => {
    assert.doesNotThrow(() => validateLayoutSize({ width: 1, height: 1 }));
    assert.throws(() => validateLayoutSize({ width: 0, height: 1 }), /^SchemaError: Width: Width must be greater than 0$/);
});

test('style commands swap whole documents', () => {
    const before = defaultStyle();
    const after = { ...before, backgroundColor: { red: 9, green: 9, blue: 9 } };
    const command: StyleCommand = { kind: 'style', before, after };
    assert.equal(applyStyleCommand(command, 'forward'), after);
    assert.equal(applyStyleCommand(command, 'backward'), before);
    assert.equal(commandTarget(command), null);
});

test('validateRectangleSize accepts zero but not negative sizes', () => {
    assert.doesNotThrow(() => validateRectangleSize({ width: 0, height: 0 }));
    assert.throws(() => validateRectangleSize({ width: 1, height: -2 }), /^SchemaError: Height: Height must not be negative$/);
});
