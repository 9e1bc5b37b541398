import assert from 'node:assert/strict';
import test from 'node:test';
import { logicalCaps, resolveKeyText, useShiftText, type TextPolicy } from '../src/engine/textPolicy.ts';

const key = { text: 'a', shiftText: 'A', changeOnCaps: true };
const digit = { text: '1', shiftText: '!', changeOnCaps: false };

const defaults: TextPolicy = {
    capitalization: 'followCapsLock',
    followShiftForCapsSensitive: true,
    followShiftForCapsInsensitive: true,
};

const up = { shift: false, hardwareCapsLock: false };
const shifted = { shift: true, hardwareCapsLock: false };
const caps = { shift: false, hardwareCapsLock: true };
const both = { shift: true, hardwareCapsLock: true };

test('logicalCaps follows the policy', () => {
    assert.equal(logicalCaps('followCapsLock', true), true);
    assert.equal(logicalCaps('followCapsLock', false), false);
    assert.equal(logicalCaps('forceOn', false), true);
    assert.equal(logicalCaps('forceOff', true), false);
});

test('caps-sensitive keys XOR caps with shift by default', () => {
    assert.equal(resolveKeyText(key, up, defaults), 'a');
    assert.equal(resolveKeyText(key, shifted, defaults), 'A');
    assert.equal(resolveKeyText(key, caps, defaults), 'A');
    assert.equal(resolveKeyText(key, both, defaults), 'a');
});

test('shift always counts while caps follows the hardware lock', () => {
    const policy = { ...defaults, followShiftForCapsSensitive: false, followShiftForCapsInsensitive: false };
    assert.equal(resolveKeyText(key, shifted, policy), 'A');
    assert.equal(resolveKeyText(key, both, policy), 'a');
    assert.equal(resolveKeyText(digit, shifted, policy), '!');
});

test('under a forced state the follow-shift flags decide whether shift counts', () => {
    const forcedOn = { ...defaults, capitalization: 'forceOn' as const };
    assert.equal(resolveKeyText(key, shifted, { ...forcedOn, followShiftForCapsSensitive: false }), 'A');
    assert.equal(resolveKeyText(key, up, { ...forcedOn, followShiftForCapsSensitive: false }), 'A');

    const forcedOff = { ...defaults, capitalization: 'forceOff' as const };
    assert.equal(resolveKeyText(digit, shifted, forcedOff), '!');
    assert.equal(resolveKeyText(digit, shifted, { ...forcedOff, followShiftForCapsInsensitive: false }), '1');
    assert.equal(resolveKeyText(key, both, { ...forcedOff, followShiftForCapsSensitive: false }), 'a');
});

test('forced capitalization overrides the hardware state', () => {
    assert.equal(resolveKeyText(key, up, { ...defaults, capitalization: 'forceOn' }), 'A');
    assert.equal(resolveKeyText(key, caps, { ...defaults, capitalization: 'forceOff' }), 'a');
    assert.equal(resolveKeyText(key, shifted, { ...defaults, capitalization: 'forceOn' }), 'a');
});

test('caps-insensitive keys follow shift only', () => {
    assert.equal(resolveKeyText(digit, up, defaults), '1');
    assert.equal(resolveKeyText(digit, caps, defaults), '1');
    assert.equal(resolveKeyText(digit, shifted, defaults), '!');
    assert.equal(useShiftText(false, both, defaults), true);
});
