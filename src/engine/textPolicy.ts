import type { Capitalization, Settings } from '../config/settings';
import type { KeyboardKey } from '../types/board';
import type { ModifierState } from '../types/input';

export type TextPolicy = Pick<
    Settings,
    'capitalization' | 'followShiftForCapsSensitive' | 'followShiftForCapsInsensitive'
>;

export function logicalCaps(capitalization: Capitalization, hardwareCapsLock: boolean): boolean {
    switch (capitalization) {
        case 'followCapsLock':
            return hardwareCapsLock;
        case 'forceOn':
            return true;
        case 'forceOff':
            return false;
    }
}

/**
 * Whether a key shows its shift text. Shift always counts while caps
 * follows the hardware lock; under a forced state the two follow-shift
 * flags decide whether it still does.
 */
export function useShiftText(
    changeOnCaps: boolean,
    modifiers: ModifierState,
    policy: TextPolicy,
): boolean {
    const following = policy.capitalization === 'followCapsLock';
    if (!changeOnCaps) {
        return modifiers.shift && (following || policy.followShiftForCapsInsensitive);
    }
    const caps = logicalCaps(policy.capitalization, modifiers.hardwareCapsLock);
    const shift = modifiers.shift && (following || policy.followShiftForCapsSensitive);
    return caps !== shift;
}

export function resolveKeyText(
    key: Pick<KeyboardKey, 'text' | 'shiftText' | 'changeOnCaps'>,
    modifiers: ModifierState,
    policy: TextPolicy,
): string {
    return useShiftText(key.changeOnCaps, modifiers, policy) ? key.shiftText : key.text;
}
