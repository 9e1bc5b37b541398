/**
 * Keycode catalogue.
 *
 * Keyboard codes follow Windows virtual-key numbering, which is what
 * legacy layout files store. Mouse buttons and scroll directions live in
 * their own small namespaces; a layout element only ever matches codes
 * from the namespace of its kind.
 */
import { readFileSync } from 'node:fs';
import { z } from 'zod';

export const KEY_SHIFT = 16;
export const KEY_CAPS_LOCK = 20;
export const KEY_LEFT_SHIFT = 160;
export const KEY_RIGHT_SHIFT = 161;

export const SHIFT_KEYCODES: readonly number[] = [KEY_SHIFT, KEY_LEFT_SHIFT, KEY_RIGHT_SHIFT];

export const MouseButton = {
    Left: 0,
    Right: 1,
    Middle: 2,
    Back: 3,
    Forward: 4,
} as const;

export const ScrollDirection = {
    Up: 0,
    Down: 1,
    Right: 2,
    Left: 3,
} as const;

export type ScrollDirectionCode = (typeof ScrollDirection)[keyof typeof ScrollDirection];

const CatalogueSchema = z.object({
    keys: z.record(z.string()),
    mouseButtons: z.record(z.string()),
    scrollDirections: z.record(z.string()),
});

type Catalogue = z.infer<typeof CatalogueSchema>;

let catalogue: Catalogue | null = null;

function loadCatalogue(): Catalogue {
    if (!catalogue) {
        const text = readFileSync(new URL('../data/keycodes.json', import.meta.url), 'utf8');
        catalogue = CatalogueSchema.parse(JSON.parse(text));
    }
    return catalogue;
}

export function keycodeName(code: number): string {
    return loadCatalogue().keys[String(code)] ?? `Key#${code}`;
}

export function mouseButtonName(button: number): string {
    return loadCatalogue().mouseButtons[String(button)] ?? `Button#${button}`;
}

export function scrollDirectionName(direction: number): string {
    return loadCatalogue().scrollDirections[String(direction)] ?? `Scroll#${direction}`;
}

export function isScrollDirection(value: number): value is ScrollDirectionCode {
    return value === 0 || value === 1 || value === 2 || value === 3;
}
