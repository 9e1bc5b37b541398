/**
 * Two-level style lookup: the element's override entry first, then the
 * style's defaults. Overrides are partial per sub-style, so a missing
 * `pressed` or `loose` half inherits independently.
 */
import type { ElementKind } from '../types/board';
import type {
    ElementStyle,
    KeyStyle,
    KeySubStyle,
    MouseSpeedIndicatorStyle,
    Style,
} from '../types/style';

/** Last entry for an id wins, matching how the legacy tool builds its map. */
export function findElementStyle(style: Style, id: number): ElementStyle | undefined {
    for (let i = style.elementStyles.length - 1; i >= 0; i--) {
        const entry = style.elementStyles[i];
        if (entry.key === id) return entry.value;
    }
    return undefined;
}

export function findKeyStyle(style: Style, id: number): KeyStyle | undefined {
    const override = findElementStyle(style, id);
    return override?.kind === 'KeyStyle' ? override : undefined;
}

export function resolveKeySubStyle(style: Style, id: number, pressed: boolean): KeySubStyle {
    const override = findKeyStyle(style, id);
    if (pressed) {
        return override?.pressed ?? style.defaultKeyStyle.pressed;
    }
    return override?.loose ?? style.defaultKeyStyle.loose;
}

export function resolveIndicatorStyle(style: Style, id: number): MouseSpeedIndicatorStyle {
    const override = findElementStyle(style, id);
    if (override?.kind === 'MouseSpeedIndicatorStyle') {
        return {
            innerColor: override.innerColor,
            outerColor: override.outerColor,
            outlineWidth: override.outlineWidth,
        };
    }
    return style.defaultMouseSpeedIndicatorStyle;
}

export function expectedStyleKind(kind: ElementKind): ElementStyle['kind'] {
    return kind === 'MouseSpeedIndicator' ? 'MouseSpeedIndicatorStyle' : 'KeyStyle';
}

/** Style entries whose variant does not fit the element they point at. */
export function findMismatchedStyles(
    style: Style,
    elements: readonly { id: number; kind: ElementKind }[],
): number[] {
    const kinds = new Map(elements.map((element) => [element.id, element.kind]));
    const mismatched: number[] = [];
    for (const entry of style.elementStyles) {
        const kind = kinds.get(entry.key);
        if (kind && expectedStyleKind(kind) !== entry.value.kind) {
            mismatched.push(entry.key);
        }
    }
    return mismatched;
}

/** Replaces every entry for `id` with a single one, appended last. */
export function withElementStyle(style: Style, id: number, value: ElementStyle): Style {
    return {
        ...style,
        elementStyles: [
            ...style.elementStyles.filter((entry) => entry.key !== id),
            { key: id, value },
        ],
    };
}

export function withoutElementStyle(style: Style, id: number): Style {
    return {
        ...style,
        elementStyles: style.elementStyles.filter((entry) => entry.key !== id),
    };
}
