import assert from 'node:assert/strict';
import test from 'node:test';
import { SchemaError } from '../src/schema/errors.ts';
import { decodeStyle, encodeStyle, parseStyleJson, stringifyStyle } from '../src/schema/styleCodec.ts';
import { defaultStyle, FontStyle } from '../src/types/style.ts';

function subStyleJson(red: number, extra: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        Background: { Red: red, Green: 0, Blue: 0 },
        Text: { Red: 0, Green: 0, Blue: 0 },
        Outline: { Red: 0, Green: 255, Blue: 0 },
        ShowOutline: true,
        OutlineWidth: 2,
        Font: { FontFamily: 'Mono', Size: 12, Style: FontStyle.Bold | FontStyle.Underline },
        ...extra,
    };
}

function styleJson(elementStyles: unknown[], extra: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        BackgroundColor: { Red: 1, Green: 2, Blue: 3 },
        DefaultKeyStyle: { Loose: subStyleJson(10), Pressed: subStyleJson(20) },
        DefaultMouseSpeedIndicatorStyle: {
            InnerColor: { Red: 0, Green: 0, Blue: 0 },
            OuterColor: { Red: 255, Green: 255, Blue: 255 },
            OutlineWidth: 1,
        },
        ElementStyles: elementStyles,
        ...extra,
    };
}

function captureSchemaError(run: () => unknown): SchemaError {
    try {
        run();
    } catch (error) {
        if (error instanceof SchemaError) return error;
        throw error;
    }
    assert.fail('expected a SchemaError');
}

test('decodes defaults and both override variants', () => {
    const style = decodeStyle(
        styleJson([
            { Key: 1, Value: { __type: 'KeyStyle', Pressed: subStyleJson(99) } },
            {
                Key: 2,
                Value: {
                    __type: 'MouseSpeedIndicatorStyle',
                    InnerColor: { Red: 5, Green: 5, Blue: 5 },
                    OuterColor: { Red: 6, Green: 6, Blue: 6 },
                    OutlineWidth: 3,
                },
            },
        ]),
    );

    assert.deepEqual(style.backgroundColor, { red: 1, green: 2, blue: 3 });
    assert.deepEqual(style.defaultKeyStyle.loose.font, { family: 'Mono', size: 12, style: 0b0101 });
    assert.equal(style.elementStyles.length, 2);

    const [keyEntry, indicatorEntry] = style.elementStyles;
    assert.equal(keyEntry.key, 1);
    assert.equal(keyEntry.value.kind, 'KeyStyle');
    if (keyEntry.value.kind === 'KeyStyle') {
        assert.equal('loose' in keyEntry.value, false);
        assert.equal(keyEntry.value.pressed?.background.red, 99);
    }
    assert.deepEqual(indicatorEntry.value, {
        kind: 'MouseSpeedIndicatorStyle',
        innerColor: { red: 5, green: 5, blue: 5 },
        outerColor: { red: 6, green: 6, blue: 6 },
        outlineWidth: 3,
    });
});

test('round trip keeps duplicate keys, null halves and absent halves apart', () => {
    const source = styleJson(
        [
            { Key: 1, Value: { __type: 'KeyStyle', Loose: null } },
            { Key: 1, Value: { __type: 'KeyStyle', Pressed: subStyleJson(7) } },
            { Key: 3, Value: { __type: 'KeyStyle' } },
        ],
        { BackgroundImageFileName: null },
    );
    const style = decodeStyle(source);
    assert.equal(style.backgroundImageFileName, null);
    assert.deepEqual(encodeStyle(style), source);
    assert.deepEqual(decodeStyle(JSON.parse(stringifyStyle(style))), style);
});

test('BackgroundImageFileName on a sub-style survives a round trip', () => {
    const source = styleJson([
        { Key: 4, Value: { __type: 'KeyStyle', Loose: subStyleJson(1, { BackgroundImageFileName: 'key.png' }) } },
    ]);
    const style = decodeStyle(source);
    const entry = style.elementStyles[0].value;
    assert.equal(entry.kind === 'KeyStyle' ? entry.loose?.backgroundImageFileName : undefined, 'key.png');
    assert.deepEqual(encodeStyle(style), source);
});

test('__type is the first key of every encoded override', () => {
    const style = decodeStyle(styleJson([{ Key: 1, Value: { __type: 'KeyStyle', Loose: subStyleJson(1) } }]));
    assert.equal(Object.keys(encodeStyle(style).ElementStyles[0].Value)[0], '__type');
});

test('rejects font styles with bits above strikethrough', () => {
    const broken = styleJson([], {
        DefaultKeyStyle: {
            Loose: subStyleJson(10),
            Pressed: subStyleJson(20, { Font: { FontFamily: 'Mono', Size: 12, Style: 16 } }),
        },
    });
    const error = captureSchemaError(() => decodeStyle(broken));
    assert.equal(error.path, 'DefaultKeyStyle.Pressed.Font.Style');
    assert.equal(error.message, 'DefaultKeyStyle.Pressed.Font.Style: Extraneous bits set');
});

test('reports override errors under ElementStyles[i].Value', () => {
    const unknown = captureSchemaError(() => decodeStyle(styleJson([{ Key: 0, Value: { __type: 'Gradient' } }])));
    assert.equal(unknown.path, 'ElementStyles[0].Value.__type');

    const nested = captureSchemaError(() =>
        decodeStyle(
            styleJson([
                { Key: 0, Value: { __type: 'KeyStyle' } },
                { Key: 1, Value: { __type: 'KeyStyle', Loose: subStyleJson(1, { ShowOutline: 1 }) } },
            ]),
        ),
    );
    assert.equal(nested.path, 'ElementStyles[1].Value.Loose.ShowOutline');

    const key = captureSchemaError(() => decodeStyle(styleJson([{ Key: -1, Value: { __type: 'KeyStyle' } }])));
    assert.equal(key.path, 'ElementStyles[0].Key');
});

test('the default style encodes and decodes to itself', () => {
    const style = defaultStyle();
    assert.deepEqual(parseStyleJson(stringifyStyle(style)), style);
    assert.deepEqual(style.backgroundColor, { red: 0, green: 0, blue: 100 });
    assert.deepEqual(style.defaultKeyStyle.loose.font, { family: 'Courier New', size: 10, style: 0 });
});
