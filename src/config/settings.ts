/**
 * Runtime settings consumed by the engine.
 *
 * The host application owns persistence; the engine only validates and
 * fills defaults. Every field is optional on input.
 */
import { z } from 'zod';
import { ConfigError, firstIssue, formatIssuePath } from '../schema/errors';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../lib/logger';

export const CapitalizationSchema = z.enum(['followCapsLock', 'forceOn', 'forceOff']);

export type Capitalization = z.infer<typeof CapitalizationSchema>;

export const DisplayChoiceSchema = z.object({
    id: z.number().int().nonnegative(),
    primary: z.boolean(),
});

export type DisplayChoice = z.infer<typeof DisplayChoiceSchema>;

const millis = z.number().int().nonnegative();

const LogLevelSchema = z.custom<LogLevel>(isLogLevel, {
    message: `Expected one of ${LOG_LEVELS.join(', ')}`,
});

export const SettingsSchema = z.object({
    capitalization: CapitalizationSchema.default('followCapsLock'),
    /** Under a forced capitalization, still honour Shift for keys with `changeOnCaps`. */
    followShiftForCapsSensitive: z.boolean().default(true),
    /** Under a forced capitalization, still honour Shift for keys without `changeOnCaps`. */
    followShiftForCapsInsensitive: z.boolean().default(true),
    mouseSensitivity: z.number().nonnegative().default(50),
    /** Exponential smoothing weight of the previous velocity, in [0, 1). */
    mouseSmoothing: z.number().min(0).lt(1).default(0),
    /** Treat the cursor's offset from the display centre as its velocity. */
    mouseFromCenter: z.boolean().default(false),
    displayChoice: DisplayChoiceSchema.default({ id: 0, primary: true }),
    /** Minimum time a key stays highlighted after its chord breaks. */
    minPressTime: millis.default(50),
    scrollHoldTime: millis.default(100),
    /** Mouse samples closer together than this are dropped. */
    minMouseSampleInterval: millis.default(10),
    /** Move the label together with the element in the editor. */
    updateTextPosition: z.boolean().default(true),
    logLevel: LogLevelSchema.default('warn'),
});

export type Settings = z.infer<typeof SettingsSchema>;

export type SettingsInput = z.input<typeof SettingsSchema>;

export function defaultSettings(): Settings {
    return SettingsSchema.parse({});
}

export function parseSettings(input: unknown): Settings {
    const result = SettingsSchema.safeParse(input ?? {});
    if (!result.success) {
        const issue = firstIssue(result.error.issues);
        throw new ConfigError(issue.message, formatIssuePath(issue.path));
    }
    return result.data;
}

export function loadSettingsJson(text: string): Settings {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Invalid JSON: ${reason}`);
    }
    return parseSettings(raw);
}

export function mergeSettings(current: Settings, patch: Partial<Settings>): Settings {
    return parseSettings({ ...current, ...patch });
}
