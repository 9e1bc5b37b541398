/**
 * Mouse dynamics: velocity sampling and the speed-indicator pointer.
 *
 * Velocity is measured in px/s between the two latest accepted samples,
 * or from the display centre when `fromCenter` is on. Samples closer
 * than `minSampleInterval` are dropped; a zero or negative interval
 * zeroes the velocity for that sample instead of dividing by it.
 */
import type { DisplayChoice, Settings } from '../config/settings';
import type { Point } from '../types/board';
import { angleOf, clamp, magnitudeOf, type Vector } from './geometry';

export const SAMPLE_CAPACITY = 16;
/** Maps sensitivity × speed (px/s) onto the tanh curve. */
export const SENSITIVITY_SCALE = 1e-5;
export const INNER_RADIUS_RATIO = 0.2;

export interface MouseSample {
    position: Point;
    time: number;
}

export interface Display {
    id: number;
    x: number;
    y: number;
    width: number;
    height: number;
    isPrimary: boolean;
}

export type DynamicsOptions = Pick<Settings, 'mouseFromCenter' | 'mouseSmoothing' | 'minMouseSampleInterval'> & {
    /** Reference point used when `mouseFromCenter` is on. */
    center: Point;
};

export interface IndicatorGeometry {
    angle: number;
    /** Pointer length, always within [0, radius]. */
    magnitude: number;
    /** `magnitude / radius`, in [0, 1]. */
    normalized: number;
    innerRadius: number;
}

export interface DynamicsSnapshot {
    velocity: Vector;
    speed: number;
    angle: number;
    position: Point | null;
}

export function displayCenter(displays: readonly Display[], choice: DisplayChoice): Point {
    const display =
        displays.find((candidate) => candidate.id === choice.id) ??
        displays.find((candidate) => candidate.isPrimary) ??
        displays[0];
    if (!display) return { x: 0, y: 0 };
    return { x: display.x + display.width / 2, y: display.y + display.height / 2 };
}

function finiteOrZero(value: number): number {
    return Number.isFinite(value) ? value : 0;
}

export class MouseDynamics {
    private readonly samples: MouseSample[] = [];
    private velocity: Vector = { x: 0, y: 0 };
    private options: DynamicsOptions;

    constructor(options: DynamicsOptions) {
        this.options = { ...options };
    }

    configure(options: Partial<DynamicsOptions>): void {
        this.options = { ...this.options, ...options };
    }

    reset(): void {
        this.samples.length = 0;
        this.velocity = { x: 0, y: 0 };
    }

    recordPosition(position: Point, time: number): void {
        const previous = this.samples[this.samples.length - 1];
        if (!previous) {
            this.push({ position, time });
            return;
        }

        const dt = time - previous.time;
        if (dt <= 0) {
            this.velocity = { x: 0, y: 0 };
            this.push({ position, time });
            return;
        }
        if (dt < this.options.minMouseSampleInterval) return;

        const reference = this.options.mouseFromCenter ? this.options.center : previous.position;
        const seconds = dt / 1000;
        const raw: Vector = {
            x: finiteOrZero((position.x - reference.x) / seconds),
            y: finiteOrZero((position.y - reference.y) / seconds),
        };
        const weight = this.options.mouseSmoothing;
        this.velocity = {
            x: this.velocity.x * weight + raw.x * (1 - weight),
            y: this.velocity.y * weight + raw.y * (1 - weight),
        };
        this.push({ position, time });
    }

    /** Relative motion, e.g. from raw HID deltas; integrates onto the last position. */
    recordDelta(dx: number, dy: number, time: number): void {
        const previous = this.samples[this.samples.length - 1];
        const origin = previous?.position ?? { x: 0, y: 0 };
        if (!previous) {
            this.push({ position: origin, time });
        }
        this.recordPosition({ x: origin.x + dx, y: origin.y + dy }, time);
    }

    getVelocity(): Vector {
        return { ...this.velocity };
    }

    getSamples(): readonly MouseSample[] {
        return this.samples;
    }

    snapshot(): DynamicsSnapshot {
        const last = this.samples[this.samples.length - 1];
        return {
            velocity: this.getVelocity(),
            speed: magnitudeOf(this.velocity),
            angle: angleOf(this.velocity),
            position: last ? last.position : null,
        };
    }

    private push(sample: MouseSample): void {
        this.samples.push(sample);
        if (this.samples.length > SAMPLE_CAPACITY) {
            this.samples.shift();
        }
    }
}

export function indicatorGeometry(velocity: Vector, radius: number, sensitivity: number): IndicatorGeometry {
    const speed = finiteOrZero(magnitudeOf(velocity));
    const normalized = clamp(Math.tanh(speed * sensitivity * SENSITIVITY_SCALE), 0, 1);
    return {
        angle: finiteOrZero(angleOf(velocity)),
        magnitude: clamp(radius * normalized, 0, radius),
        normalized,
        innerRadius: radius * INNER_RADIUS_RATIO,
    };
}
