/**
 * Normalized input events, as delivered by an external capture source.
 *
 * `time` is a monotonic millisecond timestamp. When absent the session
 * stamps the event with its own clock as it is dispatched.
 */

export interface KeyEvent {
  kind: 'key';
  keycode: number;
  pressed: boolean;
  time?: number;
}

export interface ButtonEvent {
  kind: 'button';
  button: number;
  pressed: boolean;
  time?: number;
}

export interface ScrollEvent {
  kind: 'scroll';
  direction: number;
  time?: number;
}

export interface MouseMoveEvent {
  kind: 'mouseMove';
  x: number;
  y: number;
  time?: number;
}

export interface MouseDeltaEvent {
  kind: 'mouseDelta';
  dx: number;
  dy: number;
  time?: number;
}

/** Lock-state report from sources that can read it. */
export interface CapsLockEvent {
  kind: 'capsLock';
  on: boolean;
  time?: number;
}

export type InputEvent =
  | KeyEvent
  | ButtonEvent
  | ScrollEvent
  | MouseMoveEvent
  | MouseDeltaEvent
  | CapsLockEvent;

export type InputListener = (event: InputEvent) => void;

/** Anything that can push events at the session, e.g. a native hook bridge. */
export interface InputSource {
  subscribe(listener: InputListener): () => void;
}

export interface ModifierState {
  shift: boolean;
  hardwareCapsLock: boolean;
}
