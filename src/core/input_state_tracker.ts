// src/core/input_state_tracker.ts

import { CONFIG } from '../config';
import type { MoveCommand, SessionEngine } from './engine';
import type { ViewportScaler } from '../rendering/viewport_scaler';
import { logger } from '../utils/logger';

/** Input events in the order the browser delivered them during one frame. */
export type InputEvent =
  | { type: 'quit' }
  | { type: 'resize'; width: number; height: number }
  | { type: 'keydown'; code: string; repeat: boolean }
  | { type: 'keyup'; code: string }
  | { type: 'mousedown'; button: number }
  | { type: 'mouseup'; button: number }
  | { type: 'mousemove'; x: number; y: number }; // Device pixels relative to the canvas

export type ModeName = 'alt' | 'boost' | 'control';

export interface InputState {
  moveUp: boolean;
  moveDown: boolean;
  moveLeft: boolean;
  moveRight: boolean;
  alt: boolean;
  boost: boolean;
  control: boolean;
  autofireActive: boolean;
  mouseTarget: { x: number; y: number }; // Logical space
}

type MovementFlag = 'moveUp' | 'moveDown' | 'moveLeft' | 'moveRight';

// Checked in this order every tick
const MOVEMENT: ReadonlyArray<{ command: MoveCommand; flag: MovementFlag; codes: readonly string[] }> = [
  { command: 'move_up', flag: 'moveUp', codes: CONFIG.KEY_BINDINGS.MOVE_UP },
  { command: 'move_down', flag: 'moveDown', codes: CONFIG.KEY_BINDINGS.MOVE_DOWN },
  { command: 'move_left', flag: 'moveLeft', codes: CONFIG.KEY_BINDINGS.MOVE_LEFT },
  { command: 'move_right', flag: 'moveRight', codes: CONFIG.KEY_BINDINGS.MOVE_RIGHT },
];

const MODES: ReadonlyArray<{ mode: ModeName; codes: readonly string[]; apply: (engine: SessionEngine, on: boolean) => void }> = [
  { mode: 'alt', codes: CONFIG.KEY_BINDINGS.ALT_MODE, apply: (engine, on) => engine.setAltMode(on) },
  { mode: 'boost', codes: CONFIG.KEY_BINDINGS.BOOST_MODE, apply: (engine, on) => engine.setBoostMode(on) },
  { mode: 'control', codes: CONFIG.KEY_BINDINGS.CONTROL_MODE, apply: (engine, on) => engine.setControlMode(on) },
];

/**
 * Turns one frame of raw input into engine calls.
 * Movement is level-triggered (re-asserted every tick while held).
 * Modifiers and firing are edge-triggered, so key repeat never re-issues a call.
 */
export class InputStateTracker {
  private readonly engine: SessionEngine;
  private readonly scaler: ViewportScaler;
  private readonly current: InputState = {
    moveUp: false,
    moveDown: false,
    moveLeft: false,
    moveRight: false,
    alt: false,
    boost: false,
    control: false,
    autofireActive: false,
    mouseTarget: { x: 0, y: 0 },
  };
  // Per-source held flags, used only to find press/release edges
  private fireKeyHeld = false;
  private fireButtonHeld = false;

  constructor(engine: SessionEngine, scaler: ViewportScaler) {
    this.engine = engine;
    this.scaler = scaler;
    logger.debug('[InputStateTracker] Instance created.');
  }

  /** Snapshot of the tracked input state. */
  get state(): Readonly<InputState> {
    return { ...this.current, mouseTarget: { ...this.current.mouseTarget } };
  }

  /**
   * Handles this frame's events, then re-asserts held movement.
   * @param pressedKeys KeyboardEvent.code values held right now.
   * @returns false once a quit was requested; nothing after the quit is processed.
   */
  processTick(events: readonly InputEvent[], pressedKeys: ReadonlySet<string>): boolean {
    for (const event of events) {
      if (!this.handleEvent(event)) {
        logger.info('[InputStateTracker] Quit requested.');
        return false;
      }
    }

    for (const { command, flag, codes } of MOVEMENT) {
      const held = codes.some(code => pressedKeys.has(code));
      this.current[flag] = held;
      if (held) {
        this.engine.sendCommand(command);
      }
    }
    return true;
  }

  private handleEvent(event: InputEvent): boolean {
    switch (event.type) {
      case 'quit':
        return false;
      case 'resize':
        this.scaler.resize(event.width, event.height);
        return true;
      case 'keydown':
        if (CONFIG.KEY_BINDINGS.QUIT.includes(event.code)) return false;
        this.handleKeyDown(event.code, event.repeat);
        return true;
      case 'keyup':
        this.handleKeyUp(event.code);
        return true;
      case 'mousedown':
        if (event.button === CONFIG.FIRE_MOUSE_BUTTON && !this.fireButtonHeld) {
          this.fireButtonHeld = true;
          this.pressFire();
        }
        return true;
      case 'mouseup':
        if (event.button === CONFIG.FIRE_MOUSE_BUTTON && this.fireButtonHeld) {
          this.fireButtonHeld = false;
          this.releaseFire();
        }
        return true;
      case 'mousemove': {
        const scale = this.scaler.scaleFactor;
        const target = { x: event.x / scale, y: event.y / scale };
        this.current.mouseTarget = target;
        this.engine.setMouseTarget(target.x, target.y);
        return true;
      }
    }
  }

  // Auto-repeats are never an edge, even after a mode was switched off under a held key
  private handleKeyDown(code: string, repeat: boolean): void {
    if (repeat) return;
    if (CONFIG.KEY_BINDINGS.FIRE.includes(code)) {
      if (!this.fireKeyHeld) {
        this.fireKeyHeld = true;
        this.pressFire();
      }
      return;
    }
    const binding = MODES.find(({ codes }) => codes.includes(code));
    if (binding && !this.current[binding.mode]) {
      this.current[binding.mode] = true;
      logger.debug(`[InputStateTracker] ${binding.mode} mode on.`);
      binding.apply(this.engine, true);
    }
  }

  private handleKeyUp(code: string): void {
    if (CONFIG.KEY_BINDINGS.FIRE.includes(code)) {
      if (this.fireKeyHeld) {
        this.fireKeyHeld = false;
        this.releaseFire();
      }
      return;
    }
    const binding = MODES.find(({ codes }) => codes.includes(code));
    if (binding && this.current[binding.mode]) {
      this.current[binding.mode] = false;
      logger.debug(`[InputStateTracker] ${binding.mode} mode off.`);
      binding.apply(this.engine, false);
    }
  }

  private pressFire(): void {
    this.current.autofireActive = true;
    this.engine.startAutofire();
  }

  // Both sources share autofireActive; releasing one clears it even if the other is held
  private releaseFire(): void {
    this.current.autofireActive = false;
    this.engine.stopAutofire();
    this.engine.startShootingTracking();
    this.engine.stopShootingTracking();
  }
}
