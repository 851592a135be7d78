// src/core/input_manager.ts

import { CONFIG } from '../config';
import { logger } from '../utils/logger';
import type { InputEvent } from './input_state_tracker';

/** Page position of the drawing surface's top-left corner, e.g. from getBoundingClientRect(). */
export type SurfaceOrigin = () => { left: number; top: number };

/**
 * Collects browser input between frames.
 * Events are queued in arrival order and handed over once per tick by drain();
 * the set of physically held keys is available for level-triggered checks.
 */
export class InputManager {
  // KeyboardEvent.code values currently held down
  private keysPressed: Set<string> = new Set();
  private buttonsPressed: Set<number> = new Set();
  private queue: InputEvent[] = [];
  private isListening: boolean = false;
  private readonly boundCodes: Set<string>;
  private readonly surfaceOrigin: SurfaceOrigin;

  constructor(surfaceOrigin: SurfaceOrigin) {
    this.surfaceOrigin = surfaceOrigin;
    this.boundCodes = new Set(Object.values(CONFIG.KEY_BINDINGS).flat());
    logger.debug('[InputManager] Instance created.');
  }

  /** Starts listening for keyboard, mouse and window events. */
  startListening(): void {
    if (this.isListening) return;
    logger.info('[InputManager] Starting input listeners.');
    window.addEventListener('keydown', this._handleKeyDown);
    window.addEventListener('keyup', this._handleKeyUp);
    window.addEventListener('mousedown', this._handleMouseDown);
    window.addEventListener('mouseup', this._handleMouseUp);
    window.addEventListener('mousemove', this._handleMouseMove);
    window.addEventListener('resize', this._handleResize);
    window.addEventListener('blur', this._handleBlur);
    window.addEventListener('pagehide', this._handlePageHide);
    this.isListening = true;
  }

  /** Stops listening and forgets everything held or queued. */
  stopListening(): void {
    if (!this.isListening) return;
    logger.info('[InputManager] Stopping input listeners.');
    window.removeEventListener('keydown', this._handleKeyDown);
    window.removeEventListener('keyup', this._handleKeyUp);
    window.removeEventListener('mousedown', this._handleMouseDown);
    window.removeEventListener('mouseup', this._handleMouseUp);
    window.removeEventListener('mousemove', this._handleMouseMove);
    window.removeEventListener('resize', this._handleResize);
    window.removeEventListener('blur', this._handleBlur);
    window.removeEventListener('pagehide', this._handlePageHide);
    this.clearState();
    this.isListening = false;
  }

  clearState(): void {
    logger.debug('[InputManager] Clearing held keys and queued events.');
    this.keysPressed.clear();
    this.buttonsPressed.clear();
    this.queue = [];
  }

  /** Hands over the events received since the previous call. */
  drain(): InputEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  get pressedKeys(): ReadonlySet<string> {
    return this.keysPressed;
  }

  // --- Private Event Handlers ---

  private _handleKeyDown = (e: KeyboardEvent): void => {
    if (!this.isListening) return;
    const alreadyHeld = this.keysPressed.has(e.code);
    this.keysPressed.add(e.code);
    this.queue.push({ type: 'keydown', code: e.code, repeat: e.repeat || alreadyHeld });
    // Keeps Space from scrolling and Alt from focusing the menu bar
    if (this.boundCodes.has(e.code)) {
      e.preventDefault();
    }
  };

  private _handleKeyUp = (e: KeyboardEvent): void => {
    if (!this.isListening) return;
    this.keysPressed.delete(e.code);
    this.queue.push({ type: 'keyup', code: e.code });
    if (this.boundCodes.has(e.code)) {
      e.preventDefault();
    }
  };

  private _handleMouseDown = (e: MouseEvent): void => {
    if (!this.isListening) return;
    this.buttonsPressed.add(e.button);
    this.queue.push({ type: 'mousedown', button: e.button });
  };

  private _handleMouseUp = (e: MouseEvent): void => {
    if (!this.isListening) return;
    this.buttonsPressed.delete(e.button);
    this.queue.push({ type: 'mouseup', button: e.button });
  };

  private _handleMouseMove = (e: MouseEvent): void => {
    if (!this.isListening) return;
    const origin = this.surfaceOrigin();
    this.queue.push({ type: 'mousemove', x: e.clientX - origin.left, y: e.clientY - origin.top });
  };

  private _handleResize = (): void => {
    if (!this.isListening) return;
    this.queue.push({ type: 'resize', width: window.innerWidth, height: window.innerHeight });
  };

  // Key-up events never arrive for keys released while the window is unfocused
  private _handleBlur = (): void => {
    if (!this.isListening) return;
    if (this.keysPressed.size > 0 || this.buttonsPressed.size > 0) {
      logger.info(
        `[InputManager] Focus lost, releasing ${this.keysPressed.size} key(s) and ${this.buttonsPressed.size} button(s).`
      );
    }
    this.keysPressed.forEach(code => this.queue.push({ type: 'keyup', code }));
    this.buttonsPressed.forEach(button => this.queue.push({ type: 'mouseup', button }));
    this.keysPressed.clear();
    this.buttonsPressed.clear();
  };

  private _handlePageHide = (): void => {
    if (!this.isListening) return;
    this.queue.push({ type: 'quit' });
  };
}
