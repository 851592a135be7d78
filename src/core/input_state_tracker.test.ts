// src/core/input_state_tracker.test.ts

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InputStateTracker, type InputEvent } from './input_state_tracker';
import type { SessionEngine } from './engine';
import { ViewportScaler } from '../rendering/viewport_scaler';

vi.mock('../utils/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

/** Engine double that records every mutation call as "name(args)". */
function createRecordingEngine() {
  const calls: string[] = [];
  const record = (name: string) =>
    vi.fn((...args: unknown[]) => {
      calls.push(args.length > 0 ? `${name}(${args.join(', ')})` : name);
    });
  const engine = {
    sendCommand: record('sendCommand'),
    setMouseTarget: record('setMouseTarget'),
    startAutofire: record('startAutofire'),
    stopAutofire: record('stopAutofire'),
    startShootingTracking: record('startShootingTracking'),
    stopShootingTracking: record('stopShootingTracking'),
    setAltMode: record('setAltMode'),
    setBoostMode: record('setBoostMode'),
    setControlMode: record('setControlMode'),
    update: vi.fn(),
    getRenderData: vi.fn(() => ({})),
  } satisfies SessionEngine;
  return { engine, calls };
}

const down = (code: string, repeat = false): InputEvent => ({ type: 'keydown', code, repeat });
const up = (code: string): InputEvent => ({ type: 'keyup', code });
const noKeys: ReadonlySet<string> = new Set();

describe('InputStateTracker', () => {
  let calls: string[];
  let engine: ReturnType<typeof createRecordingEngine>['engine'];
  let scaler: ViewportScaler;
  let tracker: InputStateTracker;

  beforeEach(() => {
    vi.clearAllMocks();
    ({ engine, calls } = createRecordingEngine());
    scaler = new ViewportScaler(1600, 1200); // scale 2
    tracker = new InputStateTracker(engine, scaler);
  });

  describe('movement', () => {
    it('should send move_up once per tick while the up key is held', () => {
      const held = new Set(['KeyW']);
      for (let tick = 0; tick < 3; tick++) {
        expect(tracker.processTick([], held)).toBe(true);
      }
      expect(engine.sendCommand).toHaveBeenCalledTimes(3);
      expect(calls).toEqual(['sendCommand(move_up)', 'sendCommand(move_up)', 'sendCommand(move_up)']);
    });

    it('should ignore key repeat events for movement', () => {
      tracker.processTick([down('ArrowUp'), down('ArrowUp', true), down('ArrowUp', true)], new Set(['ArrowUp']));
      expect(calls).toEqual(['sendCommand(move_up)']);
    });

    it('should assert each held direction in up, down, left, right order after events', () => {
      tracker.processTick([{ type: 'mousemove', x: 2, y: 4 }], new Set(['ArrowRight', 'KeyS', 'KeyW']));
      expect(calls).toEqual([
        'setMouseTarget(1, 2)',
        'sendCommand(move_up)',
        'sendCommand(move_down)',
        'sendCommand(move_right)',
      ]);
    });

    it('should send one command when both bindings for a direction are held', () => {
      tracker.processTick([], new Set(['KeyA', 'ArrowLeft']));
      expect(calls).toEqual(['sendCommand(move_left)']);
      expect(tracker.state.moveLeft).toBe(true);
      expect(tracker.state.moveRight).toBe(false);
    });
  });

  describe('modifiers', () => {
    it('should switch boost on once regardless of repeats or the other variant', () => {
      tracker.processTick([down('ShiftLeft'), down('ShiftLeft', true), down('ShiftRight')], noKeys);
      expect(calls).toEqual(['setBoostMode(true)']);
      expect(tracker.state.boost).toBe(true);
    });

    it('should switch a mode off on the first key-up only', () => {
      tracker.processTick([down('AltLeft')], noKeys);
      tracker.processTick([up('AltRight'), up('AltLeft')], noKeys);
      expect(calls).toEqual(['setAltMode(true)', 'setAltMode(false)']);
      expect(tracker.state.alt).toBe(false);
    });

    it('should not switch a mode back on from a repeat of the other held variant', () => {
      tracker.processTick([down('ShiftLeft'), down('ShiftRight')], noKeys);
      tracker.processTick([up('ShiftLeft')], noKeys);
      tracker.processTick([down('ShiftRight', true), down('ShiftRight', true)], noKeys);
      expect(calls).toEqual(['setBoostMode(true)', 'setBoostMode(false)']);
      expect(tracker.state.boost).toBe(false);
    });

    it('should not call the engine for a key-up while the mode is already off', () => {
      tracker.processTick([up('ControlLeft')], noKeys);
      expect(calls).toEqual([]);
    });

    it('should track each mode independently', () => {
      tracker.processTick([down('ControlRight'), down('AltLeft'), up('ControlRight')], noKeys);
      expect(calls).toEqual(['setControlMode(true)', 'setAltMode(true)', 'setControlMode(false)']);
      expect(tracker.state.alt).toBe(true);
      expect(tracker.state.control).toBe(false);
    });
  });

  describe('firing', () => {
    it('should fire a tracking shot for a press and release within one tick', () => {
      tracker.processTick([down('Space'), up('Space')], noKeys);
      expect(calls).toEqual(['startAutofire', 'stopAutofire', 'startShootingTracking', 'stopShootingTracking']);
      expect(tracker.state.autofireActive).toBe(false);
    });

    it('should not restart autofire on key repeat', () => {
      tracker.processTick([down('Space')], noKeys);
      tracker.processTick([down('Space', true), down('Space', true)], noKeys);
      expect(calls).toEqual(['startAutofire']);
      expect(tracker.state.autofireActive).toBe(true);
    });

    it('should fire from the left mouse button and ignore other buttons', () => {
      tracker.processTick(
        [
          { type: 'mousedown', button: 2 },
          { type: 'mousedown', button: 0 },
          { type: 'mouseup', button: 2 },
          { type: 'mouseup', button: 0 },
        ],
        noKeys
      );
      expect(calls).toEqual(['startAutofire', 'stopAutofire', 'startShootingTracking', 'stopShootingTracking']);
    });

    it('should ignore a release without a matching press', () => {
      tracker.processTick([up('Space'), { type: 'mouseup', button: 0 }], noKeys);
      expect(calls).toEqual([]);
    });

    it('should let either source clear the shared autofire flag', () => {
      tracker.processTick([{ type: 'mousedown', button: 0 }, down('Space')], noKeys);
      expect(calls).toEqual(['startAutofire', 'startAutofire']);

      tracker.processTick([up('Space')], noKeys);
      // Mouse is still held but the flag is already off
      expect(tracker.state.autofireActive).toBe(false);

      tracker.processTick([{ type: 'mouseup', button: 0 }], noKeys);
      expect(engine.stopAutofire).toHaveBeenCalledTimes(2);
      expect(engine.startShootingTracking).toHaveBeenCalledTimes(2);
      expect(engine.stopShootingTracking).toHaveBeenCalledTimes(2);
    });
  });

  describe('mouse aim', () => {
    it('should convert device pixels to logical coordinates', () => {
      tracker.processTick([{ type: 'mousemove', x: 400, y: 300 }], noKeys);
      expect(engine.setMouseTarget).toHaveBeenCalledWith(200, 150);
      expect(tracker.state.mouseTarget).toEqual({ x: 200, y: 150 });
    });

    it('should forward every motion event without throttling', () => {
      tracker.processTick(
        [
          { type: 'mousemove', x: 10, y: 10 },
          { type: 'mousemove', x: 20, y: 20 },
          { type: 'mousemove', x: 30, y: 30 },
        ],
        noKeys
      );
      expect(calls).toEqual(['setMouseTarget(5, 5)', 'setMouseTarget(10, 10)', 'setMouseTarget(15, 15)']);
    });

    it('should use the scale in effect after a resize earlier in the same tick', () => {
      tracker.processTick([{ type: 'resize', width: 800, height: 600 }, { type: 'mousemove', x: 400, y: 300 }], noKeys);
      expect(calls).toEqual(['setMouseTarget(400, 300)']);
    });
  });

  describe('quit and resize', () => {
    it('should stop on Escape without processing anything after it', () => {
      const running = tracker.processTick(
        [{ type: 'mousemove', x: 20, y: 10 }, down('Escape'), down('AltLeft')],
        new Set(['KeyW'])
      );
      expect(running).toBe(false);
      expect(calls).toEqual(['setMouseTarget(10, 5)']);
    });

    it('should stop on a quit event with no engine calls', () => {
      expect(tracker.processTick([{ type: 'quit' }, down('Space')], new Set(['KeyD']))).toBe(false);
      expect(calls).toEqual([]);
    });

    it('should delegate resize to the viewport scaler', () => {
      const before = tracker.state;
      tracker.processTick([{ type: 'resize', width: 1000, height: 500 }], noKeys);
      expect(scaler.viewport.width).toBe(1000);
      expect(scaler.viewport.height).toBe(750);
      expect(scaler.scaleFactor).toBe(1.25);
      expect(calls).toEqual([]);
      expect(tracker.state).toEqual(before);
    });
  });

  it('state should hand out a copy of the mouse target', () => {
    tracker.state.mouseTarget.x = 99;
    expect(tracker.state.mouseTarget.x).toBe(0);
  });
});
