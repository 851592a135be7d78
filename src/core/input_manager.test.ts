// src/core/input_manager.test.ts

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { InputManager } from './input_manager';

// Mock logger
vi.mock('../utils/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

// Helper to simulate key events
function simulateKeyEvent(type: 'keydown' | 'keyup', code: string, repeat: boolean = false) {
  const event = new KeyboardEvent(type, { code, repeat, bubbles: true, cancelable: true });
  vi.spyOn(event, 'preventDefault');
  window.dispatchEvent(event);
  return event;
}

function simulateMouseEvent(type: 'mousedown' | 'mouseup' | 'mousemove', init: MouseEventInit) {
  window.dispatchEvent(new MouseEvent(type, { bubbles: true, ...init }));
}

describe('InputManager', () => {
  let inputManager: InputManager;
  let surfaceOrigin: Mock<() => { left: number; top: number }>;

  beforeEach(() => {
    vi.clearAllMocks();
    surfaceOrigin = vi.fn(() => ({ left: 10, top: 20 }));
    inputManager = new InputManager(surfaceOrigin);
  });

  afterEach(() => {
    inputManager.stopListening();
    vi.restoreAllMocks();
  });

  it('startListening should add window listeners', () => {
    const addEventListenerSpy = vi.spyOn(window, 'addEventListener');
    inputManager.startListening();
    ['keydown', 'keyup', 'mousedown', 'mouseup', 'mousemove', 'resize', 'blur', 'pagehide'].forEach(type => {
      expect(addEventListenerSpy).toHaveBeenCalledWith(type, expect.any(Function));
    });
  });

  it('should ignore events before listening starts', () => {
    simulateKeyEvent('keydown', 'KeyW');
    expect(inputManager.drain()).toEqual([]);
    expect(inputManager.pressedKeys.size).toBe(0);
  });

  it('should queue key events in arrival order and track held keys', () => {
    inputManager.startListening();
    simulateKeyEvent('keydown', 'KeyW');
    simulateKeyEvent('keydown', 'ShiftLeft');
    simulateKeyEvent('keyup', 'KeyW');

    expect(inputManager.pressedKeys.has('ShiftLeft')).toBe(true);
    expect(inputManager.pressedKeys.has('KeyW')).toBe(false);
    expect(inputManager.drain()).toEqual([
      { type: 'keydown', code: 'KeyW', repeat: false },
      { type: 'keydown', code: 'ShiftLeft', repeat: false },
      { type: 'keyup', code: 'KeyW' },
    ]);
  });

  it('drain should empty the queue but keep held keys', () => {
    inputManager.startListening();
    simulateKeyEvent('keydown', 'ArrowUp');
    inputManager.drain();
    expect(inputManager.drain()).toEqual([]);
    expect(inputManager.pressedKeys.has('ArrowUp')).toBe(true);
  });

  it('should flag a second key-down for a held key as a repeat', () => {
    inputManager.startListening();
    simulateKeyEvent('keydown', 'Space');
    simulateKeyEvent('keydown', 'Space');
    simulateKeyEvent('keydown', 'KeyD', true);
    expect(inputManager.drain()).toEqual([
      { type: 'keydown', code: 'Space', repeat: false },
      { type: 'keydown', code: 'Space', repeat: true },
      { type: 'keydown', code: 'KeyD', repeat: true },
    ]);
  });

  it('should prevent default browser action for bound keys only', () => {
    inputManager.startListening();
    expect(simulateKeyEvent('keydown', 'Space').preventDefault).toHaveBeenCalled();
    expect(simulateKeyEvent('keydown', 'AltLeft').preventDefault).toHaveBeenCalled();
    expect(simulateKeyEvent('keyup', 'ArrowDown').preventDefault).toHaveBeenCalled();
    expect(simulateKeyEvent('keydown', 'KeyQ').preventDefault).not.toHaveBeenCalled();
  });

  it('should report mouse positions relative to the surface origin', () => {
    inputManager.startListening();
    simulateMouseEvent('mousemove', { clientX: 110, clientY: 70 });
    simulateMouseEvent('mousedown', { button: 0 });
    simulateMouseEvent('mouseup', { button: 0 });
    expect(inputManager.drain()).toEqual([
      { type: 'mousemove', x: 100, y: 50 },
      { type: 'mousedown', button: 0 },
      { type: 'mouseup', button: 0 },
    ]);
    expect(surfaceOrigin).toHaveBeenCalledTimes(1);
  });

  it('should queue the window size on resize', () => {
    inputManager.startListening();
    window.dispatchEvent(new Event('resize'));
    expect(inputManager.drain()).toEqual([{ type: 'resize', width: window.innerWidth, height: window.innerHeight }]);
  });

  it('should queue a quit when the page is hidden', () => {
    inputManager.startListening();
    window.dispatchEvent(new Event('pagehide'));
    expect(inputManager.drain()).toEqual([{ type: 'quit' }]);
  });

  it('should release everything held when the window loses focus', () => {
    inputManager.startListening();
    simulateKeyEvent('keydown', 'ShiftLeft');
    simulateKeyEvent('keydown', 'Space');
    simulateMouseEvent('mousedown', { button: 0 });
    inputManager.drain();

    window.dispatchEvent(new Event('blur'));

    expect(inputManager.drain()).toEqual([
      { type: 'keyup', code: 'ShiftLeft' },
      { type: 'keyup', code: 'Space' },
      { type: 'mouseup', button: 0 },
    ]);
    expect(inputManager.pressedKeys.size).toBe(0);
  });

  it('stopListening should remove listeners and clear state', () => {
    const removeEventListenerSpy = vi.spyOn(window, 'removeEventListener');
    inputManager.startListening();
    simulateKeyEvent('keydown', 'KeyW');

    inputManager.stopListening();

    expect(removeEventListenerSpy).toHaveBeenCalledWith('keydown', expect.any(Function));
    expect(removeEventListenerSpy).toHaveBeenCalledWith('pagehide', expect.any(Function));
    expect(inputManager.pressedKeys.size).toBe(0);
    expect(inputManager.drain()).toEqual([]);

    simulateKeyEvent('keydown', 'KeyS');
    expect(inputManager.drain()).toEqual([]);
  });
});
