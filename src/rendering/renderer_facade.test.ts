// src/rendering/renderer_facade.test.ts

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RendererFacade } from './renderer_facade';
import { ViewportScaler } from './viewport_scaler';
import type { CanvasTarget } from './drawing_context';
import type { SceneSnapshot } from '../core/scene_snapshot';

vi.mock('../utils/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

class StubContext implements CanvasTarget {
  fillStyle: string | CanvasGradient | CanvasPattern = '';
  strokeStyle: string | CanvasGradient | CanvasPattern = '';
  lineWidth = 1;
  lineCap: CanvasLineCap = 'butt';
  lineJoin: CanvasLineJoin = 'miter';
  font = '';
  textBaseline: CanvasTextBaseline = 'alphabetic';
  fillRect = vi.fn();
  beginPath = vi.fn();
  closePath = vi.fn();
  moveTo = vi.fn();
  lineTo = vi.fn();
  arc = vi.fn();
  fill = vi.fn();
  stroke = vi.fn();
  fillText = vi.fn();
}

const snapshot: SceneSnapshot = {
  playerX: 400,
  playerY: 300,
  playerRotation: -Math.PI / 2,
  playerVx: 0,
  playerVy: 0,
  cameraX: 0,
  cameraY: 0,
  leftGunAngle: 0,
  rightGunAngle: 0,
  leftGunSpool: 0,
  rightGunSpool: 0,
  stars: [],
  projectiles: [],
};

describe('RendererFacade', () => {
  let contexts: StubContext[];
  const contextFactory = vi.fn((): CanvasTarget => {
    const ctx = new StubContext();
    contexts.push(ctx);
    return ctx;
  });

  beforeEach(() => {
    vi.clearAllMocks();
    contexts = [];
    document.body.innerHTML = '<canvas id="display" tabindex="0"></canvas>';
  });

  afterEach(() => {
    document.body.innerHTML = '';
  });

  it('should size the existing canvas to the viewport', () => {
    const scaler = new ViewportScaler(1000, 750);
    const facade = new RendererFacade('display', scaler, contextFactory);
    expect(facade.getCanvas()).toBe(document.getElementById('display'));
    expect(facade.getCanvas().width).toBe(1000);
    expect(facade.getCanvas().height).toBe(750);
  });

  it('should throw when the canvas element is missing', () => {
    expect(() => new RendererFacade('nowhere', new ViewportScaler(800, 600), contextFactory)).toThrow(
      'Canvas element "#nowhere" not found or not supported.'
    );
  });

  it('should throw when the element is not a canvas', () => {
    document.body.innerHTML = '<div id="display"></div>';
    expect(() => new RendererFacade('display', new ViewportScaler(800, 600), contextFactory)).toThrow(
      'Canvas element "#display" not found or not supported.'
    );
  });

  it('should throw when no 2D context is available', () => {
    expect(() => new RendererFacade('display', new ViewportScaler(800, 600), () => null)).toThrow(
      'Failed to get 2D rendering context from canvas.'
    );
  });

  it('should swap in a new canvas element on resize', () => {
    const scaler = new ViewportScaler(800, 600);
    const facade = new RendererFacade('display', scaler, contextFactory);
    const original = facade.getCanvas();

    scaler.resize(1600, 1200);

    const replacement = facade.getCanvas();
    expect(replacement).not.toBe(original);
    expect(original.isConnected).toBe(false);
    expect(document.getElementById('display')).toBe(replacement);
    expect(replacement.width).toBe(1600);
    expect(replacement.height).toBe(1200);
    expect(contextFactory).toHaveBeenCalledTimes(2);
  });

  it('should paint frames through the newest context only', () => {
    const scaler = new ViewportScaler(800, 600);
    const facade = new RendererFacade('display', scaler, contextFactory);
    scaler.resize(1000, 750);

    const commands = facade.present(snapshot);

    expect(commands[0]).toEqual({ kind: 'clear', layer: 'background', colour: { r: 20, g: 20, b: 30 } });
    expect(contexts[0].fillRect).not.toHaveBeenCalled();
    expect(contexts[1].fillRect).toHaveBeenCalledWith(0, 0, 1000, 750);
  });
});
