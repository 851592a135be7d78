// src/rendering/renderer_facade.ts

import { DrawingContext, type CanvasTarget } from './drawing_context';
import { SceneRenderer } from './scene_renderer';
import type { ViewportScaler, ViewportState } from './viewport_scaler';
import type { DrawCommand } from './draw_commands';
import type { SceneSnapshot } from '../core/scene_snapshot';
import { logger } from '../utils/logger';

/** Obtains a 2D context for a canvas; null when the platform has none. */
export type ContextFactory = (canvas: HTMLCanvasElement) => CanvasTarget | null;

const defaultContextFactory: ContextFactory = canvas => canvas.getContext('2d', { alpha: false });

/**
 * Facade class for the rendering system.
 * Owns the display canvas, turns snapshots into draw commands and paints them.
 * A resize swaps in a freshly sized canvas element instead of resizing the old one.
 */
export class RendererFacade {
  private canvas: HTMLCanvasElement;
  private drawingContext: DrawingContext;
  private readonly sceneRenderer: SceneRenderer;
  private readonly scaler: ViewportScaler;
  private readonly contextFactory: ContextFactory;

  constructor(canvasId: string, scaler: ViewportScaler, contextFactory: ContextFactory = defaultContextFactory) {
    logger.info('[RendererFacade] Constructing instance...');
    const canvas = document.getElementById(canvasId);
    if (!(canvas instanceof HTMLCanvasElement)) {
      const msg = `Canvas element "#${canvasId}" not found or not supported.`;
      logger.error(`[RendererFacade] ${msg}`);
      throw new Error(msg);
    }

    this.scaler = scaler;
    this.contextFactory = contextFactory;
    this.sceneRenderer = new SceneRenderer();
    this.canvas = canvas;
    this.drawingContext = this.prepareSurface(canvas, scaler.viewport);
    this.centre();

    scaler.onSurfaceReplaced(viewport => this.replaceSurface(viewport));
    logger.info('[RendererFacade] Construction complete.');
  }

  /** The canvas currently on screen. Changes after every resize. */
  getCanvas(): HTMLCanvasElement {
    return this.canvas;
  }

  /** Renders one frame from a validated snapshot. */
  present(snapshot: SceneSnapshot): DrawCommand[] {
    const commands = this.sceneRenderer.render(snapshot, this.scaler.viewport);
    this.drawingContext.execute(commands);
    return commands;
  }

  /** Re-centres the canvas inside the window. Call on window resize. */
  centre(): void {
    this.canvas.style.marginLeft = `${Math.max(0, (window.innerWidth - this.canvas.width) / 2)}px`;
    this.canvas.style.marginTop = `${Math.max(0, (window.innerHeight - this.canvas.height) / 2)}px`;
  }

  private replaceSurface(viewport: ViewportState): void {
    const replacement = document.createElement('canvas');
    replacement.id = this.canvas.id;
    replacement.tabIndex = this.canvas.tabIndex;
    // Context must exist before the old surface is discarded
    const drawingContext = this.prepareSurface(replacement, viewport);
    this.canvas.replaceWith(replacement);
    this.canvas = replacement;
    this.drawingContext = drawingContext;
    this.centre();
    logger.info(`[RendererFacade.replaceSurface] New surface ${viewport.width}x${viewport.height}px.`);
  }

  private prepareSurface(canvas: HTMLCanvasElement, viewport: ViewportState): DrawingContext {
    canvas.width = viewport.width;
    canvas.height = viewport.height;
    const ctx = this.contextFactory(canvas);
    if (!ctx) {
      const msg = 'Failed to get 2D rendering context from canvas.';
      logger.error(`[RendererFacade] ${msg}`);
      throw new Error(msg);
    }
    return new DrawingContext(ctx, viewport.width, viewport.height);
  }
}
