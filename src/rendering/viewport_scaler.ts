// src/rendering/viewport_scaler.ts

import { CONFIG } from '../config';
import { logger } from '../utils/logger';

/** Device size of the drawing surface and the factors derived from it. */
export interface ViewportState {
  readonly width: number;
  readonly height: number;
  readonly scaleFactor: number; // width / logicalWidth
  readonly logicalWidth: number;
  readonly logicalHeight: number;
  readonly fontSizePx: number; // HUD glyph size, follows scaleFactor
  readonly font: string; // CanvasRenderingContext2D.font value
}

export type SurfaceListener = (viewport: ViewportState) => void;

/**
 * Keeps the display at a fixed aspect ratio and derives the logical-to-device scale.
 * Every size change produces a fresh ViewportState and asks listeners to
 * replace the drawing surface rather than resize it in place.
 */
export class ViewportScaler {
  private state: ViewportState;
  private readonly surfaceListeners: SurfaceListener[] = [];

  constructor(width: number, height: number) {
    this.state = ViewportScaler.buildState(width, height);
    logger.debug(`[ViewportScaler] Instance created at ${this.state.width}x${this.state.height}.`);
  }

  /**
   * Largest 4:3 size that uses the configured share of the binding monitor dimension.
   * @param monitorWidth Usable monitor width in device pixels.
   * @param monitorHeight Usable monitor height in device pixels.
   */
  static initialSize(monitorWidth: number, monitorHeight: number): { width: number; height: number } {
    const aspect = CONFIG.ASPECT_RATIO;
    const fill = CONFIG.MONITOR_FILL_FRACTION;
    let width: number;
    let height: number;
    if (monitorWidth / monitorHeight > aspect) {
      // Wider than 4:3, height is the limit
      height = monitorHeight * fill;
      width = height * aspect;
    } else {
      width = monitorWidth * fill;
      height = width / aspect;
    }
    return { width: Math.trunc(width), height: Math.trunc(height) };
  }

  static forMonitor(monitorWidth: number, monitorHeight: number): ViewportScaler {
    const { width, height } = ViewportScaler.initialSize(monitorWidth, monitorHeight);
    return new ViewportScaler(width, height);
  }

  get viewport(): ViewportState {
    return this.state;
  }

  get scaleFactor(): number {
    return this.state.scaleFactor;
  }

  /** Registers a callback run after every accepted resize with the new state. */
  onSurfaceReplaced(listener: SurfaceListener): void {
    this.surfaceListeners.push(listener);
  }

  /**
   * Applies a requested window size, correcting it back to the aspect ratio.
   * Too wide: width wins and height follows. Too tall: height wins.
   */
  resize(requestedWidth: number, requestedHeight: number): ViewportState {
    if (!Number.isFinite(requestedWidth) || !Number.isFinite(requestedHeight) || requestedWidth <= 0 || requestedHeight <= 0) {
      logger.warn(`[ViewportScaler.resize] Ignoring invalid size ${requestedWidth}x${requestedHeight}.`);
      return this.state;
    }

    const aspect = CONFIG.ASPECT_RATIO;
    const actualRatio = requestedWidth / requestedHeight;
    let width = requestedWidth;
    let height = requestedHeight;
    if (actualRatio > aspect) {
      height = width / aspect;
    } else if (actualRatio < aspect) {
      width = height * aspect;
    }

    this.state = ViewportScaler.buildState(Math.trunc(width), Math.trunc(height));
    logger.info(
      `[ViewportScaler.resize] Requested ${requestedWidth}x${requestedHeight}, using ${this.state.width}x${this.state.height} (scale ${this.state.scaleFactor.toFixed(3)}).`
    );
    this.surfaceListeners.forEach(listener => listener(this.state));
    return this.state;
  }

  private static buildState(width: number, height: number): ViewportState {
    const scaleFactor = width / CONFIG.LOGICAL_WIDTH;
    const fontSizePx = Math.max(1, Math.floor(CONFIG.FONT_SIZE_BASE * scaleFactor));
    return Object.freeze({
      width,
      height,
      scaleFactor,
      logicalWidth: CONFIG.LOGICAL_WIDTH,
      logicalHeight: CONFIG.LOGICAL_HEIGHT,
      fontSizePx,
      font: `${fontSizePx}px ${CONFIG.FONT_FAMILY}`,
    });
  }
}
