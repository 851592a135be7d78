// src/core/frame_loop.ts

import { CONFIG } from '../config';
import type { SessionEngine } from './engine';
import type { InputEvent, InputStateTracker } from './input_state_tracker';
import { parseSceneSnapshot, type SceneSnapshot } from './scene_snapshot';
import { logger } from '../utils/logger';

/** Where the loop pulls this frame's input from (InputManager in the browser). */
export interface InputSource {
  drain(): InputEvent[];
  readonly pressedKeys: ReadonlySet<string>;
}

/** Where the loop sends each validated snapshot (RendererFacade in the browser). */
export interface SnapshotPresenter {
  present(snapshot: SceneSnapshot): unknown;
}

export type FrameScheduler = (callback: (now: number) => void) => number;
export type FrameCanceller = (handle: number) => void;

export type LoopState = 'idle' | 'running' | 'stopped';

export interface FrameLoopOptions {
  engine: SessionEngine;
  input: InputSource;
  tracker: InputStateTracker;
  presenter: SnapshotPresenter;
  requestFrame?: FrameScheduler;
  cancelFrame?: FrameCanceller;
  /** Called once when the loop ends on a quit request or stop(). */
  onStop?: () => void;
  /** Called once when a tick throws; the loop is already stopped. */
  onFatal?: (error: unknown) => void;
}

/**
 * Drives the session: input, engine step, snapshot, draw.
 * Ticks are scheduled on animation frames and paced to CONFIG.TARGET_FPS;
 * frames arriving early are skipped. Once stopped, the loop never restarts.
 */
export class FrameLoop {
  private readonly engine: SessionEngine;
  private readonly input: InputSource;
  private readonly tracker: InputStateTracker;
  private readonly presenter: SnapshotPresenter;
  private readonly requestFrame: FrameScheduler;
  private readonly cancelFrame: FrameCanceller;
  private readonly onStop: () => void;
  private readonly onFatal: (error: unknown) => void;
  private readonly frameIntervalMs = 1000 / CONFIG.TARGET_FPS;

  private loopState: LoopState = 'idle';
  private lastTickTime = 0;
  private frameHandle: number | null = null;
  private ticks = 0;

  constructor(options: FrameLoopOptions) {
    this.engine = options.engine;
    this.input = options.input;
    this.tracker = options.tracker;
    this.presenter = options.presenter;
    this.requestFrame = options.requestFrame ?? (callback => window.requestAnimationFrame(callback));
    this.cancelFrame = options.cancelFrame ?? (handle => window.cancelAnimationFrame(handle));
    this.onStop = options.onStop ?? (() => {});
    this.onFatal = options.onFatal ?? (() => {});
    logger.debug(`[FrameLoop] Instance created (frame interval ${this.frameIntervalMs.toFixed(2)}ms).`);
  }

  get state(): LoopState {
    return this.loopState;
  }

  /** Number of ticks that ran a full step. */
  get completedTicks(): number {
    return this.ticks;
  }

  start(now: number = performance.now()): void {
    if (this.loopState !== 'idle') {
      logger.warn(`[FrameLoop.start] Ignored, loop is ${this.loopState}.`);
      return;
    }
    logger.info('[FrameLoop] Starting loop...');
    this.loopState = 'running';
    this.lastTickTime = now;
    this.scheduleNext();
  }

  stop(): void {
    if (this.loopState === 'stopped') return;
    this.halt();
    logger.info(`[FrameLoop] Loop stopped after ${this.ticks} tick(s).`);
    this.onStop();
  }

  /** Animation frame callback. Runs one step when a frame interval has passed. */
  tick = (now: number): void => {
    this.frameHandle = null;
    if (this.loopState !== 'running') return;

    const elapsedMs = now - this.lastTickTime;
    if (elapsedMs < this.frameIntervalMs - CONFIG.FRAME_TOLERANCE_MS) {
      this.scheduleNext();
      return;
    }
    this.lastTickTime = now;

    try {
      this.step(Math.max(0, elapsedMs) / 1000);
    } catch (loopError) {
      const errorMessage = loopError instanceof Error ? loopError.message : String(loopError);
      const errorStack = loopError instanceof Error ? loopError.stack ?? 'No stack available' : 'N/A';
      logger.error(`[FrameLoop.tick] CRITICAL Error during frame ${this.ticks + 1}: ${errorMessage}`, { stack: errorStack });
      this.halt();
      this.onFatal(loopError);
      return;
    }

    if (this.loopState === 'running') {
      this.scheduleNext();
    }
  };

  private step(dtSeconds: number): void {
    const events = this.input.drain();
    this.handleClientKeys(events);

    if (!this.tracker.processTick(events, this.input.pressedKeys)) {
      this.stop();
      return;
    }

    this.engine.update(dtSeconds);
    const snapshot = parseSceneSnapshot(this.engine.getRenderData());
    this.presenter.present(snapshot);
    this.ticks++;
  }

  // Keys handled by the client itself, never forwarded to the engine
  private handleClientKeys(events: readonly InputEvent[]): void {
    const wantsLog = events.some(
      event => event.type === 'keydown' && !event.repeat && CONFIG.KEY_BINDINGS.DOWNLOAD_LOG.includes(event.code)
    );
    if (wantsLog) {
      logger.info('[FrameLoop] Log download requested.');
      logger.downloadLogFile();
    }
  }

  private scheduleNext(): void {
    this.frameHandle = this.requestFrame(this.tick);
  }

  private halt(): void {
    this.loopState = 'stopped';
    if (this.frameHandle !== null) {
      this.cancelFrame(this.frameHandle);
      this.frameHandle = null;
    }
  }
}
