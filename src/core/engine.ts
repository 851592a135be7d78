// src/core/engine.ts

/** Directional intents the engine accepts through sendCommand. */
export type MoveCommand = 'move_up' | 'move_down' | 'move_left' | 'move_right';

/**
 * The simulation session the client drives. Physics, collisions, projectile
 * lifetimes, gun spool and camera follow all live behind this boundary.
 * Calls are synchronous; any exception is fatal to the frame loop.
 */
export interface SessionEngine {
  /** Asserts a directional intent for the current tick. */
  sendCommand(name: MoveCommand): void;
  /** Aim target in logical coordinates. */
  setMouseTarget(x: number, y: number): void;
  startAutofire(): void;
  stopAutofire(): void;
  /** Called back to back with stopShootingTracking for a single discrete shot. */
  startShootingTracking(): void;
  stopShootingTracking(): void;
  setAltMode(enabled: boolean): void;
  setBoostMode(enabled: boolean): void;
  setControlMode(enabled: boolean): void;
  /** Advances the simulation by dtSeconds (>= 0). */
  update(dtSeconds: number): void;
  /** Raw per-frame payload; validated by parseSceneSnapshot before use. */
  getRenderData(): unknown;
}
