/* FILE: src/config.ts */
// src/config.ts

// Tuning values for the client and the bundled local engine.
// Keys use KeyboardEvent.code values so bindings ignore keyboard layout.
export const CONFIG = {
  // --- Core Settings ---
  SEED: 'quiet nebula',
  LOG_LEVEL: 'INFO', // DEBUG while tuning input, INFO for release

  // --- Display ---
  LOGICAL_WIDTH: 800, // Design resolution, all scene coordinates live here
  LOGICAL_HEIGHT: 600,
  ASPECT_RATIO: 4 / 3,
  MONITOR_FILL_FRACTION: 0.9, // Share of the binding monitor dimension used at start
  TARGET_FPS: 60,
  FRAME_TOLERANCE_MS: 1, // Frames this close to the interval still count as due
  FONT_SIZE_BASE: 36, // HUD glyph size in logical units
  FONT_FAMILY: '"Courier New", Courier, monospace',

  // --- Colours ---
  BACKGROUND_COLOUR: { r: 20, g: 20, b: 30 },
  PLAYER_COLOUR: { r: 0, g: 255, b: 0 },
  PLAYER_FILL_COLOUR: { r: 0, g: 0, b: 0 },
  GUN_COLOUR: { r: 0, g: 255, b: 0 },
  HUD_COLOUR: { r: 255, g: 255, b: 255 },

  // --- Ship Geometry (logical units) ---
  PLAYER_WIDTH: 15.0,
  PLAYER_HEIGHT: 20.0,
  PLAYER_STROKE_WIDTH: 1.5,
  LEFT_GUN_OFFSET: { x: 7.5, y: 10.0 },
  RIGHT_GUN_OFFSET: { x: -7.5, y: 10.0 },
  GUN_LENGTH: 10.0,
  GUN_STROKE_WIDTH: 1.5,
  DEFAULT_HEADING: -Math.PI / 2, // Pointing up

  // --- Scene Rendering ---
  STAR_INNER_RADIUS_RATIO: 0.4,
  PROJECTILE_LENGTH_FACTOR: 0.5, // Drawn shorter than the hit geometry
  PROJECTILE_WIDTH_FACTOR: 1.5,

  // --- HUD (device pixels, not scaled) ---
  HUD_ORIGIN_X: 10,
  HUD_ORIGIN_Y: 10,
  HUD_LINE_HEIGHT: 30,

  // --- Input Keys --- (KeyboardEvent.code values)
  KEY_BINDINGS: {
    MOVE_UP: ['KeyW', 'ArrowUp'],
    MOVE_DOWN: ['KeyS', 'ArrowDown'],
    MOVE_LEFT: ['KeyA', 'ArrowLeft'],
    MOVE_RIGHT: ['KeyD', 'ArrowRight'],
    ALT_MODE: ['AltLeft', 'AltRight'],
    BOOST_MODE: ['ShiftLeft', 'ShiftRight'],
    CONTROL_MODE: ['ControlLeft', 'ControlRight'],
    FIRE: ['Space'],
    DOWNLOAD_LOG: ['KeyP'],
    QUIT: ['Escape'],
  },
  FIRE_MOUSE_BUTTON: 0, // Left button

  // --- Local Engine ---
  ENGINE_PLAYER_SPEED: 400, // Logical units per second
  ENGINE_BOOST_MULTIPLIER: 2.0,
  ENGINE_CONTROL_MULTIPLIER: 0.5,
  ENGINE_TURN_RATE: 4.0, // Radians per second, ship and guns
  ENGINE_CAMERA_SMOOTHING: 0.4, // Share of the gap to the target closed per update
  ENGINE_CAMERA_MAX_SMOOTHING: 0.8, // Reached at ENGINE_CAMERA_FAST_SPEED
  ENGINE_CAMERA_SNAP_SMOOTHING: 0.9, // Used while control mode is on
  ENGINE_CAMERA_SLOW_SPEED: 1000,
  ENGINE_CAMERA_FAST_SPEED: 10000,
  ENGINE_STAR_COUNT: 125,
  ENGINE_STAR_MARGIN: 400, // Stars live within this distance of the screen edges
  ENGINE_STAR_EDGE_BAND: { min: 200, max: 300 }, // Respawn distance outside an edge
  ENGINE_STAR_PARALLAX: 0.25, // Share of camera motion a depth-1 star follows
  ENGINE_FIRE_OVERLAP: Math.PI / 12, // Both guns fire within this angle of the nose or tail
  ENGINE_SPOOL_TIME: 2.0, // Seconds from 0% to 100% and back
  ENGINE_AUTOFIRE_DELAY: 0.5,
  ENGINE_AUTOFIRE_COOLDOWN_START: 0.5,
  ENGINE_AUTOFIRE_COOLDOWN_MIN: 0.1,
  ENGINE_TRACKING_COOLDOWN: 0.5,
  ENGINE_MAX_PROJECTILES: 100,
  ENGINE_TRACKING_SHOT: { speed: 800, size: 6, length: 12, lifetime: 5, colour: { r: 100, g: 150, b: 255 } },
  ENGINE_AUTOFIRE_SHOT: { speed: 1000, size: 3, length: 6, lifetime: 2, colour: { r: 255, g: 200, b: 50 } },
};
