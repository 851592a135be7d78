// src/core/scene_snapshot.ts

import { CONFIG } from '../config';
import { StarColourTag, StarShape, isStarColourTag, isStarShape } from '../constants';
import { RgbColour, isRgbColour } from '../rendering/colour';
import { logger } from '../utils/logger';

/** A decorative background star in logical space. */
export interface Star {
    x: number;
    y: number;
    size: number; // Logical radius
    color: StarColourTag;
    shape: StarShape;
    twinkle: number; // Brightness phase in [0, 1]
}

export interface Projectile {
    x: number;
    y: number;
    length: number;
    width: number;
    rotation: number; // Radians
    color: RgbColour;
}

/** One frame of engine state, validated and with every optional field filled in. */
export interface SceneSnapshot {
    playerX: number;
    playerY: number;
    playerRotation: number;
    playerVx: number;
    playerVy: number;
    cameraX: number;
    cameraY: number;
    leftGunAngle: number;
    rightGunAngle: number;
    leftGunSpool: number; // 0..1
    rightGunSpool: number;
    stars: Star[];
    projectiles: Projectile[];
}

/** Wire shape of a star as the engine reports it. */
export interface RawStar {
    x: number;
    y: number;
    size: number;
    color: string;
    shape: string;
    twinkle?: number;
}

export interface RawProjectile {
    x: number;
    y: number;
    length: number;
    width: number;
    rotation?: number;
    color?: [number, number, number] | RgbColour;
}

/** Wire shape of getRenderData(); only position and camera are mandatory. */
export interface RawSceneSnapshot {
    player_x: number;
    player_y: number;
    camera_x: number;
    camera_y: number;
    player_rotation?: number;
    player_vx?: number;
    player_vy?: number;
    left_gun_angle?: number;
    right_gun_angle?: number;
    left_gun_spool?: number;
    right_gun_spool?: number;
    stars?: RawStar[];
    projectiles?: RawProjectile[];
}

/** Raised when the engine payload is missing data the frame cannot be drawn without. */
export class SnapshotError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SnapshotError';
    }
}

const DEFAULT_PROJECTILE_COLOUR: Readonly<RgbColour> = { r: 255, g: 255, b: 255 };

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
}

function clampUnit(value: number): number {
    return Math.max(0, Math.min(1, value));
}

function readRequired(record: Record<string, unknown>, key: string): number {
    const value = record[key];
    if (!isFiniteNumber(value)) {
        throw new SnapshotError(`Render data field "${key}" must be a finite number, got ${String(value)}.`);
    }
    return value;
}

function readOptional(record: Record<string, unknown>, key: string, fallback: number): number {
    const value = record[key];
    if (value === undefined || value === null) return fallback;
    if (!isFiniteNumber(value)) {
        logger.warn(`[SceneSnapshot] Field "${key}" is not a finite number (${String(value)}); using ${fallback}.`);
        return fallback;
    }
    return value;
}

function readList(record: Record<string, unknown>, key: string): unknown[] {
    const value = record[key];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
        logger.warn(`[SceneSnapshot] Field "${key}" is not a list; treating it as empty.`);
        return [];
    }
    return value;
}

function parseColour(value: unknown): RgbColour | null {
    if (value === undefined || value === null) return { ...DEFAULT_PROJECTILE_COLOUR };
    if (Array.isArray(value) && value.length === 3 && value.every(isFiniteNumber)) {
        const [r, g, b]: number[] = value;
        return { r, g, b };
    }
    if (isRgbColour(value)) return { r: value.r, g: value.g, b: value.b };
    return null;
}

function parseStar(value: unknown, index: number): Star | null {
    if (!isRecord(value)) {
        logger.warn(`[SceneSnapshot] Dropping star #${index}: not a record.`);
        return null;
    }
    const { x, y, size, color, shape } = value;
    if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(size)) {
        logger.warn(`[SceneSnapshot] Dropping star #${index}: position or size is not numeric.`);
        return null;
    }
    if (!isStarColourTag(color) || !isStarShape(shape)) {
        logger.warn(`[SceneSnapshot] Dropping star #${index}: unknown colour "${String(color)}" or shape "${String(shape)}".`);
        return null;
    }
    return { x, y, size, color, shape, twinkle: clampUnit(readOptional(value, 'twinkle', 1)) };
}

function parseProjectile(value: unknown, index: number): Projectile | null {
    if (!isRecord(value)) {
        logger.warn(`[SceneSnapshot] Dropping projectile #${index}: not a record.`);
        return null;
    }
    const { x, y, length, width } = value;
    if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(length) || !isFiniteNumber(width)) {
        logger.warn(`[SceneSnapshot] Dropping projectile #${index}: geometry is not numeric.`);
        return null;
    }
    const color = parseColour(value.color);
    if (!color) {
        logger.warn(`[SceneSnapshot] Dropping projectile #${index}: colour is not an RGB triple.`);
        return null;
    }
    return { x, y, length, width, rotation: readOptional(value, 'rotation', 0), color };
}

/**
 * Validates the engine's render data once at the boundary.
 * Missing optional fields take their defaults: heading points up, gun
 * angles point where the hull does, spool is zero, and star/projectile lists are empty.
 * @throws SnapshotError when the payload or a required coordinate is unusable.
 */
export function parseSceneSnapshot(raw: unknown): SceneSnapshot {
    if (!isRecord(raw)) {
        throw new SnapshotError(`Render data must be a record, got ${Array.isArray(raw) ? 'array' : typeof raw}.`);
    }

    const playerX = readRequired(raw, 'player_x');
    const playerY = readRequired(raw, 'player_y');
    const cameraX = readRequired(raw, 'camera_x');
    const cameraY = readRequired(raw, 'camera_y');
    const playerRotation = readOptional(raw, 'player_rotation', CONFIG.DEFAULT_HEADING);
    // Rotation 0 draws the nose up; gun angles are world directions with 0 pointing right
    const heading = playerRotation - Math.PI / 2;

    const stars: Star[] = [];
    readList(raw, 'stars').forEach((entry, index) => {
        const star = parseStar(entry, index);
        if (star) stars.push(star);
    });

    const projectiles: Projectile[] = [];
    readList(raw, 'projectiles').forEach((entry, index) => {
        const projectile = parseProjectile(entry, index);
        if (projectile) projectiles.push(projectile);
    });

    return {
        playerX,
        playerY,
        playerRotation,
        playerVx: readOptional(raw, 'player_vx', 0),
        playerVy: readOptional(raw, 'player_vy', 0),
        cameraX,
        cameraY,
        leftGunAngle: readOptional(raw, 'left_gun_angle', heading),
        rightGunAngle: readOptional(raw, 'right_gun_angle', heading),
        leftGunSpool: clampUnit(readOptional(raw, 'left_gun_spool', 0)),
        rightGunSpool: clampUnit(readOptional(raw, 'right_gun_spool', 0)),
        stars,
        projectiles,
    };
}
