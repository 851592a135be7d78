// src/rendering/drawing_context.ts

import { rgbToCss } from './colour';
import type { DrawCommand, Point } from './draw_commands';
import { logger } from '../utils/logger';

/** The subset of CanvasRenderingContext2D the scene needs. */
export type CanvasTarget = Pick<
  CanvasRenderingContext2D,
  | 'fillStyle'
  | 'strokeStyle'
  | 'lineWidth'
  | 'lineCap'
  | 'lineJoin'
  | 'font'
  | 'textBaseline'
  | 'fillRect'
  | 'beginPath'
  | 'closePath'
  | 'moveTo'
  | 'lineTo'
  | 'arc'
  | 'fill'
  | 'stroke'
  | 'fillText'
>;

/** Executes device-space draw commands against a 2D canvas context. */
export class DrawingContext {
  private ctx: CanvasTarget;
  private width: number;
  private height: number;

  constructor(ctx: CanvasTarget, width: number, height: number) {
    this.ctx = ctx;
    this.width = width;
    this.height = height;
    logger.debug(`[DrawingContext] Instance created for ${width}x${height} surface.`);
  }

  /** Runs every command in order. Later commands paint over earlier ones. */
  execute(commands: readonly DrawCommand[]): void {
    commands.forEach(command => this.draw(command));
  }

  draw(command: DrawCommand): void {
    switch (command.kind) {
      case 'clear':
        this.ctx.fillStyle = rgbToCss(command.colour);
        this.ctx.fillRect(0, 0, this.width, this.height);
        break;
      case 'circle':
        this.ctx.fillStyle = rgbToCss(command.colour);
        this.ctx.beginPath();
        this.ctx.arc(command.centre.x, command.centre.y, command.radius, 0, Math.PI * 2);
        this.ctx.fill();
        break;
      case 'polygon':
        this.drawPolygon(command.points, rgbToCss(command.colour), command.strokeWidth);
        break;
      case 'line':
        this.ctx.strokeStyle = rgbToCss(command.colour);
        this.ctx.lineWidth = command.width;
        this.ctx.lineCap = 'butt';
        this.ctx.beginPath();
        this.ctx.moveTo(command.from.x, command.from.y);
        this.ctx.lineTo(command.to.x, command.to.y);
        this.ctx.stroke();
        break;
      case 'text':
        this.ctx.font = command.font;
        this.ctx.textBaseline = 'top';
        this.ctx.fillStyle = rgbToCss(command.colour);
        this.ctx.fillText(command.text, command.position.x, command.position.y);
        break;
    }
  }

  private drawPolygon(points: readonly Point[], style: string, strokeWidth: number | undefined): void {
    if (points.length < 3) {
      logger.warn(`[DrawingContext.drawPolygon] Skipping polygon with ${points.length} points.`);
      return;
    }
    this.ctx.beginPath();
    this.ctx.moveTo(points[0].x, points[0].y);
    for (let i = 1; i < points.length; i++) {
      this.ctx.lineTo(points[i].x, points[i].y);
    }
    this.ctx.closePath();

    if (strokeWidth === undefined) {
      this.ctx.fillStyle = style;
      this.ctx.fill();
    } else {
      this.ctx.strokeStyle = style;
      this.ctx.lineWidth = strokeWidth;
      this.ctx.lineJoin = 'miter';
      this.ctx.stroke();
    }
  }
}
