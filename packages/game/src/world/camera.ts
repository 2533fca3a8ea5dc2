import type { Dimensions, Point } from "@crawl/procgen";
import { CAMERA_EASE, CAMERA_SNAP } from "../constants";

/**
 * Follow camera. The target keeps the player centred while staying inside
 * the floor; the position eases toward it and snaps once close.
 */
export class Camera {
  private x = 0;
  private y = 0;
  private targetX = 0;
  private targetY = 0;
  private placed = false;
  private dirty = true;

  constructor(
    private viewportSize: Dimensions,
    private floorSize: Dimensions,
  ) {}

  get viewport(): Dimensions {
    return this.viewportSize;
  }

  /** Smoothed top-left corner */
  get position(): { readonly x: number; readonly y: number } {
    return { x: this.x, y: this.y };
  }

  get target(): Point {
    return { x: this.targetX, y: this.targetY };
  }

  /** Integer offset for rendering */
  offset(): Point {
    return { x: Math.round(this.x), y: Math.round(this.y) };
  }

  markDirty(): void {
    this.dirty = true;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  resize(viewport: Dimensions): void {
    this.viewportSize = viewport;
    this.dirty = true;
  }

  /** New floor: the next follow snaps */
  reset(floorSize: Dimensions): void {
    this.floorSize = floorSize;
    this.placed = false;
    this.dirty = true;
  }

  static targetFor(player: Point, viewport: Dimensions, floor: Dimensions): Point {
    const maxX = Math.max(0, floor.width - viewport.width);
    const maxY = Math.max(0, floor.height - viewport.height);
    return {
      x: Math.min(maxX, Math.max(0, player.x - Math.floor(viewport.width / 2))),
      y: Math.min(maxY, Math.max(0, player.y - Math.floor(viewport.height / 2))),
    };
  }

  /** One tick of following the player */
  follow(player: Point): void {
    if (this.dirty || !this.placed) {
      const target = Camera.targetFor(player, this.viewportSize, this.floorSize);
      this.targetX = target.x;
      this.targetY = target.y;
      this.dirty = false;
    }

    if (!this.placed) {
      this.x = this.targetX;
      this.y = this.targetY;
      this.placed = true;
      return;
    }

    this.x = Camera.ease(this.x, this.targetX);
    this.y = Camera.ease(this.y, this.targetY);
  }

  private static ease(current: number, target: number): number {
    const delta = target - current;
    if (Math.abs(delta) < CAMERA_SNAP) return target;
    return current + delta * CAMERA_EASE;
  }
}
