/**
 * Tile grid backed by a flat Uint8Array.
 */

import type { Point } from "../geometry/types";
import { CellType, type ReadonlyGrid } from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * 2D grid of open/wall cells with the neighbourhood counts the cave
 * automaton needs. Out-of-bounds reads report WALL.
 */
export class Grid implements ReadonlyGrid {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8Array;

  constructor(
    width: number,
    height: number,
    initialValue: CellType = CellType.FLOOR,
  ) {
    if (width <= 0 || height <= 0) {
      throw new Error(`Invalid grid dimensions: ${width}x${height}`);
    }

    this.width = width;
    this.height = height;
    this.data = new Uint8Array(width * height);

    if (initialValue !== CellType.FLOOR) {
      this.data.fill(initialValue);
    }
  }

  /**
   * Create grid filled with walls
   */
  static walls(width: number, height: number): Grid {
    return new Grid(width, height, CellType.WALL);
  }

  /**
   * Create grid filled with open floor
   */
  static floors(width: number, height: number): Grid {
    return new Grid(width, height, CellType.FLOOR);
  }

  /**
   * Build a grid from rows of text: '#' is wall, anything else is open.
   * Short rows are padded with wall.
   */
  static fromRows(rows: readonly string[]): Grid {
    const height = Math.max(1, rows.length);
    const width = Math.max(1, ...rows.map((r) => r.length));
    const grid = Grid.walls(width, height);
    rows.forEach((row, y) => {
      for (let x = 0; x < row.length; x++) {
        grid.setUnsafe(x, y, row[x] === "#" ? CellType.WALL : CellType.FLOOR);
      }
    });
    return grid;
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  /**
   * Get cell value with bounds checking (returns WALL for out of bounds)
   */
  get(x: number, y: number): CellType {
    if (!this.isInBounds(x, y)) return CellType.WALL;
    return this.data[y * this.width + x] as CellType;
  }

  /**
   * Set cell value with bounds checking
   */
  set(x: number, y: number, value: CellType): void {
    if (!this.isInBounds(x, y)) {
      if (DEV_MODE) {
        console.warn(
          `Grid.set: out of bounds (${x}, ${y}) for grid ${this.width}x${this.height}`,
        );
      }
      return;
    }
    this.data[y * this.width + x] = value;
  }

  /**
   * Unsafe get (no bounds check) - use only when bounds are guaranteed
   */
  getUnsafe(x: number, y: number): CellType {
    return this.data[y * this.width + x] as CellType;
  }

  /**
   * Unsafe set (no bounds check) - use only when bounds are guaranteed
   */
  setUnsafe(x: number, y: number, value: CellType): void {
    this.data[y * this.width + x] = value;
  }

  // ===========================================================================
  // NEIGHBOR OPERATIONS
  // ===========================================================================

  /**
   * Count cells of `targetType` within Chebyshev distance `radius` of (x, y),
   * excluding the cell itself. Out-of-bounds cells count as WALL.
   */
  countWithin(
    x: number,
    y: number,
    radius: number,
    targetType: CellType = CellType.WALL,
  ): number {
    let count = 0;
    for (let ny = y - radius; ny <= y + radius; ny++) {
      for (let nx = x - radius; nx <= x + radius; nx++) {
        if (nx === x && ny === y) continue;
        if (this.isInBounds(nx, ny)) {
          if (this.data[ny * this.width + nx] === targetType) count++;
        } else if (targetType === CellType.WALL) {
          count++;
        }
      }
    }
    return count;
  }

  // ===========================================================================
  // UTILITY
  // ===========================================================================

  clone(): Grid {
    const result = new Grid(this.width, this.height);
    result.data.set(this.data);
    return result;
  }

  countCells(cellType: CellType): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === cellType) count++;
    }
    return count;
  }

  /**
   * All coordinates holding `cellType`, in row-major order.
   */
  findAll(cellType: CellType): Point[] {
    const points: Point[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (this.getUnsafe(x, y) === cellType) {
          points.push({ x, y });
        }
      }
    }
    return points;
  }

  /**
   * Render as text rows ('#' wall, '.' open), mainly for tests and logs.
   */
  toRows(): string[] {
    const rows: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let row = "";
      for (let x = 0; x < this.width; x++) {
        row += this.getUnsafe(x, y) === CellType.WALL ? "#" : ".";
      }
      rows.push(row);
    }
    return rows;
  }
}
