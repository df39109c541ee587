/**
 * City Map
 * Read-only tile grid: coordinate validity, walkability and surface weight
 */

import type { GridPoint } from '../core/types.js';

export interface TileInfo {
  name?: string;
  blocked?: boolean;
  walkable?: boolean;
  surfaceWeight?: number;
}

export interface CityData {
  name: string;
  width: number;
  height: number;
  tiles: string[][]; // tiles[y][x]
  legend: Record<string, TileInfo>;
  goal: number;
}

export function manhattan(a: GridPoint, b: GridPoint): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export class CityMap {
  private readonly blocked: ReadonlySet<string>;

  constructor(private readonly data: CityData) {
    this.blocked = new Set(
      Object.entries(data.legend)
        .filter(([, info]) => info.blocked === true || info.walkable === false)
        .map(([code]) => code)
    );
  }

  get name(): string {
    return this.data.name;
  }

  get width(): number {
    return this.data.width;
  }

  get height(): number {
    return this.data.height;
  }

  get goal(): number {
    return this.data.goal;
  }

  isValidPosition(point: GridPoint): boolean {
    return (
      Number.isInteger(point.x) &&
      Number.isInteger(point.y) &&
      point.x >= 0 &&
      point.x < this.data.width &&
      point.y >= 0 &&
      point.y < this.data.height
    );
  }

  tileAt(point: GridPoint): string | null {
    if (!this.isValidPosition(point)) return null;
    return this.data.tiles[point.y][point.x];
  }

  isWalkable(point: GridPoint): boolean {
    const tile = this.tileAt(point);
    return tile !== null && !this.blocked.has(tile);
  }

  /**
   * Speed factor of the tile, 1 outside the grid or where the legend is silent
   */
  surfaceWeight(point: GridPoint): number {
    const tile = this.tileAt(point);
    if (tile === null) return 1;
    return this.data.legend[tile]?.surfaceWeight ?? 1;
  }

  /**
   * Copy of the underlying data, for saves
   */
  toData(): CityData {
    const legend: Record<string, TileInfo> = {};
    for (const [code, info] of Object.entries(this.data.legend)) {
      legend[code] = { ...info };
    }
    return { ...this.data, tiles: this.data.tiles.map((row) => [...row]), legend };
  }
}
