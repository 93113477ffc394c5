import { ArenaInvariantError } from "../errors.js";
import { circlesOverlap, lerp } from "../math.js";
import type { Shape, Vec2, WorldBounds } from "../state.js";

type ShapeKey = string;

type Entry = {
  shape: Shape;
  cells: string[];
};

function shapeKey(shape: Shape): ShapeKey {
  return `${shape.kind}:${shape.id}`;
}

function overlaps(a: Shape, b: Shape): boolean {
  return circlesOverlap(a.x, a.y, a.radius, b.x, b.y, b.radius);
}

/**
 * Uniform-grid collision index over circular shapes.
 *
 * A shape is registered in every cell its bounding box touches, so two
 * overlapping shapes always share at least one cell and queries only compare
 * shapes from the cells a probe covers. Knows nothing about game rules.
 */
export class CollisionIndex {
  private readonly cellSize: number;
  private readonly random: () => number;
  private readonly buckets = new Map<string, Map<ShapeKey, Shape>>();
  private readonly entries = new Map<ShapeKey, Entry>();

  constructor(cellSize: number, random: () => number = Math.random) {
    this.cellSize = Math.max(1, Math.floor(cellSize));
    this.random = random;
  }

  get size(): number {
    return this.entries.size;
  }

  has(shape: Shape): boolean {
    return this.entries.has(shapeKey(shape));
  }

  /**
   * A point inside `bounds` where a circle of `radius` overlaps nothing stored.
   * Does not insert; the caller commits with `update`.
   */
  free(bounds: WorldBounds, radius: number, maxAttempts: number): Vec2 {
    const minX = Math.min(bounds.left + radius, bounds.right);
    const maxX = Math.max(bounds.right - radius, minX);
    const minY = Math.min(bounds.top + radius, bounds.bottom);
    const maxY = Math.max(bounds.bottom - radius, minY);

    for (let i = 0; i < maxAttempts; i++) {
      const x = lerp(minX, maxX, this.random());
      const y = lerp(minY, maxY, this.random());
      const probe: Shape = { kind: "rock", id: -1, x, y, radius };
      if (this.test(probe).length === 0) return { x, y };
    }
    throw new ArenaInvariantError(`No free position after ${maxAttempts} attempts`);
  }

  /** Copies of the stored shapes overlapping `shape` (itself excluded). Read-only. */
  test(shape: Shape): Shape[] {
    const self = shapeKey(shape);
    const seen = new Set<ShapeKey>();
    const result: Shape[] = [];

    for (const cell of this.cellsFor(shape)) {
      const bucket = this.buckets.get(cell);
      if (!bucket) continue;
      for (const [key, other] of bucket) {
        if (key === self || seen.has(key)) continue;
        seen.add(key);
        if (overlaps(shape, other)) result.push({ ...other });
      }
    }

    return result;
  }

  /** Insert, or move/resize the stored copy with the same kind and id. */
  update(shape: Shape): void {
    this.remove(shape);
    const key = shapeKey(shape);
    const stored: Shape = { ...shape };
    const cells = this.cellsFor(stored);
    for (const cell of cells) {
      const bucket = this.buckets.get(cell) ?? this.createBucket(cell);
      bucket.set(key, stored);
    }
    this.entries.set(key, { shape: stored, cells });
  }

  remove(shape: Shape): void {
    const key = shapeKey(shape);
    const entry = this.entries.get(key);
    if (!entry) return;
    for (const cell of entry.cells) {
      const bucket = this.buckets.get(cell);
      if (!bucket) continue;
      bucket.delete(key);
      if (bucket.size === 0) this.buckets.delete(cell);
    }
    this.entries.delete(key);
  }

  /** Every overlapping pair, each reported once, as copies. */
  all(): Array<[Shape, Shape]> {
    const seen = new Set<string>();
    const pairs: Array<[Shape, Shape]> = [];

    for (const bucket of this.buckets.values()) {
      const shapes = [...bucket.entries()];
      for (let i = 0; i < shapes.length; i++) {
        const [keyA, a] = shapes[i];
        for (let j = i + 1; j < shapes.length; j++) {
          const [keyB, b] = shapes[j];
          const pairKey = keyA < keyB ? `${keyA}|${keyB}` : `${keyB}|${keyA}`;
          if (seen.has(pairKey)) continue;
          seen.add(pairKey);
          if (overlaps(a, b)) pairs.push([{ ...a }, { ...b }]);
        }
      }
    }

    return pairs;
  }

  private cellsFor(shape: Shape): string[] {
    const r = Math.max(0, shape.radius);
    const minX = this.cellCoord(shape.x - r);
    const maxX = this.cellCoord(shape.x + r);
    const minY = this.cellCoord(shape.y - r);
    const maxY = this.cellCoord(shape.y + r);

    const cells: string[] = [];
    for (let cx = minX; cx <= maxX; cx++) {
      for (let cy = minY; cy <= maxY; cy++) {
        cells.push(this.keyForCell(cx, cy));
      }
    }
    return cells;
  }

  private cellCoord(v: number): number {
    return Math.floor(v / this.cellSize);
  }

  private keyForCell(cx: number, cy: number): string {
    return `${cx},${cy}`;
  }

  private createBucket(key: string): Map<ShapeKey, Shape> {
    const bucket = new Map<ShapeKey, Shape>();
    this.buckets.set(key, bucket);
    return bucket;
  }
}
