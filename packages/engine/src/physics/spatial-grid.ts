import type { Box } from '../entity';

export const DEFAULT_CELL_SIZE = 128;

interface Slot<T> {
  item: T;
  order: number;
  cells: string[];
}

/**
 * Uniform-grid broad phase. Queries return each overlapping item once, in
 * insertion order, so resolution stays deterministic.
 */
export class SpatialGrid<T extends { id: string }> {
  private readonly cells = new Map<string, Set<string>>();
  private readonly slots = new Map<string, Slot<T>>();
  private nextOrder = 0;

  constructor(
    private readonly boundsOf: (item: T) => Box,
    private readonly cellSize = DEFAULT_CELL_SIZE,
  ) {}

  get size(): number {
    return this.slots.size;
  }

  insert(item: T): void {
    const existing = this.slots.get(item.id);
    const order = existing ? existing.order : this.nextOrder++;
    if (existing) {
      this.unlink(item.id, existing);
    }
    const cells = this.cellsFor(this.boundsOf(item));
    for (const key of cells) {
      let bucket = this.cells.get(key);
      if (!bucket) {
        bucket = new Set();
        this.cells.set(key, bucket);
      }
      bucket.add(item.id);
    }
    this.slots.set(item.id, { item, order, cells });
  }

  /** Re-buckets an item after it moved, keeping its query order. */
  move(item: T): void {
    this.insert(item);
  }

  remove(id: string): boolean {
    const slot = this.slots.get(id);
    if (!slot) {
      return false;
    }
    this.unlink(id, slot);
    this.slots.delete(id);
    return true;
  }

  get(id: string): T | undefined {
    return this.slots.get(id)?.item;
  }

  query(region: Box): T[] {
    const found = new Map<string, Slot<T>>();
    for (const key of this.cellsFor(region)) {
      const bucket = this.cells.get(key);
      if (!bucket) {
        continue;
      }
      for (const id of bucket) {
        const slot = this.slots.get(id);
        if (slot) {
          found.set(id, slot);
        }
      }
    }
    return Array.from(found.values())
      .sort((a, b) => a.order - b.order)
      .map((slot) => slot.item);
  }

  clear(): void {
    this.cells.clear();
    this.slots.clear();
    this.nextOrder = 0;
  }

  private unlink(id: string, slot: Slot<T>): void {
    for (const key of slot.cells) {
      const bucket = this.cells.get(key);
      if (!bucket) {
        continue;
      }
      bucket.delete(id);
      if (bucket.size === 0) {
        this.cells.delete(key);
      }
    }
  }

  private cellsFor(box: Box): string[] {
    const minX = Math.floor(box.x / this.cellSize);
    const maxX = Math.floor((box.x + box.width) / this.cellSize);
    const minY = Math.floor(box.y / this.cellSize);
    const maxY = Math.floor((box.y + box.height) / this.cellSize);
    const keys: string[] = [];
    for (let cx = minX; cx <= maxX; cx += 1) {
      for (let cy = minY; cy <= maxY; cy += 1) {
        keys.push(`${cx},${cy}`);
      }
    }
    return keys;
  }
}
