// src/core/eval/regions.ts
// Region store: one fixed-size wrapping byte buffer with a head per region.

import type { RegionInfo, RegionSlot } from "../program/program";

export type RegionSnapshot = {
  head: number;
  cells: number[];
};

export class Region {
  public readonly cells: Uint8Array;
  private headPos = 0;

  constructor(
    public readonly name: string,
    public readonly capacity: number,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Region ${name}: capacity must be a positive integer, got ${capacity}`);
    }
    this.cells = new Uint8Array(capacity);
  }

  get head(): number {
    return this.headPos;
  }

  read(): number {
    return this.cells[this.headPos];
  }

  write(byte: number): void {
    this.cells[this.headPos] = ((byte % 256) + 256) % 256;
  }

  increment(): void {
    this.cells[this.headPos] = (this.cells[this.headPos] + 1) % 256;
  }

  decrement(): void {
    this.cells[this.headPos] = (this.cells[this.headPos] + 255) % 256;
  }

  move(delta: number): void {
    this.headPos = (((this.headPos + delta) % this.capacity) + this.capacity) % this.capacity;
  }

  resetHead(): void {
    this.headPos = 0;
  }

  /** Raw indexed read; the index wraps like the head does. */
  at(index: number): number {
    return this.cells[((index % this.capacity) + this.capacity) % this.capacity];
  }

  setAt(index: number, byte: number): void {
    this.cells[((index % this.capacity) + this.capacity) % this.capacity] = ((byte % 256) + 256) % 256;
  }

  snapshot(): RegionSnapshot {
    return { head: this.headPos, cells: Array.from(this.cells) };
  }
}

/**
 * Every region of a program, allocated once per run. Slots follow
 * declaration order, so a RegionSlot from the linked Program indexes
 * straight into the store.
 */
export class RegionStore {
  private readonly regions: Region[];
  private readonly byName: Map<string, Region>;

  constructor(infos: readonly RegionInfo[]) {
    this.regions = infos.map((r) => new Region(r.name, r.capacity));
    this.byName = new Map(this.regions.map((r) => [r.name, r]));
  }

  get size(): number {
    return this.regions.length;
  }

  /** Lookup by name. Validation guarantees hits for program-declared names. */
  get(name: string): Region {
    const r = this.byName.get(name);
    if (!r) throw new Error(`RegionStore.get: unknown region ${name}`);
    return r;
  }

  slot(slot: RegionSlot): Region {
    const r = this.regions[slot];
    if (!r) throw new Error(`RegionStore.slot: invalid slot ${slot}`);
    return r;
  }

  names(): string[] {
    return this.regions.map((r) => r.name);
  }

  snapshot(): Record<string, RegionSnapshot> {
    const out: Record<string, RegionSnapshot> = {};
    for (const r of this.regions) out[r.name] = r.snapshot();
    return out;
  }
}
