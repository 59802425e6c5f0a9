// src/core/program/program.ts
// Validated, linked program: every name is resolved to a region slot or a
// Procedure object, so the engine never looks anything up by name.

import type { Span } from "../span";

/** Index into Program.regions (and into a run's RegionStore). */
export type RegionSlot = number;

export type Target =
  | { tag: "Region"; slot: RegionSlot }
  | { tag: "Back" };

export type Op =
  | { tag: "Inc" }
  | { tag: "Dec" }
  | { tag: "Right" }
  | { tag: "Left" }
  | { tag: "Reset" }
  | { tag: "Quote"; byte: number }
  | { tag: "Output" }
  | { tag: "Input"; span: Span }
  | { tag: "Loop"; body: Op[] }
  | { tag: "Send"; target: Target }
  | { tag: "Receive"; target: Target }
  | { tag: "Call"; proc: Procedure; clause: Target | null; span: Span };

export interface Procedure {
  /** null for anonymous bodies */
  readonly name: string | null;
  /** name, or `<enclosing>#<n>` for anonymous bodies */
  readonly label: string;
  body: Op[];
}

export interface RegionInfo {
  readonly name: string;
  readonly capacity: number;
}

export class Program {
  private readonly regionSlots: Map<string, RegionSlot>;

  constructor(
    public readonly regions: readonly RegionInfo[],
    public readonly procedures: ReadonlyMap<string, Procedure>,
  ) {
    this.regionSlots = new Map(regions.map((r, slot) => [r.name, slot]));
  }

  get entry(): Procedure {
    return this.procedure("main");
  }

  get mainRegion(): RegionSlot {
    return this.slotOf("main");
  }

  /** Region name -> declared capacity */
  get capacities(): Map<string, number> {
    return new Map(this.regions.map((r) => [r.name, r.capacity]));
  }

  procedure(name: string): Procedure {
    const p = this.procedures.get(name);
    if (!p) throw new Error(`Program.procedure: unknown procedure ${name}`);
    return p;
  }

  slotOf(name: string): RegionSlot {
    const slot = this.regionSlots.get(name);
    if (slot === undefined) throw new Error(`Program.slotOf: unknown region ${name}`);
    return slot;
  }
}
