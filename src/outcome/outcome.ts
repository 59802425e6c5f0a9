import type { Failure } from "./failure";
import type { Diagnostic } from "./diagnostic";

export interface OutcomeMeta {
  durationMs?: number;
  /** Non-fatal diagnostics gathered along the way (lint warnings) */
  warnings?: Diagnostic[];
}

export interface Done<A> {
  readonly tag: "Done";
  readonly value: A;
  readonly meta: OutcomeMeta;
}

export interface Fail {
  readonly tag: "Fail";
  readonly failure: Failure;
  readonly meta: OutcomeMeta;
}

export type Outcome<A> = Done<A> | Fail;

export function isDone<A>(o: Outcome<A>): o is Done<A> {
  return o.tag === "Done";
}

export function isFail<A>(o: Outcome<A>): o is Fail {
  return o.tag === "Fail";
}
