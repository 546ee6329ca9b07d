import type { Failure } from "./failure";
import type { Span } from "./diagnostic";

export interface OutcomeMeta {
  span?: Span;
  durationMs?: number;
  /** The command text the outcome belongs to. */
  source?: string;
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
