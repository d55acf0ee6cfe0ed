import type { Valid } from "./valid";

/** A single rewrite step over a value, reporting every problem it finds. */
export interface Transform<V, E> {
  transform(value: V): Valid<V, E>;
}
