/**
 * Handler Registry - per-kind ordered handler lists
 *
 * Lists are replaced, never edited in place, so a dispatch that already
 * fetched a list keeps scanning the snapshot it got.
 */

import type { UpdateKind } from "../updates/types.js";
import type { Callback, HandlerRegistration } from "./registration.js";

const EMPTY: readonly HandlerRegistration[] = Object.freeze([]);

export class HandlerRegistry {
  private byKind: Map<UpdateKind, readonly HandlerRegistration[]> = new Map();

  /**
   * Register a handler (order matters - first match wins)
   */
  register(registration: HandlerRegistration): void {
    const current = this.byKind.get(registration.kind) ?? EMPTY;
    this.byKind.set(registration.kind, Object.freeze([...current, registration]));
  }

  lookup(kind: UpdateKind): readonly HandlerRegistration[] {
    return this.byKind.get(kind) ?? EMPTY;
  }

  /**
   * Remove every registration of a callback, or the one with a handle's id
   *
   * @returns number of registrations removed
   */
  unregister(target: Callback | { readonly id: number }): number {
    const matches = (r: HandlerRegistration) =>
      typeof target === "function" ? r.callback === target : r.id === target.id;

    let removed = 0;
    for (const [kind, list] of this.byKind) {
      const kept = list.filter((r) => !matches(r));
      if (kept.length === list.length) continue;
      removed += list.length - kept.length;
      if (kept.length === 0) this.byKind.delete(kind);
      else this.byKind.set(kind, Object.freeze(kept));
    }
    return removed;
  }

  /** Kinds with at least one registration */
  kinds(): UpdateKind[] {
    return [...this.byKind.keys()];
  }

  get size(): number {
    let total = 0;
    for (const list of this.byKind.values()) total += list.length;
    return total;
  }
}
