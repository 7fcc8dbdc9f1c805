/**
 * Work queue of forged methods waiting for body generation
 */

import {
  ForgedMethod,
  MethodDescriptor,
  TypeDescriptor,
  methodKey,
} from "@mapweave/frontend";

export type ForgeEntry = {
  readonly method: ForgedMethod;
  readonly source: TypeDescriptor;
  readonly target: TypeDescriptor;
};

export type ForgeQueue = {
  /** Returns false when an entry with the same signature was seen before */
  readonly enqueue: (entry: ForgeEntry) => boolean;
  /**
   * Hand entries to `build` one at a time, first in first out, until the
   * queue is empty. `build` may enqueue further entries.
   */
  readonly drain: (build: (entry: ForgeEntry) => void) => number;
  /** Run `fn` with the method marked in flight */
  readonly track: <T>(method: MethodDescriptor, fn: () => T) => T;
  readonly isInFlight: (method: MethodDescriptor) => boolean;
  readonly size: () => number;
};

export const createForgeQueue = (): ForgeQueue => {
  const entries: ForgeEntry[] = [];
  const seen = new Set<string>();
  const inFlight = new Set<string>();

  const track = <T>(method: MethodDescriptor, fn: () => T): T => {
    const key = methodKey(method);
    inFlight.add(key);
    try {
      return fn();
    } finally {
      inFlight.delete(key);
    }
  };

  return {
    enqueue: (entry) => {
      const key = methodKey(entry.method);
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      entries.push(entry);
      return true;
    },

    drain: (build) => {
      let drained = 0;
      for (let entry = entries.shift(); entry; entry = entries.shift()) {
        const current = entry;
        track(current.method, () => build(current));
        drained++;
      }
      return drained;
    },

    track,

    isInFlight: (method) => inFlight.has(methodKey(method)),

    size: () => entries.length,
  };
};
