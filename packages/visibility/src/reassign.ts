/**
 * Reassignment transform
 *
 * Rebuilds a record sequence after one record (the target) takes a new frame association.
 * Pure: the input sequence is never mutated. The result satisfies every rule in `invariants.ts`
 * whenever the input does. Survivors keep their positions; an expanded record is replaced in
 * place by the records materialized from it, in ascending frame order.
 */

import { avoiding } from "./association";
import { readFrames } from "./dataset";
import type { FrameAssociation, FrameDataset, StateRecord } from "./types";

export type ReassignInput<T> = {
  records: readonly StateRecord<T>[];
  /** Position of the target in `records` */
  targetIndex: number;
  association: FrameAssociation;
  /** Consulted only when a frame-avoiding record has to be expanded */
  dataset: FrameDataset;
  /** Builds a fresh single-frame record from the payload of an expanded record */
  materialize: (source: StateRecord<T>, frame: number) => StateRecord<T>;
};

export type ReassignOutcome<T> = {
  records: StateRecord<T>[];
  /** The target, carrying its new association */
  target: StateRecord<T>;
  /** Records removed from the sequence */
  discarded: StateRecord<T>[];
  /** Records created by expansion */
  materialized: StateRecord<T>[];
  /** An expansion found no dataset frames, so nothing was materialized */
  degraded: boolean;
  /** Set when the dataset failed to list its frames during expansion */
  datasetError?: unknown;
};

type Replacement<T> = {
  records: StateRecord<T>[];
  discarded?: boolean;
  materialized?: boolean;
  degraded?: boolean;
  datasetError?: unknown;
};

export function applyReassignment<T>(input: ReassignInput<T>): ReassignOutcome<T> {
  const { records, targetIndex, association } = input;
  const source = records[targetIndex];
  if (source === undefined) {
    throw new RangeError(`Target index ${targetIndex} is outside the sequence`);
  }
  const target: StateRecord<T> = { ...source, association };
  const replaceOther = planReplacement(input);

  const outcome: ReassignOutcome<T> = {
    records: [],
    target,
    discarded: [],
    materialized: [],
    degraded: false,
  };
  records.forEach((record, i) => {
    if (i === targetIndex) {
      outcome.records.push(target);
      return;
    }
    const replacement = replaceOther(record);
    outcome.records.push(...replacement.records);
    if (replacement.discarded) {
      outcome.discarded.push(record);
    }
    if (replacement.materialized) {
      outcome.materialized.push(...replacement.records);
    }
    if (replacement.degraded) {
      outcome.degraded = true;
    }
    if (replacement.datasetError !== undefined) {
      outcome.datasetError = replacement.datasetError;
    }
  });
  return outcome;
}

/** What each non-target record turns into under the new association */
function planReplacement<T>(input: ReassignInput<T>): (record: StateRecord<T>) => Replacement<T> {
  const association = input.association;
  switch (association.kind) {
    case "ubiquitous":
      return () => ({ records: [], discarded: true });

    case "avoiding":
      // Only the record filling the new gap may stay.
      return (record) =>
        record.association.kind === "single" && record.association.frame === association.frame
          ? { records: [record] }
          : { records: [], discarded: true };

    case "single":
      return planFrameClaim(input, association.frame);
  }
}

function planFrameClaim<T>(
  input: ReassignInput<T>,
  frame: number
): (record: StateRecord<T>) => Replacement<T> {
  // Frames owned by single-frame records that survive; expansion must not reclaim them.
  const claimed = new Set<number>([frame]);
  input.records.forEach((record, i) => {
    if (i !== input.targetIndex && record.association.kind === "single") {
      claimed.add(record.association.frame);
    }
  });

  return (record) => {
    const current = record.association;
    switch (current.kind) {
      case "single":
        return current.frame === frame ? { records: [], discarded: true } : { records: [record] };

      case "avoiding": {
        if (current.frame === frame) {
          // Already leaves exactly this frame free.
          return { records: [record] };
        }
        const listing = readFrames(input.dataset);
        if (!listing.ok) {
          return { records: [], discarded: true, degraded: true, datasetError: listing.error };
        }
        if (listing.frames.length === 0) {
          return { records: [], discarded: true, degraded: true };
        }
        const created = listing.frames
          .filter((f) => f !== current.frame && !claimed.has(f))
          .map((f) => input.materialize(record, f));
        return { records: created, discarded: true, materialized: true };
      }

      case "ubiquitous":
        // Only reachable when the target is a newly inserted record.
        return { records: [{ ...record, association: avoiding(frame) }] };
    }
  };
}
