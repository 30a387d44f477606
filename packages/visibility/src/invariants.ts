/**
 * Consistency rules for a record sequence:
 * - at most one record visible per frame
 * - a ubiquitous record is alone in the sequence
 * - at most one frame-avoiding record
 * - a frame-avoiding record may only sit beside the single-frame record filling its gap
 * - single-frame records occupy distinct frames
 */

import { isVisibleIn } from "./association";
import type { StateRecord } from "./types";

export type InvariantRule =
  | "one-state-per-frame"
  | "ubiquitous-exclusive"
  | "single-avoiding-record"
  | "avoiding-partner"
  | "unique-single-frame"
  | "unique-record-id";

export type InvariantViolation = {
  rule: InvariantRule;
  message: string;
  recordIds: string[];
  frame?: number;
};

/** Frames on which visibility can differ; any other frame sees what `sentinel` sees. */
function distinguishingFrames<T>(records: readonly StateRecord<T>[]): number[] {
  const frames = new Set<number>();
  let max = -1;
  for (const record of records) {
    if (record.association.kind !== "ubiquitous") {
      frames.add(record.association.frame);
      max = Math.max(max, record.association.frame);
    }
  }
  const sentinel = max + 1;
  frames.add(sentinel);
  return [...frames];
}

export function checkInvariants<T>(
  records: readonly StateRecord<T>[],
  frames?: Iterable<number>
): InvariantViolation[] {
  const violations: InvariantViolation[] = [];

  const seenIds = new Set<string>();
  for (const record of records) {
    if (seenIds.has(record.id)) {
      violations.push({
        rule: "unique-record-id",
        message: `Record id ${record.id} appears more than once`,
        recordIds: [record.id],
      });
    }
    seenIds.add(record.id);
  }

  const ubiquitousRecords = records.filter((r) => r.association.kind === "ubiquitous");
  if (ubiquitousRecords.length > 0 && records.length > 1) {
    violations.push({
      rule: "ubiquitous-exclusive",
      message: `Ubiquitous record shares the sequence with ${records.length - 1} other record(s)`,
      recordIds: records.map((r) => r.id),
    });
  }

  const avoidingRecords = records.filter((r) => r.association.kind === "avoiding");
  if (avoidingRecords.length > 1) {
    violations.push({
      rule: "single-avoiding-record",
      message: `${avoidingRecords.length} frame-avoiding records present`,
      recordIds: avoidingRecords.map((r) => r.id),
    });
  }

  for (const avoider of avoidingRecords) {
    if (avoider.association.kind !== "avoiding") {
      continue;
    }
    const gap = avoider.association.frame;
    const strangers = records.filter(
      (r) =>
        r !== avoider &&
        !(r.association.kind === "single" && r.association.frame === gap)
    );
    if (strangers.length > 0) {
      violations.push({
        rule: "avoiding-partner",
        message: `Record avoiding frame ${gap} shares the sequence with records other than frame ${gap}`,
        recordIds: [avoider.id, ...strangers.map((r) => r.id)],
      });
    }
  }

  const slots = new Map<number, string[]>();
  for (const record of records) {
    if (record.association.kind === "single") {
      const ids = slots.get(record.association.frame) ?? [];
      ids.push(record.id);
      slots.set(record.association.frame, ids);
    }
  }
  for (const [frame, ids] of slots) {
    if (ids.length > 1) {
      violations.push({
        rule: "unique-single-frame",
        message: `${ids.length} single-frame records claim frame ${frame}`,
        recordIds: ids,
        frame,
      });
    }
  }

  const checked = new Set<number>(distinguishingFrames(records));
  if (frames) {
    for (const frame of frames) {
      checked.add(frame);
    }
  }
  for (const frame of [...checked].sort((a, b) => a - b)) {
    const visible = records.filter((r) => isVisibleIn(r.association, frame));
    if (visible.length > 1) {
      violations.push({
        rule: "one-state-per-frame",
        message: `${visible.length} records are visible in frame ${frame}`,
        recordIds: visible.map((r) => r.id),
        frame,
      });
    }
  }

  return violations;
}
