/**
 * Frame-Visibility Engine
 *
 * Owns the record sequence of one annotation primitive. Every mutation goes through here;
 * the rendering surface only reads.
 */

import { observability } from "@framevis/core";
import {
  formatAssociation,
  isValidFrame,
  isVisibleIn,
  parseAssociationRequest,
  singleFrame,
  ubiquitous,
} from "./association";
import { readFrames } from "./dataset";
import {
  DEFAULT_DEV_ASSERTIONS_CONFIG,
  type DevAssertionsRunner,
  createDevAssertionsRunner,
  shouldEnableDevAssertions,
} from "./devAssertions";
import { FrameVisibilityError, failure } from "./errors";
import { applyReassignment } from "./reassign";
import type {
  AssociationRequest,
  FrameAssociation,
  FrameDataset,
  FrameVisibilityConfig,
  FrameVisibilityEvents,
  FrameVisibilityFailure,
  FramesChange,
  MutationResult,
  RecordRef,
  StateRecord,
} from "./types";

type ListenerSets<T> = {
  [K in keyof FrameVisibilityEvents<T>]: Set<FrameVisibilityEvents<T>[K]>;
};

type ResolvedTarget<T> = { ok: true; index: number; record: StateRecord<T> } | { ok: false };

export class FrameVisibilityEngine<T> {
  readonly primitiveId: string;
  private readonly dataset: FrameDataset;
  private readonly clonePayload: (payload: T) => T;
  private readonly idPrefix: string;
  private readonly logger: observability.StructuredLogger;
  private readonly devAssertions: DevAssertionsRunner;
  private readonly listeners: ListenerSets<T> = {
    recordsChange: new Set(),
    frameChange: new Set(),
    framesChange: new Set(),
  };

  private sequence: readonly StateRecord<T>[] = [];
  private frame = 0;
  private nextRecordId = 1;
  private nextOpId = 1;

  constructor(config: FrameVisibilityConfig<T>) {
    this.dataset = config.dataset;
    this.primitiveId = config.primitiveId ?? "primitive";
    this.clonePayload = config.clonePayload ?? ((payload) => payload);
    this.idPrefix = config.idPrefix ?? "rec";
    this.logger = (config.logger ?? observability.getLogger()).child({
      primitiveId: this.primitiveId,
      ...(config.dataset.id !== undefined ? { datasetId: config.dataset.id } : {}),
    });
    this.devAssertions = createDevAssertionsRunner(
      {
        ...DEFAULT_DEV_ASSERTIONS_CONFIG,
        enabled: shouldEnableDevAssertions(),
        ...config.devAssertions,
      },
      this.logger
    );

    if (config.initialPayload !== undefined) {
      this.sequence = Object.freeze([this.createRecord(config.initialPayload)]);
    }
  }

  // ============================================================================
  // Queries
  // ============================================================================

  /** The record sequence, in order */
  records(): readonly StateRecord<T>[] {
    return this.sequence;
  }

  get size(): number {
    return this.sequence.length;
  }

  /** Look a record up by id or position */
  findRecord(ref: RecordRef): StateRecord<T> | null {
    const resolved = this.resolve(ref);
    return resolved.ok ? resolved.record : null;
  }

  /** The record visible in `frame`, if any. The frame need not exist in the dataset. */
  activeRecord(frame: number): StateRecord<T> | null {
    this.requireFrame(frame);
    const candidates = this.sequence.filter((record) => isVisibleIn(record.association, frame));
    this.devAssertions.checkQuery(frame, candidates);
    return candidates[0] ?? null;
  }

  hasStateForFrame(frame: number): boolean {
    return this.activeRecord(frame) !== null;
  }

  /** Valid dataset frames that have an active record, ascending */
  visibleFrames(): number[] {
    return this.datasetFrames("visibleFrames").filter(
      (frame) => this.activeRecord(frame) !== null
    );
  }

  /** One line per record, in sequence order */
  describe(): string[] {
    return this.sequence.map((record) => `${record.id}: ${formatAssociation(record.association)}`);
  }

  // ============================================================================
  // Current Frame
  // ============================================================================

  get currentFrame(): number {
    return this.frame;
  }

  setCurrentFrame(frame: number): void {
    this.requireFrame(frame);
    if (frame === this.frame) {
      return;
    }
    this.frame = frame;
    for (const listener of this.listeners.frameChange) {
      listener(frame);
    }
  }

  /** The record active in the current frame */
  currentRecord(): StateRecord<T> | null {
    return this.activeRecord(this.frame);
  }

  // ============================================================================
  // Mutations
  // ============================================================================

  /** Give an existing record a new frame association */
  reassign(target: RecordRef, association: AssociationRequest): MutationResult<T> {
    const parsed = parseAssociationRequest(association);
    if (!parsed.ok) {
      return this.reject("reassign", target, parsed.error);
    }
    const resolved = this.resolve(target);
    if (!resolved.ok) {
      return this.rejectTarget("reassign", target);
    }

    return this.applyAt("reassign", this.sequence, resolved.index, parsed.association);
  }

  /** Insert a new record by reassigning it into the sequence */
  addState(payload: T, association: AssociationRequest): MutationResult<T> {
    const parsed = parseAssociationRequest(association);
    if (!parsed.ok) {
      return this.reject("addState", null, parsed.error);
    }
    const created = this.createRecord(payload);
    const extended = [...this.sequence, created];
    return this.applyAt("addState", extended, extended.length - 1, parsed.association);
  }

  /** Discard one record */
  removeState(target: RecordRef): MutationResult<T> {
    const resolved = this.resolve(target);
    if (!resolved.ok) {
      return this.rejectTarget("removeState", target);
    }
    const next = this.sequence.filter((_, i) => i !== resolved.index);
    this.commit("removeState", next, { target: resolved.record.id });
    return { ok: true, records: this.sequence, record: resolved.record };
  }

  /** Replace a record's payload; its association and identity are unchanged */
  updatePayload(target: RecordRef, payload: T): MutationResult<T> {
    const resolved = this.resolve(target);
    if (!resolved.ok) {
      return this.rejectTarget("updatePayload", target);
    }
    const updated: StateRecord<T> = { ...resolved.record, payload };
    const next = this.sequence.map((record, i) => (i === resolved.index ? updated : record));
    this.commit("updatePayload", next, { target: updated.id });
    return { ok: true, records: this.sequence, record: updated };
  }

  // ============================================================================
  // Dataset Notifications
  // ============================================================================

  /**
   * Frames were removed from the dataset. Single-frame records on them are discarded; an
   * avoiding record whose gap was removed covers every remaining frame and becomes ubiquitous.
   */
  handleFramesRemoved(frames: Iterable<number>): readonly StateRecord<T>[] {
    const removed = new Set<number>();
    for (const frame of frames) {
      if (isValidFrame(frame)) {
        removed.add(frame);
      }
    }
    this.logger.info("dataset", "Frames removed", { frames: [...removed] });
    this.emitFramesChange({ kind: "removed", frames: [...removed] });

    const survivors = this.sequence.filter(
      (record) => !(record.association.kind === "single" && removed.has(record.association.frame))
    );
    const next = survivors.map((record) =>
      record.association.kind === "avoiding" &&
      removed.has(record.association.frame) &&
      survivors.length === 1
        ? { ...record, association: ubiquitous() }
        : record
    );

    const changed =
      next.length !== this.sequence.length || next.some((record, i) => record !== this.sequence[i]);
    if (changed) {
      this.commit("handleFramesRemoved", next, {
        discarded: this.sequence.length - next.length,
      });
    }
    return this.sequence;
  }

  /** Frames were added to the dataset. Ubiquitous and avoiding records already cover them. */
  handleFramesAdded(frames: Iterable<number>): void {
    const added = [...new Set(frames)].filter(isValidFrame);
    this.logger.info("dataset", "Frames added", { frames: added });
    this.emitFramesChange({ kind: "added", frames: added });
  }

  // ============================================================================
  // Events
  // ============================================================================

  on<K extends keyof FrameVisibilityEvents<T>>(
    event: K,
    listener: FrameVisibilityEvents<T>[K]
  ): void {
    this.listeners[event].add(listener);
  }

  off<K extends keyof FrameVisibilityEvents<T>>(
    event: K,
    listener: FrameVisibilityEvents<T>[K]
  ): void {
    this.listeners[event].delete(listener);
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private applyAt(
    op: string,
    records: readonly StateRecord<T>[],
    targetIndex: number,
    association: FrameAssociation
  ): MutationResult<T> {
    const outcome = applyReassignment({
      records,
      targetIndex,
      association,
      dataset: this.dataset,
      materialize: (source, frame) => this.createRecord(this.clonePayload(source.payload), frame),
    });

    if (outcome.datasetError !== undefined) {
      this.logger.warn("dataset", "Expansion skipped: dataset failed to list frames", {
        target: outcome.target.id,
        cause: describeCause(outcome.datasetError),
      });
    } else if (outcome.degraded) {
      this.logger.debug("visibility", "Expansion skipped: dataset has no frames", {
        target: outcome.target.id,
      });
    }

    this.commit(op, outcome.records, {
      target: outcome.target.id,
      association: formatAssociation(association),
      discarded: outcome.discarded.map((record) => record.id),
      materialized: outcome.materialized.length,
    });
    return { ok: true, records: this.sequence, record: outcome.target };
  }

  /** Dataset frames, or none when the dataset fails to list them */
  private datasetFrames(op: string): number[] {
    const listing = readFrames(this.dataset);
    if (listing.ok) {
      return listing.frames;
    }
    this.logger.warn("dataset", "Dataset failed to list frames", {
      op,
      cause: describeCause(listing.error),
    });
    return [];
  }

  private emitFramesChange(change: FramesChange): void {
    for (const listener of this.listeners.framesChange) {
      listener(change);
    }
  }

  private commit(op: string, next: StateRecord<T>[], details: Record<string, unknown>): void {
    const opId = `${this.primitiveId}:${this.nextOpId++}`;
    if (this.devAssertions.isEnabled()) {
      this.devAssertions.runAfterMutation(next, this.datasetFrames(op));
    }
    this.sequence = Object.freeze(next);
    this.logger.child({ opId }).logMutation(op, "applied", details);
    for (const listener of this.listeners.recordsChange) {
      listener(this.sequence);
    }
  }

  private resolve(ref: RecordRef): ResolvedTarget<T> {
    if (typeof ref === "string") {
      const index = this.sequence.findIndex((record) => record.id === ref);
      return index < 0 ? { ok: false } : { ok: true, index, record: this.sequence[index] };
    }
    const record = isValidFrame(ref) ? this.sequence[ref] : undefined;
    return record === undefined ? { ok: false } : { ok: true, index: ref, record };
  }

  private rejectTarget(op: string, target: RecordRef): MutationResult<T> {
    const where = typeof target === "string" ? `with id ${target}` : `at position ${target}`;
    return this.reject(op, target, { code: "INVALID_TARGET", message: `No record ${where}` });
  }

  private reject(
    op: string,
    target: RecordRef | null,
    error: FrameVisibilityFailure
  ): MutationResult<T> {
    this.logger.logMutation(op, "rejected", { target, code: error.code, reason: error.message });
    return failure(error.code, error.message);
  }

  private requireFrame(frame: number): void {
    if (!isValidFrame(frame)) {
      throw new FrameVisibilityError(
        "INVALID_FRAME",
        `Frame index must be a non-negative integer, got ${String(frame)}`,
        { frame }
      );
    }
  }

  private createRecord(payload: T, frame?: number): StateRecord<T> {
    return {
      id: `${this.idPrefix}-${this.nextRecordId++}`,
      payload,
      association: frame === undefined ? ubiquitous() : singleFrame(frame),
    };
  }
}

export function createFrameVisibilityEngine<T>(
  config: FrameVisibilityConfig<T>
): FrameVisibilityEngine<T> {
  return new FrameVisibilityEngine(config);
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
