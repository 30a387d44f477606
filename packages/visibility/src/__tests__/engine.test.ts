/**
 * Frame-Visibility Engine Tests
 */

import { observability } from "@framevis/core";
import { describe, expect, it, vi } from "vitest";
import { createFrameRangeDataset } from "../dataset.js";
import { FrameVisibilityEngine, createFrameVisibilityEngine } from "../engine.js";
import { FrameVisibilityError, unwrapResult } from "../errors.js";
import type { FrameDataset, StateRecord } from "../types.js";

type Options = {
  dataset?: FrameDataset;
  initialPayload?: string;
  handler?: (entry: observability.LogEntry) => void;
};

function makeEngine(options: Options = {}): FrameVisibilityEngine<string> {
  return createFrameVisibilityEngine<string>({
    dataset: options.dataset ?? createFrameRangeDataset(5, "stack"),
    primitiveId: "roi",
    initialPayload: options.initialPayload,
    devAssertions: { enabled: true, throwOnFailure: true, logToConsole: false },
    logger: new observability.StructuredLogger({
      minLevel: "debug",
      console: false,
      handler: options.handler,
    }),
  });
}

/** id, payload and association of each record, in order */
function shape(records: readonly StateRecord<string>[]): string[] {
  return records.map((r) => {
    const where =
      r.association.kind === "ubiquitous" ? "all" : `${r.association.kind}:${r.association.frame}`;
    return `${r.id}/${r.payload}/${where}`;
  });
}

describe("FrameVisibilityEngine", () => {
  describe("creation", () => {
    it("starts empty", () => {
      const engine = makeEngine();
      expect(engine.records()).toEqual([]);
      expect(engine.size).toBe(0);
      expect(engine.activeRecord(0)).toBeNull();
    });

    it("starts with one ubiquitous record when given a payload", () => {
      const engine = makeEngine({ initialPayload: "base" });
      expect(shape(engine.records())).toEqual(["rec-1/base/all"]);
      expect(engine.activeRecord(123)?.id).toBe("rec-1");
    });
  });

  describe("reassign to ubiquitous", () => {
    it("is idempotent on the sole record", () => {
      const engine = makeEngine({ initialPayload: "base" });

      const first = unwrapResult(engine.reassign("rec-1", null));
      expect(shape(first)).toEqual(["rec-1/base/all"]);

      const second = unwrapResult(engine.reassign("rec-1", { kind: "ubiquitous" }));
      expect(second).toEqual(first);
    });

    it("discards every other record", () => {
      const engine = makeEngine();
      engine.addState("two", 2);
      engine.addState("five", 5);

      const records = unwrapResult(engine.reassign("rec-2", null));
      expect(shape(records)).toEqual(["rec-2/five/all"]);
    });
  });

  describe("reassign to frame-avoiding", () => {
    it("keeps only the single-frame record filling the gap", () => {
      const engine = makeEngine();
      engine.addState("two", 2);
      engine.addState("five", 5);
      engine.addState("seven", 7);

      // -6 avoids frame 5
      const records = unwrapResult(engine.reassign("rec-3", -6));
      expect(shape(records)).toEqual(["rec-2/five/single:5", "rec-3/seven/avoiding:5"]);
      expect(engine.activeRecord(5)?.payload).toBe("five");
      expect(engine.activeRecord(2)?.payload).toBe("seven");
    });

    it("discards a previous avoiding record", () => {
      const engine = makeEngine({ initialPayload: "base" });
      engine.reassign("rec-1", { kind: "avoiding", frame: 3 });

      const result = engine.addState("other", { kind: "avoiding", frame: 1 });
      expect(result.ok).toBe(true);
      expect(shape(engine.records())).toEqual(["rec-2/other/avoiding:1"]);
    });
  });

  describe("reassign to single frame", () => {
    it("replaces the record already occupying the slot", () => {
      const engine = makeEngine();
      engine.addState("two", 2);
      engine.addState("five", 5);
      engine.addState("third", 7);

      const records = unwrapResult(engine.reassign("rec-3", 2));
      expect(shape(records)).toEqual(["rec-2/five/single:5", "rec-3/third/single:2"]);
      expect(engine.findRecord("rec-1")).toBeNull();
    });

    it("fills the gap of an avoiding record that excludes the same frame", () => {
      const engine = makeEngine({ initialPayload: "base" });
      engine.reassign("rec-1", { kind: "avoiding", frame: 3 });

      const result = engine.addState("gap", { kind: "single", frame: 3 });

      expect(result.ok).toBe(true);
      expect(shape(engine.records())).toEqual(["rec-1/base/avoiding:3", "rec-2/gap/single:3"]);
      expect(engine.activeRecord(3)?.id).toBe("rec-2");
      for (const frame of [0, 1, 2, 4]) {
        expect(engine.activeRecord(frame)?.id).toBe("rec-1");
      }
    });

    it("expands a conflicting avoiding record into single frames", () => {
      const engine = makeEngine({ initialPayload: "base" });
      engine.reassign("rec-1", { kind: "avoiding", frame: 3 });

      const records = unwrapResult(engine.addState("claim", 1));

      expect(shape(records)).toEqual([
        "rec-3/base/single:0",
        "rec-4/base/single:2",
        "rec-5/base/single:4",
        "rec-2/claim/single:1",
      ]);
      expect(engine.activeRecord(3)).toBeNull();
      expect(engine.activeRecord(1)?.payload).toBe("claim");
      expect(engine.visibleFrames()).toEqual([0, 1, 2, 4]);
    });

    it("expands when the gap-filling record moves to another frame", () => {
      const engine = makeEngine({ initialPayload: "base" });
      engine.reassign("rec-1", { kind: "avoiding", frame: 3 });
      engine.addState("gap", 3);

      const records = unwrapResult(engine.reassign("rec-2", 1));

      expect(shape(records)).toEqual([
        "rec-3/base/single:0",
        "rec-4/base/single:2",
        "rec-5/base/single:4",
        "rec-2/gap/single:1",
      ]);
      expect(engine.activeRecord(3)).toBeNull();
    });

    it("copies payloads with clonePayload during expansion", () => {
      const base = { color: "red" };
      const engine = createFrameVisibilityEngine<{ color: string }>({
        dataset: createFrameRangeDataset(3),
        initialPayload: base,
        clonePayload: (payload) => ({ ...payload }),
        logger: new observability.StructuredLogger({ console: false }),
      });
      engine.reassign(0, { kind: "avoiding", frame: 2 });
      engine.addState({ color: "blue" }, 0);

      const expanded = engine.activeRecord(1);
      expect(expanded?.payload).toEqual({ color: "red" });
      expect(expanded?.payload).not.toBe(base);
    });

    it("drops the avoiding record without replacements when the dataset has no frames", () => {
      const handler = vi.fn();
      const engine = makeEngine({
        dataset: createFrameRangeDataset(0),
        initialPayload: "base",
        handler,
      });
      engine.reassign("rec-1", { kind: "avoiding", frame: 3 });

      const records = unwrapResult(engine.addState("claim", 1));

      expect(shape(records)).toEqual(["rec-2/claim/single:1"]);
      const messages = handler.mock.calls.map((call) => call[0].message);
      expect(messages).toContain("Expansion skipped: dataset has no frames");
    });

    it("treats a dataset that fails to list frames as empty and warns", () => {
      const entries: observability.LogEntry[] = [];
      const dataset: FrameDataset = {
        id: "offline",
        validFrameIndices: () => {
          throw new Error("dataset unavailable");
        },
      };
      const engine = makeEngine({
        dataset,
        initialPayload: "base",
        handler: (entry) => entries.push(entry),
      });
      engine.reassign("rec-1", { kind: "avoiding", frame: 3 });

      const records = unwrapResult(engine.addState("b", 1));

      expect(shape(records)).toEqual(["rec-2/b/single:1"]);
      const skipped = entries.find(
        (entry) => entry.message === "Expansion skipped: dataset failed to list frames"
      );
      expect(skipped?.level).toBe("warn");
      expect(skipped?.data).toEqual({ target: "rec-2", cause: "dataset unavailable" });
      expect(engine.visibleFrames()).toEqual([]);
    });

    it("demotes a ubiquitous record when a new record claims a frame", () => {
      const engine = makeEngine({ initialPayload: "base" });

      const records = unwrapResult(engine.addState("claim", 2));

      expect(shape(records)).toEqual(["rec-1/base/avoiding:2", "rec-2/claim/single:2"]);
      expect(engine.activeRecord(2)?.id).toBe("rec-2");
      expect(engine.activeRecord(0)?.id).toBe("rec-1");
    });

    it("moves the avoiding record itself to a single frame", () => {
      const engine = makeEngine({ initialPayload: "base" });
      engine.reassign("rec-1", { kind: "avoiding", frame: 3 });
      engine.addState("gap", 3);

      const records = unwrapResult(engine.reassign("rec-1", 0));
      expect(shape(records)).toEqual(["rec-1/base/single:0", "rec-2/gap/single:3"]);
    });
  });

  describe("addState", () => {
    it("adding a ubiquitous record replaces the sequence", () => {
      const engine = makeEngine();
      engine.addState("two", 2);
      engine.addState("five", 5);

      const result = engine.addState("everywhere", null);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.record.id).toBe("rec-3");
      }
      expect(shape(engine.records())).toEqual(["rec-3/everywhere/all"]);
    });
  });

  describe("removeState and updatePayload", () => {
    it("removes one record", () => {
      const engine = makeEngine();
      engine.addState("two", 2);
      engine.addState("five", 5);

      const result = engine.removeState(0);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.record.id).toBe("rec-1");
      }
      expect(shape(engine.records())).toEqual(["rec-2/five/single:5"]);
    });

    it("replaces a payload and keeps identity", () => {
      const engine = makeEngine({ initialPayload: "base" });
      engine.reassign("rec-1", { kind: "avoiding", frame: 1 });

      const records = unwrapResult(engine.updatePayload("rec-1", "moved"));

      expect(shape(records)).toEqual(["rec-1/moved/avoiding:1"]);
    });
  });

  describe("errors", () => {
    it("rejects unknown targets without touching the sequence", () => {
      const engine = makeEngine({ initialPayload: "base" });
      const listener = vi.fn();
      engine.on("recordsChange", listener);
      const before = engine.records();

      const cases: Array<[string | number, string]> = [
        ["rec-9", "No record with id rec-9"],
        [1, "No record at position 1"],
        [-1, "No record at position -1"],
        [0.5, "No record at position 0.5"],
      ];
      for (const [target, message] of cases) {
        expect(engine.reassign(target, 2)).toEqual({
          ok: false,
          error: { code: "INVALID_TARGET", message },
        });
      }
      expect(engine.removeState("rec-9").ok).toBe(false);
      expect(engine.updatePayload(3, "x").ok).toBe(false);

      expect(engine.records()).toBe(before);
      expect(listener).not.toHaveBeenCalled();
    });

    it("rejects malformed associations before resolving the target", () => {
      const engine = makeEngine({ initialPayload: "base" });
      const before = engine.records();

      const negative = engine.reassign("rec-9", { kind: "single", frame: -2 });
      const fractional = engine.addState("x", 1.5);

      expect(negative.ok).toBe(false);
      expect(fractional.ok).toBe(false);
      if (!negative.ok && !fractional.ok) {
        expect(negative.error.code).toBe("MALFORMED_ASSOCIATION");
        expect(fractional.error.code).toBe("MALFORMED_ASSOCIATION");
      }
      expect(engine.records()).toBe(before);
    });

    it("throws INVALID_FRAME for frames that are not non-negative integers", () => {
      const engine = makeEngine({ initialPayload: "base" });
      expect(() => engine.activeRecord(-1)).toThrow(FrameVisibilityError);
      expect(() => engine.setCurrentFrame(2.5)).toThrow(
        "Frame index must be a non-negative integer, got 2.5"
      );
    });

    it("unwrapResult throws the failure as a FrameVisibilityError", () => {
      const engine = makeEngine();
      try {
        unwrapResult(engine.reassign("missing", null));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(FrameVisibilityError);
        if (error instanceof FrameVisibilityError) {
          expect(error.code).toBe("INVALID_TARGET");
        }
      }
    });
  });

  describe("current frame", () => {
    it("tracks the current frame and its record", () => {
      const engine = makeEngine({ initialPayload: "base" });
      engine.addState("claim", 2);
      const listener = vi.fn();
      engine.on("frameChange", listener);

      expect(engine.currentFrame).toBe(0);
      expect(engine.currentRecord()?.id).toBe("rec-1");

      engine.setCurrentFrame(2);
      engine.setCurrentFrame(2);

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith(2);
      expect(engine.currentRecord()?.id).toBe("rec-2");
      expect(engine.hasStateForFrame(2)).toBe(true);
    });
  });

  describe("dataset notifications", () => {
    it("drops single-frame records on removed frames and normalizes the avoiding record", () => {
      const engine = makeEngine({ initialPayload: "base" });
      engine.reassign("rec-1", { kind: "avoiding", frame: 3 });
      engine.addState("gap", 3);

      const records = engine.handleFramesRemoved([3]);

      expect(shape(records)).toEqual(["rec-1/base/all"]);
    });

    it("keeps unrelated records", () => {
      const engine = makeEngine();
      engine.addState("one", 1);
      engine.addState("two", 2);

      expect(shape(engine.handleFramesRemoved([2, 9]))).toEqual(["rec-1/one/single:1"]);
    });

    it("emits nothing when no record is affected", () => {
      const engine = makeEngine();
      engine.addState("one", 1);
      const listener = vi.fn();
      engine.on("recordsChange", listener);

      engine.handleFramesRemoved([4]);
      engine.handleFramesAdded([5, 6]);

      expect(listener).not.toHaveBeenCalled();
      expect(shape(engine.records())).toEqual(["rec-1/one/single:1"]);
    });

    it("emits the valid frames of each notification", () => {
      const engine = makeEngine({ initialPayload: "base" });
      const listener = vi.fn();
      engine.on("framesChange", listener);

      engine.handleFramesAdded([5, 6, 6, -1]);
      engine.handleFramesRemoved([2, 1.5]);
      engine.off("framesChange", listener);
      engine.handleFramesAdded([7]);

      expect(listener.mock.calls).toEqual([
        [{ kind: "added", frames: [5, 6] }],
        [{ kind: "removed", frames: [2] }],
      ]);
    });
  });

  describe("listing and events", () => {
    it("describes each record", () => {
      const engine = makeEngine({ initialPayload: "base" });
      engine.reassign("rec-1", { kind: "avoiding", frame: 3 });
      engine.addState("gap", 3);

      expect(engine.describe()).toEqual(["rec-1: all frames except 3", "rec-2: frame 3"]);
    });

    it("notifies listeners after each mutation until removed", () => {
      const engine = makeEngine();
      const listener = vi.fn();
      engine.on("recordsChange", listener);

      engine.addState("one", 1);
      expect(listener).toHaveBeenCalledWith(engine.records());

      engine.off("recordsChange", listener);
      engine.addState("two", 2);
      expect(listener).toHaveBeenCalledTimes(1);
    });

    it("freezes the published sequence", () => {
      const engine = makeEngine({ initialPayload: "base" });
      expect(Object.isFrozen(engine.records())).toBe(true);
    });
  });
});
