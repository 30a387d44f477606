import { isValidFrame } from "./association";
import type { FrameDataset } from "./types";

/** Valid frames of a dataset, ascending and de-duplicated. Invalid entries are skipped. */
export function enumerateFrames(dataset: FrameDataset): number[] {
  const frames = new Set<number>();
  for (const frame of dataset.validFrameIndices()) {
    if (isValidFrame(frame)) {
      frames.add(frame);
    }
  }
  return [...frames].sort((a, b) => a - b);
}

export type FrameListing = { ok: true; frames: number[] } | { ok: false; error: unknown };

/** `enumerateFrames` that reports a failing dataset instead of throwing */
export function readFrames(dataset: FrameDataset): FrameListing {
  try {
    return { ok: true, frames: enumerateFrames(dataset) };
  } catch (error) {
    return { ok: false, error };
  }
}

/** Dataset with frames `0..frameCount - 1` */
export function createFrameRangeDataset(frameCount: number, id?: string): FrameDataset {
  const count = Math.max(0, Math.floor(frameCount));
  return {
    id,
    validFrameIndices: () => Array.from({ length: count }, (_, i) => i),
  };
}

/** Dataset over an explicit, fixed set of frames */
export function createStaticDataset(frames: Iterable<number>, id?: string): FrameDataset {
  const snapshot = [...frames];
  return {
    id,
    validFrameIndices: () => snapshot,
  };
}
