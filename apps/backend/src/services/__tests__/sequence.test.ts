/**
 * Brightness Sequence Tests
 *
 * Source: apps/backend/src/services/sequence.ts
 *
 * Critical Invariants:
 * - Levels never leave [start, end] and follow the requested direction
 * - Terminal states are final
 */

import { describe, it, expect } from "vitest";
import { InternalError, ValidationError } from "../../errors";
import {
  computeBrightnessLevels,
  isTerminalState,
  parseSequenceSpec,
  SequenceRun,
} from "../sequence";

describe("computeBrightnessLevels", () => {
  it("walks forward from start to end", () => {
    expect(
      computeBrightnessLevels({
        start: 30,
        end: 120,
        step: 10,
        direction: "forward",
      }),
    ).toEqual([30, 40, 50, 60, 70, 80, 90, 100, 110, 120]);
  });

  it("walks backward from end to start", () => {
    expect(
      computeBrightnessLevels({
        start: 30,
        end: 120,
        step: 30,
        direction: "reverse",
      }),
    ).toEqual([120, 90, 60, 30]);
  });

  it("stops before overshooting the far bound", () => {
    const spec = { start: 0, end: 25, step: 10 };
    expect(computeBrightnessLevels({ ...spec, direction: "forward" })).toEqual(
      [0, 10, 20],
    );
    expect(computeBrightnessLevels({ ...spec, direction: "reverse" })).toEqual(
      [25, 15, 5],
    );
  });

  it("yields a single level when start equals end", () => {
    expect(
      computeBrightnessLevels({
        start: 80,
        end: 80,
        step: 5,
        direction: "forward",
      }),
    ).toEqual([80]);
  });
});

describe("parseSequenceSpec", () => {
  it("accepts a valid request and applies the default direction", () => {
    expect(parseSequenceSpec({ start: 30, end: 120, step: 10 }, "reverse"))
      .toEqual({ start: 30, end: 120, step: 10, direction: "reverse" });
  });

  it("rejects non-object input", () => {
    expect(() => parseSequenceSpec("30-120")).toThrow(
      "Sequence request must be an object",
    );
  });

  it("rejects out-of-range levels", () => {
    expect(() => parseSequenceSpec({ start: 300, end: 120, step: 10 })).toThrow(
      "start must be an integer between 0 and 255",
    );
  });

  it("rejects a zero step", () => {
    expect(() => parseSequenceSpec({ start: 0, end: 10, step: 0 })).toThrow(
      "step must be an integer >= 1",
    );
  });

  it("rejects start above end", () => {
    let caught: unknown;
    try {
      parseSequenceSpec({ start: 100, end: 50, step: 10 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      message: "start must not exceed end",
      field: "start",
    });
  });

  it("rejects an unknown direction", () => {
    expect(() =>
      parseSequenceSpec({ start: 0, end: 10, step: 1, direction: "up" }),
    ).toThrow("direction must be forward or reverse");
  });
});

describe("SequenceRun", () => {
  const spec = { start: 30, end: 50, step: 10, direction: "forward" as const };

  it("starts pending with precomputed levels", () => {
    const run = new SequenceRun(spec, 7);
    const snapshot = run.snapshot();

    expect(snapshot.state).toBe("pending");
    expect(snapshot.levels).toEqual([30, 40, 50]);
    expect(snapshot.shotNumber).toBe(7);
    expect(snapshot.startedAt).toBeNull();
    expect(run.isActive).toBe(true);
  });

  it("records steps and tracks the current index", () => {
    const run = new SequenceRun(spec, 1);
    run.transition("running");
    run.recordStep({
      index: 0,
      brightness: 30,
      unavailableLights: [],
      success: true,
      files: ["/captures/a.png"],
      cameras: [],
      finishedAt: new Date().toISOString(),
    });

    const snapshot = run.snapshot();
    expect(snapshot.currentIndex).toBe(1);
    expect(snapshot.steps).toHaveLength(1);
    expect(run.hasWrittenFiles()).toBe(true);
    expect(snapshot.startedAt).not.toBeNull();
  });

  it("finalizes on a terminal state", () => {
    const run = new SequenceRun(spec, 1);
    run.transition("running");
    run.transition("failed", "Storage write failed: disk full");

    expect(isTerminalState(run.state)).toBe(true);
    expect(run.isActive).toBe(false);
    expect(run.snapshot().error).toBe("Storage write failed: disk full");
    expect(run.snapshot().finishedAt).not.toBeNull();
    expect(run.requestCancel()).toBe(false);
  });

  it("rejects illegal transitions", () => {
    const run = new SequenceRun(spec, 1);

    expect(() => run.transition("completed")).toThrow(InternalError);
    expect(() => run.transition("completed")).toThrow(
      "Illegal sequence transition pending -> completed",
    );

    run.transition("cancelled");
    expect(() => run.transition("running")).toThrow(
      "Illegal sequence transition cancelled -> running",
    );
  });

  it("flags a cancel request while active", () => {
    const run = new SequenceRun(spec, 1);

    expect(run.requestCancel()).toBe(true);
    expect(run.cancelRequested).toBe(true);
    expect(run.snapshot().cancelRequested).toBe(true);
  });
});
