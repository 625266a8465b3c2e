/**
 * Brightness Sequence
 * Level computation, request validation and the run state machine.
 *
 *   pending -> running -> completed | cancelled | failed
 *
 * Terminal states are final; illegal transitions throw InternalError.
 */

import { nanoid } from "nanoid";
import { BRIGHTNESS } from "@visionrig/config";
import type {
  SequenceDirection,
  SequenceRunSnapshot,
  SequenceSpec,
  SequenceState,
  SequenceStepResult,
} from "@visionrig/types";
import { InternalError, ValidationError } from "../errors";
import { isRecord, readInteger } from "../validation";

const TRANSITIONS: Record<SequenceState, readonly SequenceState[]> = {
  pending: ["running", "cancelled", "failed"],
  running: ["completed", "cancelled", "failed"],
  completed: [],
  cancelled: [],
  failed: [],
};

export function isTerminalState(state: SequenceState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * Brightness levels visited by a sequence.
 * forward: start, start+step, ... while <= end
 * reverse: end, end-step, ... while >= start
 */
export function computeBrightnessLevels(spec: SequenceSpec): number[] {
  const levels: number[] = [];
  if (spec.direction === "reverse") {
    for (let value = spec.end; value >= spec.start; value -= spec.step) {
      levels.push(value);
    }
  } else {
    for (let value = spec.start; value <= spec.end; value += spec.step) {
      levels.push(value);
    }
  }
  return levels;
}

/**
 * Validate an untrusted sequence request
 */
export function parseSequenceSpec(
  input: unknown,
  defaultDirection: SequenceDirection = "forward",
): SequenceSpec {
  if (!isRecord(input)) {
    throw new ValidationError("Sequence request must be an object");
  }

  const start = readInteger(input, "start", BRIGHTNESS.MIN, BRIGHTNESS.MAX);
  const end = readInteger(input, "end", BRIGHTNESS.MIN, BRIGHTNESS.MAX);
  const step = readInteger(input, "step", 1);

  if (start > end) {
    throw new ValidationError("start must not exceed end", "start");
  }

  const direction = input.direction ?? defaultDirection;
  if (direction !== "forward" && direction !== "reverse") {
    throw new ValidationError(
      "direction must be forward or reverse",
      "direction",
    );
  }

  return { start, end, step, direction };
}

export class SequenceRun {
  readonly id: string;
  readonly spec: SequenceSpec;
  readonly levels: readonly number[];
  readonly shotNumber: number;
  readonly createdAt = new Date();

  private _state: SequenceState = "pending";
  private _currentIndex = 0;
  private _cancelRequested = false;
  private _startedAt: Date | null = null;
  private _finishedAt: Date | null = null;
  private _error: string | null = null;
  private readonly steps: SequenceStepResult[] = [];

  constructor(spec: SequenceSpec, shotNumber: number) {
    this.id = nanoid();
    this.spec = { ...spec };
    this.levels = computeBrightnessLevels(spec);
    this.shotNumber = shotNumber;
  }

  get state(): SequenceState {
    return this._state;
  }

  get isActive(): boolean {
    return !isTerminalState(this._state);
  }

  get cancelRequested(): boolean {
    return this._cancelRequested;
  }

  get stepCount(): number {
    return this.steps.length;
  }

  hasWrittenFiles(): boolean {
    return this.steps.some((step) => step.files.length > 0);
  }

  /**
   * Ask the run to stop at the next step boundary
   */
  requestCancel(): boolean {
    if (!this.isActive) {
      return false;
    }
    this._cancelRequested = true;
    return true;
  }

  transition(next: SequenceState, error?: string): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new InternalError(
        `Illegal sequence transition ${this._state} -> ${next}`,
        { operation: "sequence", metadata: { runId: this.id } },
      );
    }
    this._state = next;

    if (next === "running") {
      this._startedAt = new Date();
    }
    if (isTerminalState(next)) {
      this._finishedAt = new Date();
    }
    if (error !== undefined) {
      this._error = error;
    }
  }

  recordStep(step: SequenceStepResult): void {
    this.steps.push(step);
    this._currentIndex = step.index + 1;
  }

  snapshot(): SequenceRunSnapshot {
    return {
      id: this.id,
      state: this._state,
      spec: { ...this.spec },
      levels: [...this.levels],
      currentIndex: this._currentIndex,
      shotNumber: this.shotNumber,
      steps: this.steps.map((step) => ({
        ...step,
        files: [...step.files],
        cameras: [...step.cameras],
        unavailableLights: [...step.unavailableLights],
      })),
      cancelRequested: this._cancelRequested,
      createdAt: this.createdAt.toISOString(),
      startedAt: this._startedAt?.toISOString() ?? null,
      finishedAt: this._finishedAt?.toISOString() ?? null,
      error: this._error,
    };
  }
}
