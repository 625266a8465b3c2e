/**
 * Settings Store
 *
 * Holds the current capture settings. Readers always get a frozen snapshot,
 * updates are validated in full before anything is applied.
 * When a settings file is configured the snapshot is loaded from it and
 * written back (temp file + rename) after every change.
 */

import fs from "fs/promises";
import path from "path";
import { BRIGHTNESS, DEFAULT_SETTINGS } from "@visionrig/config";
import { createLogger } from "@visionrig/utils";
import type {
  SaveMode,
  SequenceDirection,
  Settings,
  SettingsUpdate,
} from "@visionrig/types";
import { errorMessage, ValidationError } from "../errors";
import { isRecord, readInteger, readString } from "../validation";

const logger = createLogger("settings");

const SAVE_MODES: readonly SaveMode[] = [
  "all",
  "exclude-designated",
  "designated-only",
];
const DIRECTIONS: readonly SequenceDirection[] = ["forward", "reverse"];

export interface SettingsStoreOptions {
  savePath: string;
  /** JSON file backing the store, null keeps settings in memory only */
  settingsFile: string | null;
  initial?: SettingsUpdate;
}

function isSaveMode(value: unknown): value is SaveMode {
  return SAVE_MODES.some((mode) => mode === value);
}

function isDirection(value: unknown): value is SequenceDirection {
  return DIRECTIONS.some((direction) => direction === value);
}

/**
 * Validate an untrusted partial settings object.
 * Throws ValidationError on the first invalid or unknown field.
 */
export function parseSettingsUpdate(input: unknown): SettingsUpdate {
  if (!isRecord(input)) {
    throw new ValidationError("Settings update must be an object");
  }

  const update: SettingsUpdate = {};

  for (const field of Object.keys(input)) {
    switch (field) {
      case "product":
        update.product = readString(input, field);
        break;
      case "condition":
        update.condition = readString(input, field);
        break;
      case "savePath": {
        const savePath = readString(input, field);
        if (savePath === "") {
          throw new ValidationError("savePath must not be empty", field);
        }
        update.savePath = savePath;
        break;
      }
      case "shotNumber":
        update.shotNumber = readInteger(input, field, 0);
        break;
      case "lightValue":
        update.lightValue = readInteger(
          input,
          field,
          BRIGHTNESS.MIN,
          BRIGHTNESS.MAX,
        );
        break;
      case "sequenceStart":
        update.sequenceStart = readInteger(
          input,
          field,
          BRIGHTNESS.MIN,
          BRIGHTNESS.MAX,
        );
        break;
      case "sequenceEnd":
        update.sequenceEnd = readInteger(
          input,
          field,
          BRIGHTNESS.MIN,
          BRIGHTNESS.MAX,
        );
        break;
      case "sequenceStep":
        update.sequenceStep = readInteger(input, field, 1, BRIGHTNESS.MAX);
        break;
      case "saveMode": {
        const value = input[field];
        if (!isSaveMode(value)) {
          throw new ValidationError(
            `saveMode must be one of: ${SAVE_MODES.join(", ")}`,
            field,
          );
        }
        update.saveMode = value;
        break;
      }
      case "sequenceDirection": {
        const value = input[field];
        if (!isDirection(value)) {
          throw new ValidationError(
            `sequenceDirection must be one of: ${DIRECTIONS.join(", ")}`,
            field,
          );
        }
        update.sequenceDirection = value;
        break;
      }
      default:
        throw new ValidationError(`Unknown setting: ${field}`, field);
    }
  }

  return update;
}

export class SettingsStore {
  private current: Readonly<Settings>;
  private readonly defaults: Readonly<Settings>;
  private readonly settingsFile: string | null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: SettingsStoreOptions) {
    this.settingsFile = options.settingsFile;
    this.defaults = Object.freeze({
      ...DEFAULT_SETTINGS,
      savePath: options.savePath,
      ...parseSettingsUpdate(options.initial ?? {}),
    });
    this.current = this.defaults;
  }

  get(): Readonly<Settings> {
    return this.current;
  }

  /**
   * Validate and merge a partial update. Nothing changes if any field is
   * invalid.
   */
  async update(input: unknown): Promise<Readonly<Settings>> {
    const update = parseSettingsUpdate(input);
    const next = this.apply(update);
    logger.info("Settings updated", { fields: Object.keys(update) });
    await this.persist();
    return next;
  }

  async advanceShotNumber(): Promise<number> {
    const reserved = this.reserveShotNumber();
    await this.flush();
    return reserved + 1;
  }

  /**
   * Take the current shot number and move past it in one step, so no other
   * writer can be handed the same number. The write is queued; flush()
   * waits for it.
   */
  reserveShotNumber(): number {
    const reserved = this.current.shotNumber;
    this.apply({ shotNumber: reserved + 1 });
    logger.debug(`Shot number ${reserved} reserved`);
    this.queueWrite();
    return reserved;
  }

  /**
   * Give back an unused reservation, only if nothing was reserved after it
   */
  releaseShotNumber(reserved: number): boolean {
    if (this.current.shotNumber !== reserved + 1) {
      return false;
    }
    this.apply({ shotNumber: reserved });
    logger.debug(`Shot number ${reserved} released`);
    this.queueWrite();
    return true;
  }

  async resetShotNumber(): Promise<void> {
    this.apply({ shotNumber: DEFAULT_SETTINGS.shotNumber });
    logger.info("Shot number reset");
    await this.persist();
  }

  /**
   * Replace the in-memory snapshot with the settings file contents.
   * Missing file keeps the current values; an invalid file is rejected.
   */
  async reload(): Promise<Readonly<Settings>> {
    const file = this.settingsFile;
    if (!file) {
      return this.current;
    }

    // A queued write would otherwise land after the file is read
    await this.flush();

    let raw: string;
    try {
      raw = await fs.readFile(file, "utf-8");
    } catch (error) {
      if (isRecord(error) && error.code === "ENOENT") {
        logger.info("No settings file yet, using current settings", {
          file,
        });
        return this.current;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(
        `Settings file is not valid JSON: ${errorMessage(error)}`,
        undefined,
        { operation: "reload", metadata: { file } },
      );
    }

    const next = this.apply(parseSettingsUpdate(parsed), this.defaults);
    logger.info("Settings loaded", { file });
    return next;
  }

  /**
   * Wait for pending writes to land
   */
  flush(): Promise<void> {
    return this.writeChain;
  }

  private apply(
    update: SettingsUpdate,
    base: Readonly<Settings> = this.current,
  ): Readonly<Settings> {
    this.current = Object.freeze({ ...base, ...update });
    return this.current;
  }

  private persist(): Promise<void> {
    this.queueWrite();
    return this.writeChain;
  }

  private queueWrite(): void {
    const file = this.settingsFile;
    if (!file) {
      return;
    }

    // Writes are serialized; each one stores the snapshot current at its turn
    this.writeChain = this.writeChain.then(async () => {
      const tempFile = `${file}.tmp`;
      try {
        await fs.mkdir(path.dirname(file), { recursive: true });
        await fs.writeFile(
          tempFile,
          JSON.stringify(this.current, null, 2),
          "utf-8",
        );
        await fs.rename(tempFile, file);
      } catch (error) {
        logger.warn("Failed to persist settings", {
          file,
          error: errorMessage(error),
        });
      }
    });
  }
}
