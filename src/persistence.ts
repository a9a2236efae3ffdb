import { resolve } from "path";
import { mkdirSync, readFileSync, writeFileSync } from "fs";
import type { Logger } from "pino";
import type { ZodType } from "zod";
import { config } from "./config.js";
import { PersistenceError, describeError, fail, ok, type Result } from "./errors.js";
import { HighScoreSchema, SavedSessionSchema } from "./schemas.js";
import type { SavedHighScore, SavedSession } from "./types.js";

export interface PersistenceAdapter {
  saveSession(record: SavedSession): Result<void>;
  loadSession(): Result<SavedSession>;
  saveHighScore(highScore: number): Result<void>;
  /** 0 when the record is absent or unreadable. */
  loadHighScore(): number;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** JSON files in one directory; all I/O is synchronous and runs between ticks. */
export class FilePersistence implements PersistenceAdapter {
  readonly savePath: string;
  readonly highScorePath: string;

  constructor(
    dir: string,
    private readonly log: Logger,
    files: { save: string; highScore: string } = { save: config.saveFile, highScore: config.highScoreFile },
  ) {
    this.savePath = resolve(dir, files.save);
    this.highScorePath = resolve(dir, files.highScore);
    try {
      mkdirSync(dir, { recursive: true });
    } catch (err) {
      this.log.warn({ err, dir }, "Failed to create data directory");
    }
  }

  saveSession(record: SavedSession): Result<void> {
    const result = this.write(this.savePath, record);
    if (result.ok) this.log.info({ path: this.savePath }, "Game saved");
    return result;
  }

  loadSession(): Result<SavedSession> {
    const result = this.read(this.savePath, SavedSessionSchema);
    if (result.ok) this.log.info({ path: this.savePath }, "Game loaded");
    return result;
  }

  saveHighScore(highScore: number): Result<void> {
    const record: SavedHighScore = { highscore: highScore };
    return this.write(this.highScorePath, record);
  }

  loadHighScore(): number {
    const result = this.read(this.highScorePath, HighScoreSchema);
    return result.ok ? result.value.highscore : 0;
  }

  private write(path: string, data: unknown): Result<void> {
    try {
      writeFileSync(path, JSON.stringify(data));
      return ok(undefined);
    } catch (err) {
      this.log.warn({ err, path }, "Failed to write record");
      return fail(new PersistenceError("io", `Failed to write ${path}: ${describeError(err)}`, { cause: err }));
    }
  }

  private read<T>(path: string, schema: ZodType<T>): Result<T> {
    let text: string;
    try {
      text = readFileSync(path, "utf8");
    } catch (err) {
      if (isMissingFile(err)) {
        this.log.debug({ path }, "No record found");
        return fail(new PersistenceError("not_found", `No record at ${path}`, { cause: err }));
      }
      this.log.warn({ err, path }, "Failed to read record");
      return fail(new PersistenceError("io", `Failed to read ${path}: ${describeError(err)}`, { cause: err }));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      this.log.warn({ err, path }, "Record is not valid JSON");
      return fail(new PersistenceError("malformed", `Invalid JSON in ${path}`, { cause: err }));
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn({ path, issues: parsed.error.issues }, "Record has missing or malformed fields");
      return fail(new PersistenceError("malformed", `Malformed record in ${path}: ${parsed.error.message}`));
    }
    return ok(parsed.data);
  }
}
