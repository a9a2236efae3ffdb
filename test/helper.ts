import { pino } from "pino";
import { vi } from "vitest";
import type { AudioSink } from "../src/audio.js";
import { PersistenceError, fail, ok, type Result } from "../src/errors.js";
import type { GameSessionOptions } from "../src/game.js";
import type { PersistenceAdapter } from "../src/persistence.js";
import type { Grid, Position, Rng, SavedSession } from "../src/types.js";

export const silentLog = pino({ level: "silent" });

/** In-memory stand-in for the save files. */
export class MemoryPersistence implements PersistenceAdapter {
  session: SavedSession | null = null;
  highScore: number | null = null;
  failWrites = false;

  saveSession(record: SavedSession): Result<void> {
    if (this.failWrites) return fail(new PersistenceError("io", "disk full"));
    this.session = structuredClone(record);
    return ok(undefined);
  }

  loadSession(): Result<SavedSession> {
    if (!this.session) return fail(new PersistenceError("not_found", "No saved game"));
    return ok(structuredClone(this.session));
  }

  saveHighScore(highScore: number): Result<void> {
    if (this.failWrites) return fail(new PersistenceError("io", "disk full"));
    this.highScore = highScore;
    return ok(undefined);
  }

  loadHighScore(): number {
    return this.highScore ?? 0;
  }
}

export function mockAudio() {
  return {
    playEat: vi.fn(),
    playLevelUp: vi.fn(),
    playGameOver: vi.fn(),
  } satisfies AudioSink;
}

/** Rng whose samples land spawnFood on the given cells in order, then repeat. */
export function cellRng(grid: Grid, cells: Position[]): Rng {
  const values = cells.flatMap(c => [(c.x + 0.5) / grid.width, (c.y + 0.5) / grid.height]);
  let i = 0;
  return () => values[i++ % values.length];
}

export function sessionOptions(overrides: Partial<GameSessionOptions> = {}): GameSessionOptions {
  return {
    persistence: new MemoryPersistence(),
    rng: () => 0,
    audio: mockAudio(),
    log: silentLog,
    ...overrides,
  };
}
