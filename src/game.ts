import type { Logger } from "pino";
import { config } from "./config.js";
import { safeAudio, silentAudio, type AudioSink } from "./audio.js";
import {
  buildOccupiedSet, directionFromDelta, directionToDelta,
  gridCenter, isInBounds, positionKey, samePosition, spawnFood,
} from "./board.js";
import { PersistenceError, fail, ok, type Result } from "./errors.js";
import { LEVELS, isLevelIndex, levelFor, tickIntervalFor, ticksPerSecondFor } from "./levels.js";
import { moduleLogger } from "./logger.js";
import type { PersistenceAdapter } from "./persistence.js";
import { advance, computeNextHead, setDirection, wouldCollide } from "./snake.js";
import type {
  Direction, GameEvent, GameStatus, Grid, InputEvent, Level,
  Position, Rng, SavedSession, SessionState, Snapshot,
} from "./types.js";

export interface GameSessionOptions {
  persistence: PersistenceAdapter;
  grid?: Grid;
  levels?: readonly Level[];
  rng?: Rng;
  audio?: AudioSink;
  log?: Logger;
}

export type InputOutcome =
  | { kind: "handled" }
  | { kind: "quit" }
  | { kind: "saved"; result: Result<void> }
  | { kind: "loaded"; result: Result<void> };

export type GameEventListener = (event: GameEvent, data: Record<string, unknown>) => void;

export class GameSession {
  readonly grid: Grid;
  readonly levels: readonly Level[];
  private readonly rng: Rng;
  private readonly audio: AudioSink;
  private readonly persistence: PersistenceAdapter;
  private readonly log: Logger;
  private state: SessionState;
  private onEvent: GameEventListener | null = null;

  constructor(options: GameSessionOptions) {
    this.grid = options.grid ?? { width: config.gridWidth, height: config.gridHeight };
    this.levels = options.levels ?? LEVELS;
    this.rng = options.rng ?? Math.random;
    this.log = options.log ?? moduleLogger("game");
    this.audio = safeAudio(options.audio ?? silentAudio, this.log);
    this.persistence = options.persistence;
    this.state = this.createInitialState();
  }

  /** Builds a session and overlays the given fields on a fresh start. */
  static fromState(options: GameSessionOptions, fields: Partial<SessionState>): GameSession {
    const session = new GameSession(options);
    const base = session.state;
    session.state = { ...base, ...fields };
    if (fields.direction && !fields.nextDirection) {
      session.state.nextDirection = fields.direction;
    }
    if (fields.snake && fields.food === undefined) {
      session.state.food = spawnFood(session.state.snake, session.grid, session.rng);
    }
    return session;
  }

  private createInitialState(): SessionState {
    const snake = [gridCenter(this.grid)];
    return {
      snake,
      direction: "RIGHT",
      nextDirection: "RIGHT",
      food: spawnFood(snake, this.grid, this.rng),
      score: 0,
      levelIndex: 0,
      tickAccumulator: 0,
      isGameOver: false,
      isPaused: false,
      highScore: this.persistence.loadHighScore(),
    };
  }

  setOnEvent(cb: GameEventListener | null) {
    this.onEvent = cb;
  }

  private emitEvent(event: GameEvent, data: Record<string, unknown> = {}) {
    this.onEvent?.(event, data);
  }

  get status(): GameStatus {
    if (this.state.isGameOver) return "over";
    return this.state.isPaused ? "paused" : "playing";
  }

  get ticksPerSecond(): number {
    return ticksPerSecondFor(this.state.levelIndex, this.levels);
  }

  getState(): SessionState {
    return structuredClone(this.state);
  }

  snapshot(): Snapshot {
    const s = this.state;
    return {
      width: this.grid.width,
      height: this.grid.height,
      snake: s.snake.map(p => ({ x: p.x, y: p.y })),
      food: s.food ? { x: s.food.x, y: s.food.y } : null,
      direction: s.direction,
      score: s.score,
      level: s.levelIndex,
      ticksPerSecond: this.ticksPerSecond,
      highScore: s.highScore,
      isPaused: s.isPaused,
      isGameOver: s.isGameOver,
      status: this.status,
    };
  }

  // --- Control ---

  reset() {
    this.state = this.createInitialState();
  }

  restart(): boolean {
    if (!this.state.isGameOver) return false;
    // The session's best score survives a high-score write that failed
    const highScore = this.state.highScore;
    this.reset();
    this.state.highScore = Math.max(this.state.highScore, highScore);
    this.log.info("Game restarted");
    this.emitEvent("game:restarted", {});
    return true;
  }

  togglePause(): boolean {
    if (this.state.isGameOver) return false;
    this.state.isPaused = !this.state.isPaused;
    this.emitEvent(this.state.isPaused ? "game:paused" : "game:resumed", {});
    return true;
  }

  /** Checked against the last tick's direction; applied on the next tick. */
  requestDirection(requested: Direction) {
    // A rejected reversal leaves any earlier request in place
    if (setDirection(this.state.direction, requested) !== requested) return;
    this.state.nextDirection = requested;
  }

  handleInput(event: InputEvent): InputOutcome {
    switch (event) {
      case "MoveUp":
        this.requestDirection("UP");
        return { kind: "handled" };
      case "MoveDown":
        this.requestDirection("DOWN");
        return { kind: "handled" };
      case "MoveLeft":
        this.requestDirection("LEFT");
        return { kind: "handled" };
      case "MoveRight":
        this.requestDirection("RIGHT");
        return { kind: "handled" };
      case "TogglePause":
        this.togglePause();
        return { kind: "handled" };
      case "Restart":
        this.restart();
        return { kind: "handled" };
      case "SaveRequest":
        return { kind: "saved", result: this.save() };
      case "LoadRequest":
        return { kind: "loaded", result: this.load() };
      case "Quit":
        return { kind: "quit" };
    }
  }

  // --- Tick ---

  /** Advances the accumulator by one frame and runs every tick it has room for. */
  update(deltaSeconds: number): number {
    if (this.status !== "playing") return 0;
    this.state.tickAccumulator += Math.max(0, deltaSeconds);

    let ticks = 0;
    while (this.status === "playing") {
      const interval = tickIntervalFor(this.state.levelIndex, this.levels);
      if (this.state.tickAccumulator < interval) break;
      this.state.tickAccumulator -= interval;
      this.gameTick();
      ticks++;
    }
    return ticks;
  }

  gameTick() {
    if (this.status !== "playing") return;
    const s = this.state;

    s.direction = s.nextDirection;
    const newHead = computeNextHead(s.snake, s.direction);

    if (wouldCollide(newHead, s.snake, this.grid)) {
      this.endGame(newHead);
      return;
    }

    const ateFood = s.food !== null && samePosition(newHead, s.food);
    s.snake = advance(s.snake, newHead, ateFood);
    if (!ateFood) return;

    s.score += config.pointsPerFood;
    this.audio.playEat();
    s.food = spawnFood(s.snake, this.grid, this.rng);
    this.emitEvent("game:ate", { score: s.score, length: s.snake.length });

    const level = levelFor(s.score, this.levels);
    if (level !== s.levelIndex) {
      s.levelIndex = level;
      this.log.info({ level: level + 1, ticksPerSecond: this.ticksPerSecond }, "Level up");
      this.audio.playLevelUp();
      this.emitEvent("game:levelUp", { level, ticksPerSecond: this.ticksPerSecond });
    }
  }

  private endGame(at: Position) {
    const s = this.state;
    s.isGameOver = true;
    s.highScore = Math.max(s.highScore, s.score);
    const saved = this.persistence.saveHighScore(s.highScore);
    if (!saved.ok) {
      this.log.warn({ err: saved.error }, "High score not persisted");
    }
    this.audio.playGameOver();
    this.log.info({ score: s.score, highScore: s.highScore, at }, "Game over");
    this.emitEvent("game:over", { score: s.score, highScore: s.highScore });
  }

  // --- Persistence ---

  toRecord(): SavedSession | null {
    const s = this.state;
    if (!s.food) return null;
    return {
      snake: s.snake.map((p): [number, number] => [p.x, p.y]),
      direction: directionToDelta(s.direction),
      food: [s.food.x, s.food.y],
      score: s.score,
      levelIndex: s.levelIndex,
    };
  }

  save(): Result<void> {
    const record = this.toRecord();
    if (!record) {
      return fail(new PersistenceError("invalid", "Nothing to save: the board has no food"));
    }
    const result = this.persistence.saveSession(record);
    if (result.ok) this.emitEvent("game:saved", { score: record.score });
    return result;
  }

  /** Applies the save slot only if every field fits this board; otherwise nothing changes. */
  load(): Result<void> {
    const loaded = this.persistence.loadSession();
    if (!loaded.ok) return loaded;

    const restored = this.validateRecord(loaded.value);
    if (!restored.ok) {
      this.log.warn({ err: restored.error }, "Saved game rejected");
      return restored;
    }

    const { snake, direction, food, score, levelIndex } = restored.value;
    this.state = {
      ...this.state,
      snake,
      direction,
      nextDirection: direction,
      food,
      score,
      levelIndex,
      tickAccumulator: 0,
      isGameOver: false,
      isPaused: false,
    };
    this.emitEvent("game:loaded", { score, level: levelIndex });
    return ok(undefined);
  }

  private validateRecord(record: SavedSession): Result<Pick<SessionState, "snake" | "direction" | "food" | "score" | "levelIndex">> {
    const invalid = (message: string) => fail(new PersistenceError("invalid", message));

    const snake: Position[] = record.snake.map(([x, y]) => ({ x, y }));
    const food: Position = { x: record.food[0], y: record.food[1] };
    const direction = directionFromDelta(record.direction);

    if (!direction) return invalid("Saved direction is not a unit step");
    if (!isLevelIndex(record.levelIndex, this.levels)) return invalid(`Unknown level ${record.levelIndex}`);
    if (!snake.every(p => isInBounds(this.grid, p))) return invalid("Saved snake leaves the board");
    if (!isInBounds(this.grid, food)) return invalid("Saved food is off the board");

    const occupied = buildOccupiedSet(snake);
    if (occupied.size !== snake.length) return invalid("Saved snake overlaps itself");
    if (occupied.has(positionKey(food))) return invalid("Saved food sits on the snake");

    return ok({ snake, direction, food, score: record.score, levelIndex: record.levelIndex });
  }
}
