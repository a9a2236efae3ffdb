export interface Position {
  x: number;
  y: number;
}

export type Direction = "UP" | "DOWN" | "LEFT" | "RIGHT";

/** Unit step as [dx, dy]; y grows downward. */
export type Delta = [number, number];

export interface Grid {
  width: number;
  height: number;
}

/** Returns a float in [0, 1). */
export type Rng = () => number;

export interface Level {
  scoreThreshold: number;
  ticksPerSecond: number;
}

export type GameStatus = "playing" | "paused" | "over";

export interface SessionState {
  snake: Position[];        // snake[0] = head
  direction: Direction;     // direction of the last tick
  nextDirection: Direction; // applied at the start of the next tick
  food: Position | null;    // null only when the snake fills the grid
  score: number;
  levelIndex: number;
  tickAccumulator: number;  // seconds
  isGameOver: boolean;
  isPaused: boolean;
  highScore: number;
}

export interface Snapshot {
  width: number;
  height: number;
  snake: Position[];
  food: Position | null;
  direction: Direction;
  score: number;
  level: number;
  ticksPerSecond: number;
  highScore: number;
  isPaused: boolean;
  isGameOver: boolean;
  status: GameStatus;
}

export type InputEvent =
  | "MoveUp"
  | "MoveDown"
  | "MoveLeft"
  | "MoveRight"
  | "TogglePause"
  | "Restart"
  | "Quit"
  | "SaveRequest"
  | "LoadRequest";

/** Wire shape of the save slot. */
export interface SavedSession {
  snake: Array<[number, number]>;
  direction: Delta;
  food: [number, number];
  score: number;
  levelIndex: number;
}

export interface SavedHighScore {
  highscore: number;
}

export type GameEvent =
  | "game:ate"
  | "game:over"
  | "game:levelUp"
  | "game:paused"
  | "game:resumed"
  | "game:restarted"
  | "game:saved"
  | "game:loaded";
