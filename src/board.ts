import type { Delta, Direction, Grid, Position, Rng } from "./types.js";

const DELTAS: Record<Direction, Delta> = {
  UP: [0, -1],
  DOWN: [0, 1],
  LEFT: [-1, 0],
  RIGHT: [1, 0],
};

const OPPOSITES: Record<Direction, Direction> = {
  UP: "DOWN", DOWN: "UP", LEFT: "RIGHT", RIGHT: "LEFT",
};

export const DIRECTIONS: readonly Direction[] = ["UP", "DOWN", "LEFT", "RIGHT"];

export function randomInt(rng: Rng, min: number, max: number): number {
  return Math.floor(rng() * (max - min)) + min;
}

export function positionKey(p: Position): string {
  return `${p.x},${p.y}`;
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

export function isInBounds(grid: Grid, p: Position): boolean {
  return p.x >= 0 && p.x < grid.width && p.y >= 0 && p.y < grid.height;
}

export function gridCenter(grid: Grid): Position {
  return { x: Math.floor(grid.width / 2), y: Math.floor(grid.height / 2) };
}

export function directionToDelta(direction: Direction): Delta {
  const [dx, dy] = DELTAS[direction];
  return [dx, dy];
}

export function directionFromDelta([dx, dy]: Delta): Direction | null {
  return DIRECTIONS.find(d => DELTAS[d][0] === dx && DELTAS[d][1] === dy) ?? null;
}

export function movePosition(p: Position, direction: Direction): Position {
  const [dx, dy] = DELTAS[direction];
  return { x: p.x + dx, y: p.y + dy };
}

export function getOppositeDirection(dir: Direction): Direction {
  return OPPOSITES[dir];
}

export function buildOccupiedSet(cells: Position[]): Set<string> {
  return new Set(cells.map(positionKey));
}

/**
 * Picks a uniformly random free cell by rejection sampling.
 * Returns null when the snake already covers the whole grid.
 */
export function spawnFood(snake: Position[], grid: Grid, rng: Rng = Math.random): Position | null {
  const occupied = buildOccupiedSet(snake);
  if (occupied.size >= grid.width * grid.height) return null;

  for (;;) {
    const pos: Position = {
      x: randomInt(rng, 0, grid.width),
      y: randomInt(rng, 0, grid.height),
    };
    if (!occupied.has(positionKey(pos))) {
      return pos;
    }
  }
}
