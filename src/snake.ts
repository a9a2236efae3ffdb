import { getOppositeDirection, isInBounds, movePosition, positionKey } from "./board.js";
import type { Direction, Grid, Position } from "./types.js";

export function computeNextHead(snake: Position[], direction: Direction): Position {
  return movePosition(snake[0], direction);
}

/**
 * Collision is judged against the pre-move body. The current tail still
 * counts as occupied, so stepping into it ends the game even on a move
 * that would have vacated it.
 */
export function wouldCollide(nextHead: Position, snake: Position[], grid: Grid): boolean {
  if (!isInBounds(grid, nextHead)) return true;
  const key = positionKey(nextHead);
  return snake.some(s => positionKey(s) === key);
}

export function advance(snake: Position[], newHead: Position, ateFood: boolean): Position[] {
  const next = [newHead, ...snake];
  if (!ateFood) next.pop();
  return next;
}

export function setDirection(current: Direction, requested: Direction): Direction {
  return requested === getOppositeDirection(current) ? current : requested;
}
