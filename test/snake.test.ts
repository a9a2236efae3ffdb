import { describe, expect, it } from "vitest";
import { DIRECTIONS, getOppositeDirection } from "../src/board.js";
import { advance, computeNextHead, setDirection, wouldCollide } from "../src/snake.js";

const grid = { width: 30, height: 20 };

describe("snake", () => {
  it("steps the head by the direction without wrapping", () => {
    expect(computeNextHead([{ x: 15, y: 10 }], "RIGHT")).toEqual({ x: 16, y: 10 });
    expect(computeNextHead([{ x: 0, y: 10 }], "LEFT")).toEqual({ x: -1, y: 10 });
  });

  it("collides with walls", () => {
    const snake = [{ x: 0, y: 0 }];
    expect(wouldCollide({ x: -1, y: 0 }, snake, grid)).toBe(true);
    expect(wouldCollide({ x: 0, y: -1 }, snake, grid)).toBe(true);
    expect(wouldCollide({ x: 30, y: 0 }, snake, grid)).toBe(true);
    expect(wouldCollide({ x: 1, y: 0 }, snake, grid)).toBe(false);
  });

  it("collides with its own body", () => {
    const snake = [{ x: 5, y: 5 }, { x: 5, y: 6 }, { x: 6, y: 6 }, { x: 6, y: 5 }, { x: 7, y: 5 }];
    expect(wouldCollide({ x: 6, y: 5 }, snake, grid)).toBe(true);
  });

  it("treats the current tail cell as occupied", () => {
    const snake = [{ x: 2, y: 1 }, { x: 1, y: 1 }, { x: 1, y: 2 }, { x: 2, y: 2 }];
    const next = computeNextHead(snake, "DOWN");
    expect(next).toEqual({ x: 2, y: 2 });
    expect(wouldCollide(next, snake, grid)).toBe(true);
  });

  it("keeps its length when it does not eat", () => {
    const snake = [{ x: 3, y: 3 }, { x: 2, y: 3 }];
    const next = advance(snake, { x: 4, y: 3 }, false);
    expect(next).toEqual([{ x: 4, y: 3 }, { x: 3, y: 3 }]);
    expect(snake).toHaveLength(2);
  });

  it("grows by one when it eats", () => {
    const snake = [{ x: 3, y: 3 }, { x: 2, y: 3 }];
    const next = advance(snake, { x: 4, y: 3 }, true);
    expect(next).toEqual([{ x: 4, y: 3 }, { x: 3, y: 3 }, { x: 2, y: 3 }]);
  });

  it("adopts every request except the exact reverse", () => {
    for (const current of DIRECTIONS) {
      for (const requested of DIRECTIONS) {
        const expected = requested === getOppositeDirection(current) ? current : requested;
        expect(setDirection(current, requested)).toBe(expected);
      }
    }
  });
});
