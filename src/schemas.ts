import { z } from "zod";
import { LEVELS } from "./levels.js";

export const CellSchema = z.tuple([z.number().int(), z.number().int()]);

export const DeltaSchema = z
  .tuple([z.number().int(), z.number().int()])
  .refine(([dx, dy]) => Math.abs(dx) + Math.abs(dy) === 1, {
    message: "direction must be a unit step",
  });

export const SavedSessionSchema = z.object({
  snake: z.array(CellSchema).min(1),
  direction: DeltaSchema,
  food: CellSchema,
  score: z.number().int().min(0),
  levelIndex: z.number().int().min(0).max(LEVELS.length - 1),
});

export const HighScoreSchema = z.object({
  highscore: z.number().int().min(0),
});

export const LevelSchema = z.object({
  scoreThreshold: z.number().int().min(0),
  ticksPerSecond: z.number().positive(),
});

export const LevelsResponseSchema = z.object({
  levels: z.array(LevelSchema),
});

export const HighScoreResponseSchema = z.object({
  highScore: z.number().int().min(0),
});

export const InputEventSchema = z.enum([
  "MoveUp",
  "MoveDown",
  "MoveLeft",
  "MoveRight",
  "TogglePause",
  "Restart",
  "Quit",
  "SaveRequest",
  "LoadRequest",
]);

export const InputBodySchema = z.object({
  event: InputEventSchema,
});

/** Socket payload: either an event name or a raw key name from the page. */
export const SocketInputSchema = z.union([
  z.object({ event: InputEventSchema }),
  z.object({ key: z.string().min(1).max(32) }),
]);
