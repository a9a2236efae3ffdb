import { fileURLToPath } from "url";
import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  DATA_DIR: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

const env = EnvSchema.parse(process.env);

export const config = {
  gridWidth: 30,
  gridHeight: 20,
  cellSize: 20,             // pixels, sent to the page with each frame
  frameIntervalMs: 16,      // ~60 frames/second
  pointsPerFood: 10,
  saveFile: "save_slot.json",
  highScoreFile: "highscore.json",
  dataDir: env.DATA_DIR ?? fileURLToPath(new URL("../data", import.meta.url)),
  publicDir: fileURLToPath(new URL("../public", import.meta.url)),
  port: env.PORT,
  host: env.HOST,
  logLevel: env.LOG_LEVEL,
};
