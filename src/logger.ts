import { pino, type Logger } from "pino";
import { config } from "./config.js";

export const logger: Logger = pino({
  name: "snake-levels",
  level: config.logLevel,
});

export function moduleLogger(module: string, parent: Logger = logger): Logger {
  return parent.child({ module });
}
