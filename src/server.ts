import { Server } from "socket.io";
import { buildApp } from "./app.js";
import { SOUND_FILES, createEmittingAudio, type SoundName } from "./audio.js";
import { config } from "./config.js";
import { GameSession, type InputOutcome } from "./game.js";
import { keyToInput } from "./input.js";
import { LEVELS } from "./levels.js";
import { logger, moduleLogger } from "./logger.js";
import { createFrameLoop } from "./loop.js";
import { FilePersistence } from "./persistence.js";
import { SocketInputSchema } from "./schemas.js";
import type { InputEvent, Level, Snapshot } from "./types.js";

interface ServerToClientEvents {
  "game:config": (data: { cellSize: number; levels: readonly Level[]; sounds: Record<SoundName, string> }) => void;
  "game:frame": (snapshot: Snapshot) => void;
  "game:notice": (data: { message: string }) => void;
  "game:event": (data: { event: string; data: Record<string, unknown> }) => void;
  sound: (sound: SoundName) => void;
}

interface ClientToServerEvents {
  input: (payload: unknown) => void;
}

const persistence = new FilePersistence(config.dataDir, moduleLogger("persistence"));

// Sounds and frames go out over socket.io once it is attached below
let io: Server<ClientToServerEvents, ServerToClientEvents> | null = null;

const session = new GameSession({
  persistence,
  audio: createEmittingAudio((sound) => io?.emit("sound", sound)),
  log: moduleLogger("game"),
});

const loop = createFrameLoop(session, {
  frameIntervalMs: config.frameIntervalMs,
  render: (snapshot) => io?.emit("game:frame", snapshot),
});

let shuttingDown = false;

async function shutdown(reason: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  app.log.info({ reason }, "Shutting down");
  loop.stop();
  io?.disconnectSockets(true);
  await app.close();
  process.exit(0);
}

function quit(reason: string) {
  shutdown(reason).catch((err) => {
    app.log.error({ err }, "Shutdown failed");
    process.exit(1);
  });
}

const app = await buildApp({
  session,
  logger,
  onQuit: () => quit("quit requested"),
});

function noticeFor(outcome: InputOutcome): string | null {
  if (outcome.kind !== "saved" && outcome.kind !== "loaded") return null;
  if (outcome.result.ok) return outcome.kind === "saved" ? "Game saved" : "Game loaded";
  return `${outcome.kind === "saved" ? "Save" : "Load"} failed: ${outcome.result.error.message}`;
}

function dispatchInput(event: InputEvent) {
  const outcome = session.handleInput(event);
  if (outcome.kind === "quit") {
    quit("quit requested");
    return;
  }
  const message = noticeFor(outcome);
  if (message) io?.emit("game:notice", { message });
}

// Start HTTP server
await app.listen({ port: config.port, host: config.host });

// Socket.io on top of Fastify's underlying HTTP server
io = new Server<ClientToServerEvents, ServerToClientEvents>(app.server, {
  cors: { origin: "*" },
});

io.on("connection", (socket) => {
  app.log.info("Player connected");

  socket.emit("game:config", { cellSize: config.cellSize, levels: LEVELS, sounds: SOUND_FILES });
  socket.emit("game:frame", session.snapshot());

  socket.on("input", (payload) => {
    const parsed = SocketInputSchema.safeParse(payload);
    if (!parsed.success) {
      app.log.debug({ issues: parsed.error.issues }, "Ignoring malformed input");
      return;
    }
    const event = "event" in parsed.data ? parsed.data.event : keyToInput(parsed.data.key);
    if (event) dispatchInput(event);
  });

  socket.on("disconnect", () => {
    app.log.info("Player disconnected");
  });
});

// Wire game events to Socket.io
session.setOnEvent((event, data) => {
  io?.emit("game:event", { event, data });
});

process.once("SIGINT", () => quit("SIGINT"));
process.once("SIGTERM", () => quit("SIGTERM"));

loop.start();

app.log.info(`Snake running on http://${config.host}:${config.port}`);
app.log.info(`API docs: http://localhost:${config.port}/docs`);
