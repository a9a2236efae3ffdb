import { describe, expect, it, vi } from "vitest";
import { SOUND_FILES, createEmittingAudio, safeAudio } from "../src/audio.js";
import { keyToInput } from "../src/input.js";
import { SocketInputSchema } from "../src/schemas.js";
import { silentLog } from "./helper.js";

describe("keyToInput", () => {
  it("maps the game keys", () => {
    expect(keyToInput("ArrowUp")).toBe("MoveUp");
    expect(keyToInput("ArrowLeft")).toBe("MoveLeft");
    expect(keyToInput("Space")).toBe("TogglePause");
    expect(keyToInput(" ")).toBe("TogglePause");
    expect(keyToInput("Enter")).toBe("Restart");
    expect(keyToInput("Escape")).toBe("Quit");
    expect(keyToInput("s")).toBe("SaveRequest");
    expect(keyToInput("L")).toBe("LoadRequest");
  });

  it("ignores unbound keys", () => {
    expect(keyToInput("x")).toBeNull();
    expect(keyToInput("toString")).toBeNull();
  });
});

describe("SocketInputSchema", () => {
  it("accepts an event name or a key", () => {
    expect(SocketInputSchema.safeParse({ event: "Restart" }).success).toBe(true);
    expect(SocketInputSchema.safeParse({ key: "ArrowUp" }).success).toBe(true);
    expect(SocketInputSchema.safeParse({ event: "Fly" }).success).toBe(false);
    expect(SocketInputSchema.safeParse("ArrowUp").success).toBe(false);
  });
});

describe("audio", () => {
  it("emits one named sound per call", () => {
    const emit = vi.fn();
    const audio = createEmittingAudio(emit);
    audio.playEat();
    audio.playLevelUp();
    audio.playGameOver();
    expect(emit.mock.calls).toEqual([["eat"], ["levelUp"], ["gameOver"]]);
  });

  it("names the sound files the page loads", () => {
    expect(SOUND_FILES).toEqual({ eat: "eat.wav", levelUp: "levelup.wav", gameOver: "gameover.wav" });
  });

  it("swallows failures from the wrapped sink", () => {
    const audio = safeAudio(createEmittingAudio(() => {
      throw new Error("missing eat.wav");
    }), silentLog);
    expect(() => audio.playEat()).not.toThrow();
  });
});
