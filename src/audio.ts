import type { Logger } from "pino";

export interface AudioSink {
  playEat(): void;
  playLevelUp(): void;
  playGameOver(): void;
}

export type SoundName = "eat" | "levelUp" | "gameOver";

/** Files the page loads from /assets for each sound. */
export const SOUND_FILES: Record<SoundName, string> = {
  eat: "eat.wav",
  levelUp: "levelup.wav",
  gameOver: "gameover.wav",
};

export const silentAudio: AudioSink = {
  playEat() {},
  playLevelUp() {},
  playGameOver() {},
};

/** Sink that hands each sound to `emit`, e.g. a socket broadcast. */
export function createEmittingAudio(emit: (sound: SoundName) => void): AudioSink {
  return {
    playEat: () => emit("eat"),
    playLevelUp: () => emit("levelUp"),
    playGameOver: () => emit("gameOver"),
  };
}

/** Wraps a sink so a failing sound never reaches the game. */
export function safeAudio(sink: AudioSink, log: Logger): AudioSink {
  const guard = (sound: SoundName, play: () => void) => () => {
    try {
      play();
    } catch (err) {
      log.debug({ err, sound }, "Sound unavailable");
    }
  };
  return {
    playEat: guard("eat", () => sink.playEat()),
    playLevelUp: guard("levelUp", () => sink.playLevelUp()),
    playGameOver: guard("gameOver", () => sink.playGameOver()),
  };
}
