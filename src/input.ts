import type { InputEvent } from "./types.js";

const KEY_BINDINGS: Record<string, InputEvent> = {
  ArrowUp: "MoveUp",
  ArrowDown: "MoveDown",
  ArrowLeft: "MoveLeft",
  ArrowRight: "MoveRight",
  " ": "TogglePause",
  Space: "TogglePause",
  Enter: "Restart",
  Escape: "Quit",
  s: "SaveRequest",
  S: "SaveRequest",
  l: "LoadRequest",
  L: "LoadRequest",
};

/** Maps a browser `KeyboardEvent.key` (or `code` for Space) to an input event. */
export function keyToInput(key: string): InputEvent | null {
  return Object.hasOwn(KEY_BINDINGS, key) ? KEY_BINDINGS[key] : null;
}

