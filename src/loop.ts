import type { Snapshot } from "./types.js";

export interface FrameTarget {
  update(deltaSeconds: number): number;
  snapshot(): Snapshot;
}

export type Renderer = (snapshot: Snapshot) => void;

export interface FrameLoopOptions {
  frameIntervalMs: number;
  render: Renderer;
  /** Milliseconds; defaults to performance.now. */
  now?: () => number;
}

export interface FrameLoop {
  start(): void;
  stop(): void;
  readonly running: boolean;
  readonly frames: number;
}

/**
 * Drives one target from a chained timer: each frame feeds the measured
 * wall-clock delta to `update`, then hands a snapshot to the renderer.
 */
export function createFrameLoop(target: FrameTarget, options: FrameLoopOptions): FrameLoop {
  const now = options.now ?? (() => performance.now());
  let timer: ReturnType<typeof setTimeout> | null = null;
  let running = false;
  let frames = 0;
  let last = 0;

  function frame() {
    timer = null;
    const t = now();
    const delta = Math.max(0, t - last) / 1000;
    last = t;

    target.update(delta);
    options.render(target.snapshot());
    frames++;

    scheduleFrame();
  }

  function scheduleFrame() {
    if (timer) clearTimeout(timer);
    if (!running) return;
    timer = setTimeout(frame, options.frameIntervalMs);
  }

  return {
    start() {
      if (running) return;
      running = true;
      last = now();
      options.render(target.snapshot());
      scheduleFrame();
    },
    stop() {
      running = false;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    },
    get running() {
      return running;
    },
    get frames() {
      return frames;
    },
  };
}
