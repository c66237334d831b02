/**
 * Process-wide switch that pauses user-facing handling.
 * Admin requests are never paused.
 */

export interface PauseSwitch {
  isPaused(): boolean;
  pause(): boolean; // true when the state changed
  resume(): boolean;
}

export function createPauseSwitch(initiallyPaused = false): PauseSwitch {
  let paused = initiallyPaused;

  return {
    isPaused: () => paused,
    pause(): boolean {
      const changed = !paused;
      paused = true;
      return changed;
    },
    resume(): boolean {
      const changed = paused;
      paused = false;
      return changed;
    },
  };
}
