import type { Clock } from "./types.js";

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000)
};
