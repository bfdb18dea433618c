/** Uniform draws in [0, 1). One instance per planner; instances are not shared across workers. */
export interface RandomSource {
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/** mulberry32. A given seed yields the same stream on every platform. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

export function pick<T>(random: RandomSource, choices: readonly T[]): T {
  if (choices.length === 0) throw new Error("Cannot pick from an empty list");
  const index = Math.min(Math.floor(random.next() * choices.length), choices.length - 1);
  const choice = choices[index];
  if (choice === undefined) throw new Error(`Random index ${index} out of range`);
  return choice;
}

/** Fisher–Yates over a copy; the input array is left untouched. */
export function shuffle<T>(random: RandomSource, items: readonly T[]): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.min(Math.floor(random.next() * (i + 1)), i);
    const displaced = out.splice(j, 1, ...out.slice(i, i + 1));
    out.splice(i, 1, ...displaced);
  }
  return out;
}
