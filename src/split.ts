import type { GroupType } from "./group";
import type { Random } from "./random";
import { randomIndex } from "./random";

/** Fisher-Yates shuffle of a copy, the input array is left untouched */
export function shuffle<T>(items: readonly T[], random: Random): T[] {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = randomIndex(random, i + 1);
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/**
 * Number of samples that go to the train group.
 *
 * The ratio is not checked here: a ratio above 1 puts everything in train,
 * a negative one puts everything in val.
 */
export function countTrainSamples(total: number, train_ratio: number): number {
  const count = Math.floor(total * train_ratio);
  return Math.max(0, Math.min(total, count));
}

export type DatasetSplit<T> = Record<GroupType, T[]>;

/** random train/val partition, no stratification by category */
export function splitDataset<T>(
  items: readonly T[],
  train_ratio: number,
  random: Random
): DatasetSplit<T> {
  const shuffled = shuffle(items, random);
  const train_count = countTrainSamples(shuffled.length, train_ratio);
  return {
    train: shuffled.slice(0, train_count),
    val: shuffled.slice(train_count),
  };
}
