import type { BoardView, CaseId, CasePicker } from "@briefcase/schemas";
import type { RandomSource } from "./random.js";
import { shuffle } from "./random.js";

/**
 * Uniform sample, without replacement, of up to `count` unopened case ids.
 * The reserved player case is not excluded here; callers filter it out.
 */
export function selectCasesToOpen(openedSet: readonly boolean[], count: number, rng: RandomSource): CaseId[] {
  const available: CaseId[] = [];
  openedSet.forEach((opened, id) => {
    if (!opened) available.push(id);
  });
  return shuffle(available, rng).slice(0, Math.max(0, Math.min(count, available.length)));
}

/**
 * Computer case picker. Samples over every unopened case and then drops the
 * player's own, so a round can open fewer cases than scheduled.
 */
export class RandomCasePicker implements CasePicker {
  private rng: RandomSource;

  constructor(rng: RandomSource) {
    this.rng = rng;
  }

  pickCases(view: BoardView, count: number): CaseId[] {
    return selectCasesToOpen(view.opened, count, this.rng).filter((id) => id !== view.playerCase);
  }
}
