import type { CaseId, Money } from "@briefcase/schemas";
import { StateError } from "@briefcase/schemas";

export class RevealTracker {
  private readonly assignment: readonly Money[];
  private readonly opened: boolean[];
  private hidden: Money[];

  constructor(assignment: readonly Money[]) {
    this.assignment = [...assignment];
    this.opened = new Array<boolean>(assignment.length).fill(false);
    this.hidden = this.computeHidden();
  }

  get caseCount(): number {
    return this.assignment.length;
  }

  /**
   * Mark a case opened and return the prize behind it. Throws StateError for
   * ids outside [0, caseCount) and for cases that are already open; state is
   * untouched when it throws.
   */
  openCase(id: CaseId): Money {
    this.assertInRange(id);
    if (this.opened[id]) {
      throw new StateError(`Case ${id + 1} already opened`);
    }
    this.opened[id] = true;
    this.hidden = this.computeHidden();
    return this.assignment[id]!;
  }

  isOpened(id: CaseId): boolean {
    this.assertInRange(id);
    return this.opened[id] === true;
  }

  valueOf(id: CaseId): Money {
    this.assertInRange(id);
    return this.assignment[id]!;
  }

  /** Values of every unopened case, the player's own included, largest first. */
  hiddenPrizes(): Money[] {
    return [...this.hidden];
  }

  remainingCount(): number {
    return this.hidden.length;
  }

  openedSet(): readonly boolean[] {
    return [...this.opened];
  }

  private computeHidden(): Money[] {
    const out: Money[] = [];
    this.assignment.forEach((value, i) => {
      if (!this.opened[i]) out.push(value);
    });
    return out.sort((a, b) => b - a);
  }

  private assertInRange(id: CaseId): void {
    if (!Number.isInteger(id) || id < 0 || id >= this.assignment.length) {
      throw new StateError(`Invalid case number: ${id + 1}`);
    }
  }
}
