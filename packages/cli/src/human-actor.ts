import * as readline from "node:readline";
import type { ActorDecision, BoardView, CaseId, CasePicker, Decision, Money } from "@briefcase/schemas";
import { CASE_COUNT, InputError, parseCaseNumber, parseYesNo } from "@briefcase/schemas";
import { evaluate } from "@briefcase/engine";
import { formatAdvice, formatBoard } from "./board-formatter.js";

// ─── DI Interfaces ───────────────────────────────────────────────

/** One prompt, one answered line. Injectable for testing. */
export interface LineReader {
  question(prompt: string): Promise<string>;
}

export interface ClosableLineReader extends LineReader {
  close(): void;
}

export type Output = (line: string) => void;

/**
 * readline-backed reader. A question pending when stdin ends rejects with
 * InputError("Input closed") so the game is abandoned instead of hanging.
 */
export function createTerminalReader(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ClosableLineReader {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  rl.on("close", () => { closed = true; });

  return {
    question(prompt: string): Promise<string> {
      if (closed) return Promise.reject(new InputError("Input closed"));
      return new Promise<string>((resolve, reject) => {
        const onClose = () => reject(new InputError("Input closed"));
        rl.once("close", onClose);
        rl.question(prompt, (answer) => {
          rl.off("close", onClose);
          resolve(answer);
        });
      });
    },
    close(): void {
      rl.close();
    },
  };
}

// ─── Actor ───────────────────────────────────────────────────────

/**
 * Terminal player: picks the lucky case, the cases to open each round, and
 * answers offers after seeing the advisor's evaluation. Bad input is
 * reported and asked again; nothing invalid reaches the sequencer.
 */
export class HumanActor implements CasePicker {
  private reader: LineReader;
  private out: Output;

  constructor(reader: LineReader, out: Output = console.log) {
    this.reader = reader;
    this.out = out;
  }

  async chooseCase(): Promise<CaseId> {
    this.out("Welcome to Deal or No Deal!");
    return (await this.askCaseNumber(`Choose your lucky case (1-${CASE_COUNT}): `)) - 1;
  }

  async pickCases(view: BoardView, count: number): Promise<CaseId[]> {
    this.out(formatBoard(view));
    this.out(`\nSelect ${count} case(s) to open:`);

    const chosen: CaseId[] = [];
    const caseCount = view.opened.length;
    while (chosen.length < count) {
      const id = (await this.askCaseNumber(`Case ${chosen.length + 1}: `, caseCount)) - 1;
      if (id === view.playerCase) {
        this.out("You can't open your own case!");
      } else if (view.opened[id]) {
        this.out("Case already opened!");
      } else if (chosen.includes(id)) {
        this.out("Case already selected for this round!");
      } else {
        chosen.push(id);
      }
    }
    this.out("\nOpening cases...");
    return chosen;
  }

  decide: ActorDecision = async (hiddenPrizes: readonly Money[], offer: Money, casesRemaining: number): Promise<Decision> => {
    this.out(formatAdvice(evaluate(hiddenPrizes, offer, casesRemaining), offer));
    for (;;) {
      const parsed = parseYesNo(await this.reader.question("Deal or No Deal? (y/n): "));
      if (parsed.ok) return parsed.value ? "accept" : "reject";
      this.out(`Invalid Input: ${parsed.error.message}. Please enter 'y' or 'n'.`);
    }
  };

  private async askCaseNumber(prompt: string, max: number = CASE_COUNT): Promise<number> {
    for (;;) {
      const parsed = parseCaseNumber(await this.reader.question(prompt), 1, max);
      if (parsed.ok) return parsed.value;
      this.out(`Invalid Input: ${parsed.error.message}. Please try again.`);
    }
  }
}
