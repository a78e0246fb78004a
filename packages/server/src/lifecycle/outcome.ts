export type ServeOutcome =
  | { kind: "closed" }
  | { kind: "failed"; error: Error };

/**
 * Single-assignment handoff for the terminal outcome of one server lifetime.
 * The first offer wins; later offers are dropped without waiting for a reader.
 */
export class OutcomeSlot {
  private settled: ServeOutcome | null = null;
  private readonly deliver: (outcome: ServeOutcome) => void;
  private readonly delivered: Promise<ServeOutcome>;

  constructor() {
    let deliver: (outcome: ServeOutcome) => void = () => undefined;
    this.delivered = new Promise<ServeOutcome>((resolve) => {
      deliver = resolve;
    });
    this.deliver = deliver;
  }

  offer(outcome: ServeOutcome): boolean {
    if (this.settled) return false;
    this.settled = outcome;
    this.deliver(outcome);
    return true;
  }

  current(): ServeOutcome | null {
    return this.settled;
  }

  wait(): Promise<ServeOutcome> {
    return this.delivered;
  }
}

/**
 * Blocks until the slot holds an outcome. A deliberate close resolves;
 * anything else rejects with the error exactly as it was offered.
 */
export async function waitForServerToClose(slot: OutcomeSlot): Promise<void> {
  const outcome = await slot.wait();
  if (outcome.kind === "closed") return;
  throw outcome.error;
}
