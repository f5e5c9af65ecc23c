/**
 * A place in line for exclusive use of one engine (one browser and one
 * desktop). Slots become active strictly in reservation order.
 */
export interface RunSlot {
  readonly position: number;
  /** Resolves once every earlier slot has been released */
  acquire(): Promise<void>;
  /** Idempotent; safe to call without acquiring, which gives up the place */
  release(): void;
}

export class RunQueue {
  private tail: Promise<void> = Promise.resolve();
  private reserved = 0;
  private outstanding = 0;
  private activePosition: number | null = null;

  /**
   * Reserve the next place. Reserving is synchronous so that order follows
   * submission even when the work before `acquire()` is slow.
   */
  reserve(): RunSlot {
    const position = ++this.reserved;
    const previous = this.tail;
    let releaseTurn: () => void = () => undefined;
    const turnDone = new Promise<void>(resolve => {
      releaseTurn = resolve;
    });
    this.tail = previous.then(() => turnDone);
    this.outstanding++;

    let released = false;
    return {
      position,
      acquire: async () => {
        await previous;
        if (!released) {
          this.activePosition = position;
        }
      },
      release: () => {
        if (released) {
          return;
        }
        released = true;
        this.outstanding--;
        if (this.activePosition === position) {
          this.activePosition = null;
        }
        releaseTurn();
      },
    };
  }

  /** Slots reserved but not yet released, including the active one. */
  get size(): number {
    return this.outstanding;
  }

  get active(): number | null {
    return this.activePosition;
  }
}
