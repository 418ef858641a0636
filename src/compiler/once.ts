export type OneShotState = "pending" | "set";

/**
 * A flag that can be raised once and never lowered.
 * trySet() is a compare-and-set: only the first caller gets true.
 */
export class OneShot {
  private current: OneShotState = "pending";

  get state(): OneShotState {
    return this.current;
  }

  get isSet(): boolean {
    return this.current === "set";
  }

  trySet(): boolean {
    if (this.current === "set") return false;
    this.current = "set";
    return true;
  }
}
