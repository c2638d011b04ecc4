export type Release = () => void;

/**
 * Ledger-wide guard held while a settlement is in flight. Only one holder at a
 * time; releasing twice is a no-op.
 */
export class SettlementGuard {
  private held = false;

  isHeld(): boolean {
    return this.held;
  }

  tryAcquire(): Release | null {
    if (this.held) return null;
    this.held = true;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held = false;
    };
  }
}
