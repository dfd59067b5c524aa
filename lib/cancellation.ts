/**
 * Write-once flag shared by every resolver chain working on the same URL.
 * Only the first `cancel()` wins; later callers learn they lost the race.
 */
export class CancellationToken {
  private cancelled = false;
  private reason: string | null = null;

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get cancelReason(): string | null {
    return this.reason;
  }

  cancel(reason = 'cancelled'): boolean {
    if (this.cancelled) return false;
    this.cancelled = true;
    this.reason = reason;
    return true;
  }
}
