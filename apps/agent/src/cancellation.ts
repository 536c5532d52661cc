/**
 * 协作式取消令牌：调用方在 tick 边界轮询
 */
export class CancellationToken {
  private cancelled = false;
  private reason?: string;

  cancel(reason?: string): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.reason = reason;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get cancelReason(): string | undefined {
    return this.reason;
  }
}
