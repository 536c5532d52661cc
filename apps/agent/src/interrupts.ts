export type InterruptSignal = 'SIGINT' | 'SIGTERM';

export interface InterruptHandlers {
  // 第一次中断：取消当前任务
  stop: (signal: InterruptSignal) => void;
  // 再次中断：直接退出
  forceExit: () => void;
}

export interface SignalSource {
  on(event: InterruptSignal, listener: () => void): unknown;
}

export interface TerminalSource {
  on(event: 'SIGINT', listener: () => void): unknown;
}

/**
 * 两段式中断：第一次信号取消任务，第二次直接退出
 */
export function createInterruptHandler(handlers: InterruptHandlers): (signal: InterruptSignal) => void {
  let stopping = false;
  return (signal) => {
    if (stopping) {
      handlers.forceExit();
      return;
    }
    stopping = true;
    handlers.stop(signal);
  };
}

/**
 * 同时监听进程信号与终端
 *
 * readline 在 TTY 上使用 raw 模式，Ctrl+C 不会产生进程 SIGINT，
 * 而是作为 readline 的 'SIGINT' 事件出现；没有监听者时 readline 会自行关闭
 */
export function bindInterrupts(
  handler: (signal: InterruptSignal) => void,
  terminal: TerminalSource,
  signals: SignalSource = process,
): void {
  signals.on('SIGINT', () => handler('SIGINT'));
  signals.on('SIGTERM', () => handler('SIGTERM'));
  terminal.on('SIGINT', () => handler('SIGINT'));
}
