import { KeyCode, type Action } from '@phonepilot/protocol';
import { config } from './config';
import { CoordinateNormalizer } from './coordinate-normalizer';
import appPackages from './data/app-packages.json';
import { ControlPlaneError, describeError, type ErrorKind } from './errors';
import { logger as rootLogger } from './logger';
import type { RemoteInput } from './remote-control-channel';
import { sleep } from './timing';
import type {
  ActionResult,
  CancellationPredicate,
  ConfirmationCallback,
  DispatcherState,
  LocalExecutor,
  TakeoverCallback,
} from './types';

const logger = rootLogger.withTag('Dispatcher');

// ============ 时序常量 ============

const TYPE_SETTLE_BEFORE_MS = 500; // 等待输入框获取焦点
const TYPE_SETTLE_AFTER_MS = 300;  // 等待文本稳定
const DOUBLE_TAP_GAP_MS = 100;
const LONG_PRESS_DURATION_MS = 1000;
const WAIT_TICK_MS = 100;
const TAKEOVER_TICK_MS = 200;
const TAKEOVER_CEILING_MS = 30000;

export const CANCELLED_MESSAGE = 'Task stopped';
export const CONFIRMATION_DENIED_MESSAGE = 'User cancelled sensitive operation';

const DEFAULT_APP_PACKAGES: Readonly<Record<string, string>> = appPackages;
const PACKAGE_ID_PATTERN = /^[A-Za-z][\w]*(\.[A-Za-z_][\w]*)+$/;

export interface DispatchContext {
  /** 虚拟屏幕通道；未连接时回退到本地执行器 */
  remote?: RemoteInput | null;
}

export interface ActionDispatcherOptions {
  local: LocalExecutor;
  onConfirmation: ConfirmationCallback;
  onTakeover?: TakeoverCallback;
  isCancelled?: CancellationPredicate;
  normalizer?: CoordinateNormalizer;
  normalizeCoordinates?: boolean;
  unknownActionIsFatal?: boolean;
  onStateChange?: (state: DispatcherState) => void;
  appPackages?: Readonly<Record<string, string>>;
}

/** 当前步骤的输出通道 */
interface Output {
  readonly name: 'remote' | 'local';
  tap(x: number, y: number): Promise<boolean>;
  swipe(x1: number, y1: number, x2: number, y2: number, durationMs: number): Promise<boolean>;
  key(code: number): Promise<boolean>;
  launchApp(packageName: string): Promise<boolean>;
}

interface Outcome {
  success: boolean;
  shouldFinish?: boolean;
  message?: string;
  cancelled?: boolean;
  errorKind?: ErrorKind;
}

/**
 * 动作调度器：单步执行一个 Action
 *
 * 状态：idle → executing → {succeeded, failed, awaiting_confirmation, awaiting_takeover} → idle
 * 任何分支的异常都转为 failed 结果，不向调用方抛出
 */
export class ActionDispatcher {
  private current: DispatcherState = 'idle';
  private readonly normalizer: CoordinateNormalizer;
  private readonly normalizeCoordinates: boolean;
  private readonly packages: Readonly<Record<string, string>>;

  constructor(private readonly options: ActionDispatcherOptions) {
    this.normalizer = options.normalizer ?? new CoordinateNormalizer(config.screenWidth, config.screenHeight);
    this.normalizeCoordinates = options.normalizeCoordinates ?? config.normalizeCoordinates;
    this.packages = options.appPackages ?? DEFAULT_APP_PACKAGES;
  }

  get state(): DispatcherState {
    return this.current;
  }

  /**
   * 执行动作，始终返回结构完整的结果
   */
  async execute(action: Action, context: DispatchContext = {}): Promise<ActionResult> {
    this.transition('executing');
    logger.debug('Executing action', { kind: action.kind });

    let outcome: Outcome;
    try {
      outcome = await this.dispatch(action, context);
    } catch (error) {
      logger.error('Action failed', error, { kind: action.kind });
      outcome = {
        success: false,
        message: `Action failed: ${describeError(error)}`,
        errorKind: error instanceof ControlPlaneError ? error.kind : 'execution',
      };
    }

    this.transition(outcome.success ? 'succeeded' : 'failed');
    this.transition('idle');

    return {
      success: outcome.success,
      shouldFinish: outcome.shouldFinish ?? false,
      message: outcome.message,
      requiresConfirmation: action.confirmation !== undefined,
      cancelled: outcome.cancelled ?? false,
      errorKind: outcome.errorKind,
    };
  }

  private transition(state: DispatcherState): void {
    if (this.current === state) return;
    this.current = state;
    this.options.onStateChange?.(state);
  }

  private isCancelled(): boolean {
    return this.options.isCancelled?.() ?? false;
  }

  private async dispatch(action: Action, context: DispatchContext): Promise<Outcome> {
    if (action.kind === 'finish') {
      return { success: true, shouldFinish: true, message: action.message };
    }

    if (action.confirmation) {
      this.transition('awaiting_confirmation');
      const confirmed = await this.options.onConfirmation(action.confirmation);
      this.transition('executing');
      if (!confirmed) {
        logger.info('Sensitive action declined', { kind: action.kind });
        return {
          success: false,
          shouldFinish: true,
          message: CONFIRMATION_DENIED_MESSAGE,
          errorKind: 'confirmation_denied',
        };
      }
    }

    const output = this.selectOutput(context);

    switch (action.kind) {
      case 'launch': {
        const packageName = this.resolvePackage(action.app);
        if (!packageName) {
          return { success: false, message: `App not found: ${action.app}`, errorKind: 'execution' };
        }
        return this.outcome(await output.launchApp(packageName), `Failed to launch ${packageName}`);
      }

      case 'tap': {
        const point = this.point(action.x, action.y);
        if (!point) return missingCoordinates();
        return this.outcome(await output.tap(point[0], point[1]), 'Tap failed');
      }

      case 'double_tap': {
        const point = this.point(action.x, action.y);
        if (!point) return missingCoordinates();
        const first = await output.tap(point[0], point[1]);
        await sleep(DOUBLE_TAP_GAP_MS);
        const second = await output.tap(point[0], point[1]);
        return this.outcome(first && second, 'Double tap failed');
      }

      case 'long_press': {
        const point = this.point(action.x, action.y);
        if (!point) return missingCoordinates();
        const [x, y] = point;
        return this.outcome(await output.swipe(x, y, x, y, LONG_PRESS_DURATION_MS), 'Long press failed');
      }

      case 'type':
        return this.typeText(action.text);

      case 'swipe': {
        const start = this.point(action.x1, action.y1);
        const end = this.point(action.x2, action.y2);
        if (!start || !end) {
          return { success: false, message: 'Missing swipe coordinates', errorKind: 'parse' };
        }
        return this.outcome(
          await output.swipe(start[0], start[1], end[0], end[1], action.durationMs),
          'Swipe failed',
        );
      }

      case 'back':
        return this.outcome(await output.key(KeyCode.BACK), 'Back failed');

      case 'home':
        return this.outcome(await output.key(KeyCode.HOME), 'Home failed');

      case 'wait':
        return (await this.cancellableSleep(action.durationMs, WAIT_TICK_MS))
          ? { success: true }
          : cancelled();

      case 'take_over':
        return this.takeOver(action.message);

      case 'note':
      case 'call_api':
        return { success: true };

      case 'interact':
        return { success: true, message: 'User interaction required' };

      case 'unknown':
        return {
          success: false,
          shouldFinish: this.options.unknownActionIsFatal ?? false,
          message: `Unknown action: ${action.name}`,
          errorKind: 'parse',
        };
    }
  }

  /**
   * 远程通道已连接时走远程，否则走本地执行器
   */
  private selectOutput(context: DispatchContext): Output {
    const remote = context.remote;
    if (remote && remote.isConnected()) {
      return {
        name: 'remote',
        tap: async (x, y) => remote.tap(x, y),
        swipe: async (x1, y1, x2, y2, durationMs) => remote.swipe(x1, y1, x2, y2, durationMs),
        key: async (code) => remote.key(code),
        launchApp: async (packageName) => remote.launchApp(packageName),
      };
    }

    const local = this.options.local;
    return {
      name: 'local',
      tap: (x, y) => local.tap(x, y),
      swipe: (x1, y1, x2, y2, durationMs) => local.swipe(x1, y1, x2, y2, durationMs),
      key: (code) => local.keyEvent(code),
      launchApp: (packageName) => local.launchApp(packageName),
    };
  }

  private point(x: number, y: number): [number, number] | null {
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      return null;
    }
    return this.normalizeCoordinates ? this.normalizer.resolve(x, y) : [x, y];
  }

  private outcome(success: boolean, failureMessage: string): Outcome {
    return success ? { success } : { success, message: failureMessage, errorKind: 'execution' };
  }

  /**
   * 应用名 → 包名；已是包名形式时原样使用
   */
  resolvePackage(app: string): string | null {
    const name = app.trim();
    const mapped = this.packages[name] ?? this.packages[name.toLowerCase()];
    if (mapped) return mapped;
    return PACKAGE_ID_PATTERN.test(name) ? name : null;
  }

  // 远程协议没有文本指令，文本输入始终走本地
  private async typeText(text: string): Promise<Outcome> {
    if (text === '') {
      return { success: true };
    }

    await sleep(TYPE_SETTLE_BEFORE_MS);
    const success = await this.options.local.inputText(text);
    await sleep(TYPE_SETTLE_AFTER_MS);

    return this.outcome(success, `Failed to type text: ${text}`);
  }

  private async takeOver(message: string): Promise<Outcome> {
    if (this.isCancelled()) {
      return cancelled();
    }

    this.transition('awaiting_takeover');
    logger.info('Handing control to user', { message });
    await this.options.onTakeover?.(message);

    const finished = await this.cancellableSleep(TAKEOVER_CEILING_MS, TAKEOVER_TICK_MS);
    this.transition('executing');

    return finished ? { success: true } : cancelled();
  }

  /**
   * 分 tick 休眠，每个 tick 前检查取消；被取消返回 false
   */
  private async cancellableSleep(totalMs: number, tickMs: number): Promise<boolean> {
    let elapsed = 0;
    while (elapsed < totalMs) {
      if (this.isCancelled()) {
        logger.info('Cancelled while waiting', { elapsed_ms: elapsed, total_ms: totalMs });
        return false;
      }
      const step = Math.min(tickMs, totalMs - elapsed);
      await sleep(step);
      elapsed += step;
    }
    return true;
  }
}

function cancelled(): Outcome {
  return {
    success: false,
    shouldFinish: true,
    message: CANCELLED_MESSAGE,
    cancelled: true,
    errorKind: 'cancelled',
  };
}

function missingCoordinates(): Outcome {
  return { success: false, message: 'No element coordinates', errorKind: 'parse' };
}
