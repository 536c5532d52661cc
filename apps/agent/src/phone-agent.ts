import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ActionDispatcher } from './action-dispatcher';
import { parseAction, serializeAction } from './action-parser';
import { CancellationToken } from './cancellation';
import { config } from './config';
import { CoordinateNormalizer } from './coordinate-normalizer';
import { describeError } from './errors';
import { logger as rootLogger } from './logger';
import type { RemoteInput, VideoSize } from './remote-control-channel';
import { sleep } from './timing';
import type {
  ActionResult,
  AuthorizationGate,
  ConfirmationCallback,
  DispatcherState,
  LocalExecutor,
  StepModel,
  StepRecord,
  TakeoverCallback,
  TaskExecution,
  TaskStatus,
} from './types';
import type { VideoStreamDecoder } from './video-stream-decoder';

const logger = rootLogger.withTag('PhoneAgent');

const REMOTE_SCREENSHOT_ATTEMPTS = 2;
const REMOTE_SCREENSHOT_BACKOFF_MS = 500;
const PAUSE_POLL_MS = 200;

export const MAX_STEPS_MESSAGE = 'Max steps reached';

/**
 * 代理需要的虚拟屏幕通道能力（RemoteControlChannel 实现）
 */
export interface VirtualDisplayChannel extends RemoteInput {
  ensureDisplay(width: number, height: number, dpi: number, bitrateKbps?: number): Promise<boolean>;
  requestScreenshot(timeoutMs?: number): Promise<Buffer | null>;
  onVideoChunk(listener: (chunk: Buffer) => void): () => void;
  onDisplaySize(listener: (size: VideoSize) => void): () => void;
  shutdown(): void;
}

export interface PhoneAgentOptions {
  model: StepModel;
  local: LocalExecutor;
  authorization: AuthorizationGate;
  onConfirmation: ConfirmationCallback;
  onTakeover?: TakeoverCallback;
  onStep?: (step: StepRecord, execution: TaskExecution) => void;
  remote?: VirtualDisplayChannel | null;
  decoder?: VideoStreamDecoder | null;
  useVirtualDisplay?: boolean;
  screenWidth?: number;
  screenHeight?: number;
  screenDpi?: number;
  videoBitrateKbps?: number;
  normalizeCoordinates?: boolean;
  maxSteps?: number;
  stepDelayMs?: number;
  screenshotTimeoutMs?: number;
  screenshotDir?: string;
}

const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>(['completed', 'failed', 'cancelled']);

/**
 * 手机代理 - 单任务顺序执行
 *
 * 每一步：截图 → 模型 → 解析 → 调度，一步完成后才开始下一步
 */
export class PhoneAgent {
  private readonly dispatcher: ActionDispatcher;
  private readonly normalizer: CoordinateNormalizer;
  private token = new CancellationToken();
  private paused = false;
  private execution: TaskExecution | null = null;
  private remoteAvailable = false;

  private readonly maxSteps: number;
  private readonly stepDelayMs: number;

  constructor(private readonly options: PhoneAgentOptions) {
    this.normalizer = new CoordinateNormalizer(
      options.screenWidth ?? config.screenWidth,
      options.screenHeight ?? config.screenHeight,
    );
    this.maxSteps = options.maxSteps ?? config.maxSteps;
    this.stepDelayMs = options.stepDelayMs ?? config.stepDelay;

    this.dispatcher = new ActionDispatcher({
      local: options.local,
      onConfirmation: options.onConfirmation,
      onTakeover: options.onTakeover,
      isCancelled: () => this.token.isCancelled,
      normalizer: this.normalizer,
      normalizeCoordinates: options.normalizeCoordinates,
      onStateChange: (state) => this.onDispatcherState(state),
    });
  }

  /**
   * 当前任务快照
   */
  getExecution(): TaskExecution | null {
    if (!this.execution) return null;
    return { ...this.execution, steps: [...this.execution.steps] };
  }

  /**
   * 执行任务
   */
  async runTask(goal: string): Promise<TaskExecution> {
    this.token = new CancellationToken();
    this.paused = false;
    this.remoteAvailable = false;

    const execution: TaskExecution = {
      taskId: `task_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`,
      goal,
      status: 'pending',
      currentStep: 0,
      steps: [],
      startTime: Date.now(),
    };
    this.execution = execution;

    logger.info('Task started', { task_id: execution.taskId, goal });

    if (!(await this.options.authorization.hasPermission())) {
      logger.error('Device not authorized for shell commands');
      return this.finalize(execution, 'failed', 'Device not authorized: check the adb connection and debugging authorization');
    }

    execution.status = 'running';
    const unsubscribe: Array<() => void> = [];

    try {
      await this.prepareVirtualDisplay(unsubscribe);
      await this.stepLoop(execution);
    } catch (error) {
      logger.error('Task crashed', error, { task_id: execution.taskId });
      this.finalize(execution, 'failed', describeError(error));
    } finally {
      unsubscribe.forEach(fn => fn());
      this.options.remote?.shutdown();
      this.remoteAvailable = false;
    }

    if (!TERMINAL_STATUSES.has(execution.status)) {
      this.finalize(execution, 'completed');
    }

    logger.info('Task ended', {
      task_id: execution.taskId,
      status: execution.status,
      steps: execution.steps.length,
    });
    return this.getExecution() ?? execution;
  }

  pause(): void {
    if (!this.execution || TERMINAL_STATUSES.has(this.execution.status)) return;
    this.paused = true;
    this.execution.status = 'paused';
    logger.info('Task paused', { task_id: this.execution.taskId });
  }

  resume(): void {
    if (!this.execution || this.execution.status !== 'paused') return;
    this.paused = false;
    this.execution.status = 'running';
    logger.info('Task resumed', { task_id: this.execution.taskId });
  }

  stop(): void {
    this.token.cancel('stopped by user');
    logger.info('Task stop requested', { task_id: this.execution?.taskId });
  }

  private async prepareVirtualDisplay(unsubscribe: Array<() => void>): Promise<void> {
    const remote = this.options.remote;
    if (!remote || !(this.options.useVirtualDisplay ?? config.useVirtualDisplay)) {
      return;
    }

    const { width, height } = this.normalizer.getScreenSize();
    const decoder = this.options.decoder;

    unsubscribe.push(
      remote.onDisplaySize((size) => {
        this.normalizer.setScreenSize(size.width, size.height);
        decoder?.resize(size.width, size.height);
      }),
    );
    if (decoder) {
      unsubscribe.push(remote.onVideoChunk(chunk => decoder.onChunk(chunk)));
    }

    try {
      this.remoteAvailable = await remote.ensureDisplay(
        width,
        height,
        this.options.screenDpi ?? config.screenDpi,
        this.options.videoBitrateKbps ?? config.videoBitrateKbps,
      );
    } catch (error) {
      logger.warn('Virtual display setup failed, falling back to local mode', { error: describeError(error) });
      this.remoteAvailable = false;
    }

    if (this.remoteAvailable) {
      logger.info('Virtual display ready', { width, height });
    } else {
      logger.warn('Virtual display unavailable, using local executor');
    }
  }

  private async stepLoop(execution: TaskExecution): Promise<void> {
    let shouldContinue = true;
    let step = 0;

    while (shouldContinue && step < this.maxSteps) {
      await this.waitWhilePaused();
      if (this.token.isCancelled) {
        this.finalize(execution, 'cancelled', this.token.cancelReason);
        return;
      }

      step++;
      execution.currentStep = step;
      logger.debug('Step started', { step });

      const screenshot = await this.captureScreenshot();
      if (!screenshot) {
        this.finalize(execution, 'failed', 'Screenshot failed');
        return;
      }

      let thinking = '';
      let actionText = '';
      try {
        const response = await this.options.model.sendStep({
          goal: execution.goal,
          screenshot,
          stepNumber: step,
          previousActions: execution.steps.map(s => s.action),
        });
        thinking = response.thinking;
        actionText = response.action;
      } catch (error) {
        logger.error('Model request failed', error, { step });
        this.finalize(execution, 'failed', `Model request failed: ${describeError(error)}`);
        return;
      }

      if (this.token.isCancelled) {
        this.finalize(execution, 'cancelled', this.token.cancelReason);
        return;
      }

      const parsed = parseAction(actionText);
      let result: ActionResult;
      let recorded: string;

      if (parsed.ok) {
        recorded = serializeAction(parsed.action);
        const remote = this.remoteAvailable ? this.options.remote : null;
        result = await this.dispatcher.execute(parsed.action, { remote });
        if (parsed.action.kind === 'finish') {
          execution.result = parsed.action.message;
        }
      } else {
        recorded = parsed.raw;
        result = {
          success: false,
          shouldFinish: false,
          message: `Parse error: ${parsed.error}`,
          requiresConfirmation: false,
          cancelled: false,
          errorKind: 'parse',
        };
      }

      this.recordStep(execution, {
        stepNumber: step,
        thinking,
        action: recorded,
        success: result.success,
        message: result.message,
        timestamp: Date.now(),
      });

      if (!result.success) {
        logger.warn('Step failed, continuing', { step, message: result.message, error_kind: result.errorKind });
      }

      if (result.cancelled) {
        this.finalize(execution, 'cancelled', result.message);
        return;
      }

      if (result.errorKind === 'confirmation_denied') {
        this.finalize(execution, 'cancelled', result.message);
        return;
      }

      if (result.shouldFinish) {
        shouldContinue = false;
        if (!result.success) {
          this.finalize(execution, 'failed', result.message);
        }
        break;
      }

      await sleep(this.stepDelayMs);
    }

    if (shouldContinue && step >= this.maxSteps) {
      this.finalize(execution, 'completed', MAX_STEPS_MESSAGE);
    }
  }

  private async waitWhilePaused(): Promise<void> {
    while (this.paused && !this.token.isCancelled) {
      await sleep(PAUSE_POLL_MS);
    }
  }

  /**
   * 截图：远程通道（两次）→ 解码器当前帧 → 本地截图
   */
  private async captureScreenshot(): Promise<Buffer | null> {
    const remote = this.options.remote;

    if (remote && this.remoteAvailable) {
      for (let attempt = 0; attempt < REMOTE_SCREENSHOT_ATTEMPTS; attempt++) {
        const bytes = await remote.requestScreenshot(this.options.screenshotTimeoutMs ?? config.screenshotTimeout);
        if (bytes) {
          logger.debug('Remote screenshot captured', { attempt: attempt + 1, size: bytes.length });
          return bytes;
        }
        logger.warn('Remote screenshot failed', { attempt: attempt + 1 });
        if (attempt < REMOTE_SCREENSHOT_ATTEMPTS - 1) {
          await sleep(REMOTE_SCREENSHOT_BACKOFF_MS);
        }
      }
    }

    const decoder = this.options.decoder;
    if (decoder?.isActive) {
      const frame = await decoder.captureFrame();
      if (frame) {
        logger.debug('Captured frame from video stream');
        return frame;
      }
    }

    return this.captureLocalScreenshot();
  }

  private async captureLocalScreenshot(): Promise<Buffer | null> {
    const dir = this.options.screenshotDir ?? os.tmpdir();
    const file = path.join(dir, `screenshot_${Date.now()}.png`);

    if (!(await this.options.local.screenshot(file))) {
      logger.error('Local screenshot failed');
      return null;
    }

    try {
      return await fs.readFile(file);
    } catch (error) {
      logger.error('Failed to read screenshot', error, { path: file });
      return null;
    } finally {
      await fs.rm(file, { force: true }).catch((error: unknown) => {
        logger.debug('Failed to remove screenshot', { path: file, error: describeError(error) });
      });
    }
  }

  private recordStep(execution: TaskExecution, step: StepRecord): void {
    execution.steps.push(step);
    this.options.onStep?.(step, this.getExecution() ?? execution);
  }

  private onDispatcherState(state: DispatcherState): void {
    const execution = this.execution;
    if (!execution || TERMINAL_STATUSES.has(execution.status)) return;

    if (state === 'awaiting_confirmation') {
      execution.status = 'waiting_confirmation';
    } else if (state === 'awaiting_takeover') {
      execution.status = 'waiting_takeover';
    } else if (execution.status === 'waiting_confirmation' || execution.status === 'waiting_takeover') {
      execution.status = 'running';
    }
  }

  private finalize(execution: TaskExecution, status: TaskStatus, message?: string): TaskExecution {
    execution.status = status;
    execution.endTime = Date.now();
    if (message !== undefined) {
      execution.errorMessage = message;
    }
    return execution;
  }
}
