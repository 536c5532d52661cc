/**
 * PhonePilot Agent 类型定义
 */

import type { ErrorKind } from './errors';

// ============ 外部协作者接口 ============

/**
 * 本地设备执行器（shell / adb 路径）
 * 所有方法返回是否成功，不抛异常
 */
export interface LocalExecutor {
  tap(x: number, y: number): Promise<boolean>;
  swipe(x1: number, y1: number, x2: number, y2: number, durationMs: number): Promise<boolean>;
  keyEvent(keyCode: number): Promise<boolean>;
  inputText(text: string): Promise<boolean>;
  launchApp(packageName: string): Promise<boolean>;
  screenshot(outputPath: string): Promise<boolean>;
}

/** 执行权限检查（shell 权限是否可用） */
export interface AuthorizationGate {
  hasPermission(): Promise<boolean>;
}

/** 敏感操作确认回调，返回 false 表示用户拒绝 */
export type ConfirmationCallback = (message: string) => Promise<boolean>;

/** 将控制权交给用户 */
export type TakeoverCallback = (message: string) => Promise<void>;

/** 协作式取消：每个 tick 轮询一次 */
export type CancellationPredicate = () => boolean;

// ============ 动作执行 ============

export type DispatcherState =
  | 'idle'
  | 'executing'
  | 'awaiting_confirmation'
  | 'awaiting_takeover'
  | 'succeeded'
  | 'failed';

export interface ActionResult {
  success: boolean;
  shouldFinish: boolean;
  message?: string;
  requiresConfirmation: boolean;
  cancelled: boolean;
  errorKind?: ErrorKind;
}

// ============ 任务状态 ============

export type TaskStatus =
  | 'pending'
  | 'running'
  | 'paused'
  | 'waiting_confirmation'
  | 'waiting_takeover'
  | 'completed'
  | 'failed'
  | 'cancelled';

export interface StepRecord {
  stepNumber: number;
  thinking: string;
  action: string;
  success: boolean;
  message?: string;
  timestamp: number;
}

export interface TaskExecution {
  taskId: string;
  goal: string;
  status: TaskStatus;
  currentStep: number;
  steps: StepRecord[];
  startTime: number;
  endTime?: number;
  /** finish 动作给出的结果 */
  result?: string;
  errorMessage?: string;
}

// ============ 模型 ============

export interface ModelStepRequest {
  goal: string;
  screenshot: Buffer;
  stepNumber: number;
  previousActions: string[];
}

export interface ModelStepResponse {
  thinking: string;
  action: string;
  content: string;
  inputTokens: number;
  outputTokens: number;
}

export interface StepModel {
  sendStep(request: ModelStepRequest): Promise<ModelStepResponse>;
}
