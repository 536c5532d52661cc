/**
 * PhonePilot Protocol - 共享协议定义
 * 模型输出的动作（Action）与虚拟屏幕控制通道的文本协议
 *
 * @version 1.0.0
 */

// ============ 动作类型（模型 → 设备）============

interface ActionBase {
  /** sensitive=true 且 message 非空时存在：执行前需要用户确认 */
  readonly confirmation?: string;
}

export interface LaunchAction extends ActionBase {
  readonly kind: 'launch';
  readonly app: string;
}

export interface PointAction extends ActionBase {
  readonly kind: 'tap' | 'double_tap' | 'long_press';
  readonly x: number;
  readonly y: number;
}

export interface TypeAction extends ActionBase {
  readonly kind: 'type';
  readonly text: string;
}

export interface SwipeAction extends ActionBase {
  readonly kind: 'swipe';
  readonly x1: number;
  readonly y1: number;
  readonly x2: number;
  readonly y2: number;
  readonly durationMs: number;
}

export interface KeyAction extends ActionBase {
  readonly kind: 'back' | 'home';
}

export interface WaitAction extends ActionBase {
  readonly kind: 'wait';
  readonly durationMs: number;
}

export interface TakeOverAction extends ActionBase {
  readonly kind: 'take_over';
  readonly message: string;
}

export interface FinishAction extends ActionBase {
  readonly kind: 'finish';
  readonly message: string;
}

// 以下三种动作不产生设备操作，保留以兼容模型词汇
export interface NoteAction extends ActionBase {
  readonly kind: 'note';
  readonly text: string;
}

export interface CallApiAction extends ActionBase {
  readonly kind: 'call_api';
  readonly instruction: string;
}

export interface InteractAction extends ActionBase {
  readonly kind: 'interact';
  readonly text: string;
}

/** 无法识别的动作名，保留原始文本，由调度器决定是否致命 */
export interface UnknownAction extends ActionBase {
  readonly kind: 'unknown';
  readonly name: string;
  readonly raw: string;
}

export type Action =
  | LaunchAction
  | PointAction
  | TypeAction
  | SwipeAction
  | KeyAction
  | WaitAction
  | TakeOverAction
  | FinishAction
  | NoteAction
  | CallApiAction
  | InteractAction
  | UnknownAction;

export type ActionKind = Action['kind'];

// ============ 控制指令（客户端 → 虚拟屏幕进程）============

export type RemoteCommand =
  | { type: 'CREATE_DISPLAY'; width: number; height: number; dpi: number; bitrateKbps?: number }
  | { type: 'SCREENSHOT' }
  | { type: 'TAP'; x: number; y: number }
  | { type: 'SWIPE'; x1: number; y1: number; x2: number; y2: number; durationMs: number }
  | { type: 'KEY'; code: number }
  | { type: 'TOUCH_DOWN' | 'TOUCH_MOVE' | 'TOUCH_UP'; x: number; y: number }
  | { type: 'LAUNCH_APP'; packageName: string }
  | { type: 'DESTROY_DISPLAY' };

/**
 * 将指令编码为单行文本
 * 坐标按整数发送
 */
export function formatCommand(command: RemoteCommand): string {
  switch (command.type) {
    case 'CREATE_DISPLAY': {
      const base = `CREATE_DISPLAY ${int(command.width)} ${int(command.height)} ${int(command.dpi)}`;
      return command.bitrateKbps !== undefined ? `${base} ${int(command.bitrateKbps)}` : base;
    }
    case 'SCREENSHOT':
    case 'DESTROY_DISPLAY':
      return command.type;
    case 'TAP':
    case 'TOUCH_DOWN':
    case 'TOUCH_MOVE':
    case 'TOUCH_UP':
      return `${command.type} ${int(command.x)} ${int(command.y)}`;
    case 'SWIPE':
      return `SWIPE ${int(command.x1)} ${int(command.y1)} ${int(command.x2)} ${int(command.y2)} ${int(command.durationMs)}`;
    case 'KEY':
      return `KEY ${int(command.code)}`;
    case 'LAUNCH_APP':
      return `LAUNCH_APP ${command.packageName.trim()}`;
  }
}

function int(value: number): number {
  return Math.trunc(value);
}

// ============ 服务端消息（虚拟屏幕进程 → 客户端）============

export type ServerLine =
  | { type: 'display_created'; displayId: number | null }
  | { type: 'display_size'; width: number; height: number }
  | { type: 'screenshot_data'; base64: string }
  | { type: 'screenshot_error'; message: string }
  | { type: 'log'; text: string };

export const SERVER_PREFIX = {
  DISPLAY_CREATED: 'DISPLAY_CREATED ',
  DISPLAY_SIZE: 'DISPLAY_SIZE ',
  SCREENSHOT_DATA: 'SCREENSHOT_DATA ',
  SCREENSHOT_ERROR: 'SCREENSHOT_ERROR',
} as const;

/**
 * 解析服务端文本行
 * 无法识别的行一律视为日志，不抛异常
 */
export function parseServerLine(line: string): ServerLine {
  if (line.startsWith(SERVER_PREFIX.DISPLAY_CREATED)) {
    const id = Number.parseInt(line.slice(SERVER_PREFIX.DISPLAY_CREATED.length).trim(), 10);
    return { type: 'display_created', displayId: Number.isNaN(id) ? null : id };
  }

  if (line.startsWith(SERVER_PREFIX.DISPLAY_SIZE)) {
    const parts = line.slice(SERVER_PREFIX.DISPLAY_SIZE.length).trim().split(/\s+/);
    const width = Number.parseInt(parts[0] ?? '', 10);
    const height = Number.parseInt(parts[1] ?? '', 10);
    if (Number.isNaN(width) || Number.isNaN(height)) {
      return { type: 'log', text: line };
    }
    return { type: 'display_size', width, height };
  }

  if (line.startsWith(SERVER_PREFIX.SCREENSHOT_DATA)) {
    return { type: 'screenshot_data', base64: line.slice(SERVER_PREFIX.SCREENSHOT_DATA.length).trim() };
  }

  if (line.startsWith(SERVER_PREFIX.SCREENSHOT_ERROR)) {
    return { type: 'screenshot_error', message: line.slice(SERVER_PREFIX.SCREENSHOT_ERROR.length).trim() };
  }

  return { type: 'log', text: line };
}

// ============ 协议常量 ============

// Android KeyEvent 键码
export const KeyCode = {
  HOME: 3,
  BACK: 4,
} as const;

// 虚拟屏幕进程默认监听端口
export const DEFAULT_REMOTE_PORT = 8986;

// 模型坐标空间上限（0-1000）
export const NORMALIZED_MAX = 1000;
