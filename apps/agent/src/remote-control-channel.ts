import WebSocket from 'ws';
import { formatCommand, parseServerLine, type RemoteCommand } from '@phonepilot/protocol';
import { config } from './config';
import { logger as rootLogger } from './logger';

const logger = rootLogger.withTag('RemoteChannel');

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

// ============ 底层连接抽象 ============

export interface SocketHandlers {
  onOpen(): void;
  onText(text: string): void;
  onBinary(data: Buffer): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

export interface ControlSocket {
  send(text: string): boolean;
  close(code: number, reason: string): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => ControlSocket;

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * 基于 ws 的默认实现：文本帧为控制协议，二进制帧为 H.264 视频流
 */
export const wsSocketFactory: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);

  ws.on('open', () => handlers.onOpen());

  ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
    const buffer = toBuffer(data);
    if (isBinary) {
      handlers.onBinary(buffer);
    } else {
      handlers.onText(buffer.toString('utf8'));
    }
  });

  ws.on('close', (code, reason) => handlers.onClose(code, reason.toString()));

  ws.on('error', (error) => handlers.onError(error));

  return {
    send(text: string): boolean {
      if (ws.readyState !== WebSocket.OPEN) return false;
      ws.send(text);
      return true;
    },
    close(code: number, reason: string): void {
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close(code, reason);
      }
    },
  };
};

// ============ 控制通道 ============

/**
 * 调度器使用的远程输入能力
 */
export interface RemoteInput {
  isConnected(): boolean;
  tap(x: number, y: number): boolean;
  swipe(x1: number, y1: number, x2: number, y2: number, durationMs?: number): boolean;
  key(code: number): boolean;
  launchApp(packageName: string): boolean;
}

export interface VideoSize {
  width: number;
  height: number;
}

export interface RemoteControlChannelOptions {
  host?: string;
  port?: number;
  connectTimeoutMs?: number;
  /** 疑似过期回复的观察窗口，窗口内没有下一条回复则判定为当前请求的回复 */
  staleReplyWindowMs?: number;
  socketFactory?: SocketFactory;
}

interface ScreenshotSlot {
  id: number;
  resolve: (bytes: Buffer | null) => void;
}

// 暂存的疑似过期回复，归属 slotId 对应的请求
interface HeldReply {
  slotId: number;
  bytes: Buffer | null;
  timer: NodeJS.Timeout;
}

const STALE_REPLY_WINDOW_MS = 100;
// 已发出但未回复的请求 id 上限，超出时丢弃最旧的
const MAX_ISSUED_SCREENSHOTS = 16;

/**
 * 虚拟屏幕控制通道
 *
 * - 同一时刻最多一个连接尝试，并发调用者共享同一个 Promise
 * - 未连接时所有指令立即返回 false，不排队
 * - 截图请求串行执行；回复按发出顺序与请求对应，过期回复丢弃
 * - 超时请求的回复可能永远不来：疑似过期的回复先暂存，窗口内没有下一条回复
 *   就交给当前请求，并清空积压的 id
 */
export class RemoteControlChannel implements RemoteInput {
  private readonly url: string;
  private readonly connectTimeoutMs: number;
  private readonly staleReplyWindowMs: number;
  private readonly socketFactory: SocketFactory;

  private state: ConnectionState = 'disconnected';
  private socket: ControlSocket | null = null;
  // 每次新连接或断开递增，旧 socket 的事件据此忽略
  private generation = 0;
  private connecting: Promise<boolean> | null = null;
  private abortConnecting: (() => void) | null = null;

  private displayId: number | null = null;
  private videoSize: VideoSize | null = null;

  private pendingScreenshot: ScreenshotSlot | null = null;
  private issuedScreenshots: number[] = [];
  private heldReply: HeldReply | null = null;
  private nextScreenshotId = 1;
  private screenshotQueue: Promise<unknown> = Promise.resolve();

  private videoListeners = new Set<(chunk: Buffer) => void>();
  private sizeListeners = new Set<(size: VideoSize) => void>();

  constructor(options: RemoteControlChannelOptions = {}) {
    const host = options.host ?? config.remoteHost;
    const port = options.port ?? config.remotePort;
    this.url = `ws://${host}:${port}`;
    this.connectTimeoutMs = options.connectTimeoutMs ?? config.remoteConnectTimeout;
    this.staleReplyWindowMs = options.staleReplyWindowMs ?? STALE_REPLY_WINDOW_MS;
    this.socketFactory = options.socketFactory ?? wsSocketFactory;
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected' && this.socket !== null;
  }

  getDisplayId(): number | null {
    return this.displayId;
  }

  getVideoSize(): VideoSize | null {
    return this.videoSize;
  }

  /**
   * 订阅视频数据，返回取消订阅函数
   */
  onVideoChunk(listener: (chunk: Buffer) => void): () => void {
    this.videoListeners.add(listener);
    return () => this.videoListeners.delete(listener);
  }

  onDisplaySize(listener: (size: VideoSize) => void): () => void {
    this.sizeListeners.add(listener);
    return () => this.sizeListeners.delete(listener);
  }

  /**
   * 确保已连接（幂等）
   */
  ensureConnected(): Promise<boolean> {
    if (this.isConnected()) {
      return Promise.resolve(true);
    }

    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
        this.abortConnecting = null;
      });
    }

    return this.connecting;
  }

  private connect(): Promise<boolean> {
    const generation = ++this.generation;
    this.state = 'connecting';
    logger.debug('Connecting to virtual display server', { url: this.url });

    return new Promise<boolean>((resolve) => {
      let settled = false;

      const settle = (connected: boolean): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(connected);
      };

      const timer = setTimeout(() => {
        if (generation === this.generation) {
          logger.warn('Connection attempt timed out', { url: this.url, timeout_ms: this.connectTimeoutMs });
          this.socket?.close(1000, 'Connect timeout');
          this.markDisconnected();
        }
        settle(false);
      }, this.connectTimeoutMs);

      this.abortConnecting = () => settle(false);

      const handlers: SocketHandlers = {
        onOpen: () => {
          if (generation !== this.generation) return;
          this.state = 'connected';
          logger.info('Connected to virtual display server', { url: this.url });
          settle(true);
        },
        onText: (text) => {
          if (generation !== this.generation) return;
          this.handleTextMessage(text);
        },
        onBinary: (data) => {
          if (generation !== this.generation) return;
          for (const listener of this.videoListeners) {
            listener(data);
          }
        },
        onClose: (code, reason) => {
          if (generation !== this.generation) return;
          logger.info('Connection closed', { code, reason });
          this.markDisconnected();
          settle(false);
        },
        onError: (error) => {
          if (generation !== this.generation) return;
          logger.error('Connection error', error, { url: this.url });
          this.markDisconnected();
          settle(false);
        },
      };

      try {
        this.socket = this.socketFactory(this.url, handlers);
      } catch (error) {
        logger.error('Failed to open socket', error, { url: this.url });
        this.markDisconnected();
        settle(false);
      }
    });
  }

  /**
   * 连接失效：重置连接与屏幕状态，挂起的截图立即返回 null
   */
  private markDisconnected(): void {
    this.generation++;
    this.state = 'disconnected';
    this.socket = null;
    this.displayId = null;

    const slot = this.pendingScreenshot;
    this.pendingScreenshot = null;
    this.issuedScreenshots = [];
    this.dropHeldReply();
    slot?.resolve(null);
  }

  private handleTextMessage(text: string): void {
    const line = parseServerLine(text);

    switch (line.type) {
      case 'display_created':
        this.displayId = line.displayId;
        logger.info('Virtual display created', { display_id: line.displayId });
        break;

      case 'display_size':
        this.videoSize = { width: line.width, height: line.height };
        logger.debug('Display size reported', { width: line.width, height: line.height });
        for (const listener of this.sizeListeners) {
          listener({ width: line.width, height: line.height });
        }
        break;

      case 'screenshot_data': {
        const bytes = Buffer.from(line.base64, 'base64');
        if (bytes.length === 0) {
          logger.warn('Empty screenshot payload');
          this.deliverScreenshot(null);
        } else {
          this.deliverScreenshot(bytes);
        }
        break;
      }

      case 'screenshot_error':
        logger.warn('Screenshot error from server', { message: line.message });
        this.deliverScreenshot(null);
        break;

      case 'log':
        logger.debug('[Server] ' + line.text.slice(0, 200));
        break;
    }
  }

  /**
   * 回复按 FIFO 对应到已发出的请求；不属于当前等待者的回复暂存或丢弃
   */
  private deliverScreenshot(bytes: Buffer | null): void {
    const repliedId = this.issuedScreenshots.shift();
    const slot = this.pendingScreenshot;

    if (!slot || repliedId === undefined) {
      logger.debug('Discarding stale screenshot reply', { replied_id: repliedId });
      return;
    }

    if (slot.id === repliedId) {
      // 暂存的那条确实是过期回复
      this.dropHeldReply();
      slot.resolve(bytes);
      return;
    }

    // 队首是已超时的请求：这条可能是它的迟到回复，也可能它的回复已丢失
    if (this.heldReply) {
      logger.debug('Discarding stale screenshot reply', { replied_id: repliedId });
      this.dropHeldReply();
    }
    const slotId = slot.id;
    const timer = setTimeout(() => this.releaseHeldReply(slotId), this.staleReplyWindowMs);
    this.heldReply = { slotId, bytes, timer };
  }

  /**
   * 观察窗口结束仍无后续回复：之前请求的回复已丢失，暂存回复属于当前请求
   */
  private releaseHeldReply(slotId: number): void {
    const held = this.heldReply;
    if (!held || held.slotId !== slotId) return;
    this.heldReply = null;

    const slot = this.pendingScreenshot;
    if (!slot || slot.id !== slotId) return;

    logger.debug('Screenshot replies lost, resynchronizing', { skipped: this.issuedScreenshots.length });
    this.issuedScreenshots = [];
    slot.resolve(held.bytes);
  }

  private dropHeldReply(): void {
    if (!this.heldReply) return;
    clearTimeout(this.heldReply.timer);
    this.heldReply = null;
  }

  /**
   * 请求截图（PNG 字节），超时或失败返回 null
   */
  requestScreenshot(timeoutMs: number = config.screenshotTimeout): Promise<Buffer | null> {
    const run = this.screenshotQueue.then(() => this.performScreenshot(timeoutMs));
    this.screenshotQueue = run.catch(() => undefined);
    return run;
  }

  private async performScreenshot(timeoutMs: number): Promise<Buffer | null> {
    if (!(await this.ensureConnected())) {
      logger.warn('Not connected, cannot take screenshot');
      return null;
    }

    const id = this.nextScreenshotId++;

    return new Promise<Buffer | null>((resolve) => {
      const timer = setTimeout(() => {
        if (this.pendingScreenshot?.id === id) {
          this.pendingScreenshot = null;
        }
        logger.warn('Screenshot request timed out', { id, timeout_ms: timeoutMs });
        resolve(null);
      }, timeoutMs);

      const slot: ScreenshotSlot = {
        id,
        resolve: (bytes) => {
          clearTimeout(timer);
          if (this.pendingScreenshot === slot) {
            this.pendingScreenshot = null;
          }
          resolve(bytes);
        },
      };

      this.pendingScreenshot = slot;
      this.issuedScreenshots.push(id);
      if (this.issuedScreenshots.length > MAX_ISSUED_SCREENSHOTS) {
        this.issuedScreenshots.shift();
      }

      if (!this.send({ type: 'SCREENSHOT' })) {
        this.issuedScreenshots = this.issuedScreenshots.filter(issued => issued !== id);
        slot.resolve(null);
      }
    });
  }

  /**
   * 发送单行指令，未连接或包含换行时返回 false
   */
  send(command: RemoteCommand): boolean {
    return this.sendLine(formatCommand(command));
  }

  private sendLine(text: string): boolean {
    const socket = this.socket;
    if (this.state !== 'connected' || !socket) {
      logger.warn('Cannot send, not connected', { command: text.split(' ')[0] });
      return false;
    }

    if (/[\r\n]/.test(text)) {
      logger.warn('Refusing to send multi-line command', { command: text.split(' ')[0] });
      return false;
    }

    try {
      logger.debug('Send', { command: text });
      return socket.send(text);
    } catch (error) {
      logger.error('Send failed', error, { command: text });
      return false;
    }
  }

  /**
   * 确保虚拟屏幕已创建
   */
  async ensureDisplay(width: number, height: number, dpi: number, bitrateKbps?: number): Promise<boolean> {
    if (!(await this.ensureConnected())) {
      return false;
    }

    logger.info('Creating virtual display', { width, height, dpi, bitrate_kbps: bitrateKbps });
    return this.send({ type: 'CREATE_DISPLAY', width, height, dpi, bitrateKbps });
  }

  tap(x: number, y: number): boolean {
    return this.send({ type: 'TAP', x, y });
  }

  swipe(x1: number, y1: number, x2: number, y2: number, durationMs = 300): boolean {
    return this.send({ type: 'SWIPE', x1, y1, x2, y2, durationMs });
  }

  key(code: number): boolean {
    return this.send({ type: 'KEY', code });
  }

  launchApp(packageName: string): boolean {
    return this.send({ type: 'LAUNCH_APP', packageName });
  }

  touchDown(x: number, y: number): boolean {
    return this.send({ type: 'TOUCH_DOWN', x, y });
  }

  touchMove(x: number, y: number): boolean {
    return this.send({ type: 'TOUCH_MOVE', x, y });
  }

  touchUp(x: number, y: number): boolean {
    return this.send({ type: 'TOUCH_UP', x, y });
  }

  /**
   * 关闭连接并重置所有状态，不抛异常
   */
  shutdown(): void {
    logger.debug('Shutting down');
    const socket = this.socket;

    try {
      if (this.isConnected()) {
        this.sendLine(formatCommand({ type: 'DESTROY_DISPLAY' }));
      }
      socket?.close(1000, 'Client shutdown');
    } catch (error) {
      logger.error('Error during shutdown', error);
    }

    this.abortConnecting?.();
    this.markDisconnected();
    this.videoSize = null;
  }
}
