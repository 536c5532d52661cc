import sharp from 'sharp';
import { findNalUnitType, maybeConvertFraming, NAL_TYPE_PPS, NAL_TYPE_SPS } from './annexb';
import { logger as rootLogger } from './logger';
import { withTimeout } from './timing';

const logger = rootLogger.withTag('VideoDecoder');

// 参数集未就绪时最多缓冲的数据块
const MAX_PENDING_UNITS = 100;
// 连续失败达到此次数后按 error 级别记录
const FAILURE_ESCALATION_THRESHOLD = 5;
const DEFAULT_CAPTURE_TIMEOUT_MS = 1000;

// ============ 渲染目标 / 解码器抽象 ============

/** 解码后的 RGBA 帧 */
export interface RawFrame {
  width: number;
  height: number;
  data: Buffer;
}

export interface RenderTarget {
  readonly name: string;
  present(frame: RawFrame): void;
  /** 读取最近一帧，尚无帧时最多等待 timeoutMs */
  readFrame(timeoutMs: number): Promise<RawFrame | null>;
}

export interface DecoderConfig {
  csd0: Buffer;
  csd1: Buffer;
  width: number;
  height: number;
}

export interface DecoderHandle {
  /** 提交一个 Annex-B 数据单元，失败时抛异常 */
  queue(unit: Buffer): void;
  release(): void;
}

export interface DecoderFactory {
  create(config: DecoderConfig, target: RenderTarget, onError: (error: Error) => void): DecoderHandle;
}

export type FrameEncoder = (frame: RawFrame) => Promise<Buffer>;

/**
 * RGBA → PNG
 */
export const encodePng: FrameEncoder = (frame) =>
  sharp(frame.data, { raw: { width: frame.width, height: frame.height, channels: 4 } })
    .png()
    .toBuffer();

/**
 * 内存中的渲染目标，只保留最新一帧
 */
export class FrameSurface implements RenderTarget {
  private latest: RawFrame | null = null;
  private waiters: Array<(frame: RawFrame) => void> = [];

  constructor(readonly name: string = 'surface') {}

  present(frame: RawFrame): void {
    this.latest = frame;
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach(waiter => waiter(frame));
  }

  readFrame(timeoutMs: number): Promise<RawFrame | null> {
    if (this.latest) {
      return Promise.resolve(this.latest);
    }

    return new Promise((resolve) => {
      const waiter = (frame: RawFrame): void => {
        clearTimeout(timer);
        resolve(frame);
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter(w => w !== waiter);
        resolve(null);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  clear(): void {
    this.latest = null;
  }
}

// ============ 解码生命周期 ============

export interface VideoStreamDecoderOptions {
  encoder?: FrameEncoder;
  maxPendingUnits?: number;
}

/**
 * H.264 视频流解码
 *
 * 参数集（SPS/PPS）一经捕获，只在 dispose 时清除：
 * detach 或解码出错只释放解码器实例，下一个数据块到来时用已缓存的参数集重建。
 * 上游重连后不一定重发参数集，清掉就再也恢复不了画面。
 */
export class VideoStreamDecoder {
  private csd0: Buffer | null = null;
  private csd1: Buffer | null = null;
  private decoder: DecoderHandle | null = null;
  private target: RenderTarget | null = null;
  private pending: Buffer[] = [];
  private width = 0;
  private height = 0;
  private consecutiveFailures = 0;
  private droppedUnits = 0;

  private readonly encoder: FrameEncoder;
  private readonly maxPendingUnits: number;

  constructor(private readonly factory: DecoderFactory, options: VideoStreamDecoderOptions = {}) {
    this.encoder = options.encoder ?? encodePng;
    this.maxPendingUnits = options.maxPendingUnits ?? MAX_PENDING_UNITS;
  }

  get isActive(): boolean {
    return this.decoder !== null && this.target !== null;
  }

  get hasParameterSets(): boolean {
    return this.csd0 !== null && this.csd1 !== null;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  attach(target: RenderTarget, width: number, height: number): boolean {
    if (width <= 0 || height <= 0) {
      logger.warn('Refusing to attach with invalid size', { target: target.name, width, height });
      return false;
    }

    this.releaseDecoder();
    this.pending = [];
    this.target = target;
    this.width = width;
    this.height = height;

    logger.debug('Attached to render target', {
      target: target.name,
      width,
      height,
      has_parameter_sets: this.hasParameterSets,
    });
    return true;
  }

  onChunk(bytes: Buffer): void {
    if (bytes.length === 0) return;

    const packet = maybeConvertFraming(bytes);

    if (this.decoder) {
      this.submit(packet);
      return;
    }

    const nalType = findNalUnitType(packet);
    if (nalType === NAL_TYPE_SPS) {
      if (!this.csd0) {
        this.csd0 = packet;
        logger.debug('Captured SPS', { size: packet.length });
      }
    } else if (nalType === NAL_TYPE_PPS) {
      if (!this.csd1) {
        this.csd1 = packet;
        logger.debug('Captured PPS', { size: packet.length });
      }
    } else if (this.pending.length < this.maxPendingUnits) {
      this.pending.push(packet);
    } else {
      this.droppedUnits++;
      if (this.droppedUnits % this.maxPendingUnits === 1) {
        logger.debug('Pending buffer full, dropping units', { dropped: this.droppedUnits });
      }
    }

    if (this.hasParameterSets && this.target) {
      this.initDecoder();
      if (this.decoder) {
        const units = this.pending;
        this.pending = [];
        logger.debug('Draining pending units', { count: units.length });
        for (const unit of units) {
          if (!this.decoder) break;
          this.submit(unit);
        }
      }
    }
  }

  /**
   * 目标尺寸变化：释放解码器，下一个数据块按新尺寸重建
   */
  resize(width: number, height: number): void {
    if (width <= 0 || height <= 0) return;
    if (width === this.width && height === this.height) return;

    logger.info('Video size changed', { from: `${this.width}x${this.height}`, to: `${width}x${height}` });
    this.width = width;
    this.height = height;
    this.releaseDecoder();
  }

  /**
   * 读取当前画面并编码为 PNG，超时返回 null
   */
  async captureFrame(timeoutMs: number = DEFAULT_CAPTURE_TIMEOUT_MS): Promise<Buffer | null> {
    const target = this.target;
    if (!target) {
      logger.warn('captureFrame: no render target attached');
      return null;
    }

    const frame = await withTimeout(target.readFrame(timeoutMs), timeoutMs, null);
    if (!frame) {
      logger.warn('captureFrame: no frame available', { timeout_ms: timeoutMs });
      return null;
    }

    try {
      return await this.encoder(frame);
    } catch (error) {
      logger.error('Failed to encode frame', error);
      return null;
    }
  }

  detach(): void {
    logger.debug('Detaching from render target');
    this.releaseDecoder();
    this.pending = [];
    this.target = null;
  }

  /**
   * 彻底销毁，包括参数集
   */
  dispose(): void {
    this.detach();
    this.csd0 = null;
    this.csd1 = null;
  }

  private initDecoder(): void {
    const target = this.target;
    const csd0 = this.csd0;
    const csd1 = this.csd1;
    if (!target || !csd0 || !csd1 || this.width <= 0 || this.height <= 0) return;

    let handle: DecoderHandle | null = null;
    const onError = (error: Error): void => {
      if (handle !== null && this.decoder === handle) {
        this.recover(error);
      }
    };

    try {
      handle = this.factory.create(
        {
          csd0: maybeConvertFraming(csd0),
          csd1: maybeConvertFraming(csd1),
          width: this.width,
          height: this.height,
        },
        target,
        onError,
      );
      this.decoder = handle;
      logger.info('Decoder initialised', { width: this.width, height: this.height });
    } catch (error) {
      logger.error('Failed to initialise decoder', error);
      this.decoder = null;
    }
  }

  private submit(unit: Buffer): void {
    const decoder = this.decoder;
    if (!decoder) return;

    try {
      decoder.queue(unit);
      this.consecutiveFailures = 0;
    } catch (error) {
      this.recover(error);
    }
  }

  /**
   * 解码失败：释放实例并清空缓冲，保留参数集
   */
  private recover(error: unknown): void {
    this.consecutiveFailures++;
    const meta = { consecutive_failures: this.consecutiveFailures };

    if (this.consecutiveFailures >= FAILURE_ESCALATION_THRESHOLD) {
      logger.error('Decoder keeps failing', error, meta);
    } else {
      logger.warn('Decoder error, will reinitialise on next unit', {
        ...meta,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    this.releaseDecoder();
    this.pending = [];
  }

  private releaseDecoder(): void {
    const decoder = this.decoder;
    this.decoder = null;
    if (!decoder) return;

    try {
      decoder.release();
    } catch (error) {
      logger.debug('Decoder release failed', { error: error instanceof Error ? error.message : String(error) });
    }
  }
}
