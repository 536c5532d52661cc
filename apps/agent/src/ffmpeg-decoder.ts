import { spawn } from 'child_process';
import type { Readable, Writable } from 'stream';
import { findNalUnitType, NAL_TYPE_IDR, NAL_TYPE_PPS, NAL_TYPE_SPS } from './annexb';
import { config } from './config';
import { ControlPlaneError } from './errors';
import { logger as rootLogger } from './logger';
import type { DecoderConfig, DecoderFactory, DecoderHandle, RenderTarget } from './video-stream-decoder';

const logger = rootLogger.withTag('FfmpegDecoder');

/**
 * 解码器用到的子进程接口
 */
export interface DecoderProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  kill(): boolean;
}

export type SpawnProcess = (command: string, args: string[]) => DecoderProcess;

const KEY_NAL_TYPES = new Set([NAL_TYPE_IDR, NAL_TYPE_SPS, NAL_TYPE_PPS]);

/**
 * 使用 ffmpeg 子进程解码 H.264：stdin 写入 Annex-B，stdout 读取 RGBA 原始帧
 *
 * ffmpeg 跟不上时 stdin 缓冲区满，此时丢弃非关键帧，直到缓冲区排空
 */
export class FfmpegDecoderFactory implements DecoderFactory {
  constructor(
    private readonly ffmpegPath: string = config.ffmpegPath,
    private readonly spawnProcess: SpawnProcess = (command, args) => spawn(command, args),
  ) {}

  create(cfg: DecoderConfig, target: RenderTarget, onError: (error: Error) => void): DecoderHandle {
    const { width, height } = cfg;
    const frameSize = width * height * 4;
    const args = [
      '-loglevel', 'error',
      '-f', 'h264',
      '-i', 'pipe:0',
      '-f', 'rawvideo',
      '-pix_fmt', 'rgba',
      '-s', `${width}x${height}`,
      'pipe:1',
    ];

    logger.debug('Spawning ffmpeg', { path: this.ffmpegPath, width, height });
    const child = this.spawnProcess(this.ffmpegPath, args);
    let released = false;
    let buffered: Buffer = Buffer.alloc(0);
    let dropped = 0;

    const fail = (error: Error): void => {
      if (released) return;
      onError(error);
    };

    child.stdout.on('data', (chunk: Buffer) => {
      buffered = buffered.length === 0 ? chunk : Buffer.concat([buffered, chunk]);
      while (buffered.length >= frameSize) {
        target.present({ width, height, data: Buffer.from(buffered.subarray(0, frameSize)) });
        buffered = buffered.subarray(frameSize);
      }
    });

    child.stderr.on('data', (chunk: Buffer) => {
      logger.debug('[ffmpeg] ' + chunk.toString('utf8').trim());
    });

    child.on('error', fail);
    child.stdin.on('error', fail);
    child.on('exit', (code, signal) => {
      fail(new ControlPlaneError('decode', `ffmpeg exited (code ${code}, signal ${signal})`));
    });

    child.stdin.write(cfg.csd0);
    child.stdin.write(cfg.csd1);

    return {
      queue(unit: Buffer): void {
        if (released || !child.stdin.writable) {
          throw new ControlPlaneError('decode', 'Decoder input is closed');
        }
        if (child.stdin.writableNeedDrain && !KEY_NAL_TYPES.has(findNalUnitType(unit))) {
          dropped++;
          if (dropped % 100 === 1) {
            logger.debug('ffmpeg input backed up, dropping frames', { dropped });
          }
          return;
        }
        child.stdin.write(unit);
      },
      release(): void {
        if (released) return;
        released = true;
        child.stdin.end();
        child.kill();
      },
    };
  }
}
