import { EventEmitter } from 'events';
import { PassThrough, Writable } from 'stream';
import { describe, expect, it } from 'vitest';
import { FfmpegDecoderFactory, type DecoderProcess } from '../src/ffmpeg-decoder';
import type { RawFrame, RenderTarget } from '../src/video-stream-decoder';

class FakeFfmpeg extends EventEmitter implements DecoderProcess {
  // 进入 ffmpeg 的数据，按写入顺序
  readonly received: Buffer[] = [];
  private pending: Array<() => void> = [];
  killed = false;

  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly stdin = new Writable({
    highWaterMark: 8,
    write: (chunk: Buffer, _encoding, callback) => {
      this.received.push(chunk);
      this.pending.push(() => callback());
    },
  });

  // 模拟 ffmpeg 消费完所有输入
  drain(): void {
    while (this.pending.length > 0) {
      this.pending.shift()?.();
    }
  }

  kill(): boolean {
    this.killed = true;
    return true;
  }
}

class RecordingTarget implements RenderTarget {
  readonly name = 'test';
  readonly frames: RawFrame[] = [];

  present(frame: RawFrame): void {
    this.frames.push(frame);
  }

  async readFrame(): Promise<RawFrame | null> {
    return this.frames[this.frames.length - 1] ?? null;
  }
}

const SPS = Buffer.from([0, 0, 0, 1, 0x67, 0x01]);
const PPS = Buffer.from([0, 0, 0, 1, 0x68, 0x02]);
const IDR = Buffer.from([0, 0, 0, 1, 0x65, 0x03]);
const SLICE = Buffer.from([0, 0, 0, 1, 0x41, 0x04]);

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

function createDecoder() {
  const fake = new FakeFfmpeg();
  const spawned: Array<{ command: string; args: string[] }> = [];
  const factory = new FfmpegDecoderFactory('ffmpeg-test', (command, args) => {
    spawned.push({ command, args });
    return fake;
  });
  const target = new RecordingTarget();
  const errors: Error[] = [];
  const handle = factory.create({ csd0: SPS, csd1: PPS, width: 1, height: 1 }, target, error => errors.push(error));
  return { fake, spawned, target, errors, handle };
}

describe('FfmpegDecoderFactory', () => {
  it('spawns ffmpeg and feeds it the parameter sets first', () => {
    const { fake, spawned } = createDecoder();

    expect(spawned).toHaveLength(1);
    expect(spawned[0].command).toBe('ffmpeg-test');
    expect(spawned[0].args).toEqual(expect.arrayContaining(['-f', 'h264', '-s', '1x1', 'pipe:1']));
    expect(fake.received).toEqual([SPS]);
    expect(fake.stdin.writableLength).toBe(12);
  });

  it('drops non-key units while the input is backed up', async () => {
    const { fake, handle } = createDecoder();
    expect(fake.stdin.writableNeedDrain).toBe(true);

    handle.queue(SLICE);
    handle.queue(IDR);
    expect(fake.stdin.writableLength).toBe(18);

    fake.drain();
    await tick();
    expect(fake.stdin.writableNeedDrain).toBe(false);

    handle.queue(SLICE);
    fake.drain();
    expect(fake.received).toEqual([SPS, PPS, IDR, SLICE]);
  });

  it('slices stdout into RGBA frames', async () => {
    const { fake, target } = createDecoder();

    fake.stdout.write(Buffer.from([1, 2, 3, 4, 5, 6]));
    fake.stdout.write(Buffer.from([7, 8]));
    await tick();

    expect(target.frames.map(frame => [...frame.data])).toEqual([
      [1, 2, 3, 4],
      [5, 6, 7, 8],
    ]);
    expect(target.frames[0]).toMatchObject({ width: 1, height: 1 });
  });

  it('reports an unexpected exit', () => {
    const { fake, errors } = createDecoder();
    fake.emit('exit', 1, null);
    expect(errors.map(error => error.message)).toEqual(['ffmpeg exited (code 1, signal null)']);
  });

  it('stays quiet after release and refuses more input', () => {
    const { fake, errors, handle } = createDecoder();

    handle.release();
    fake.emit('exit', null, 'SIGTERM');

    expect(fake.killed).toBe(true);
    expect(errors).toEqual([]);
    expect(() => handle.queue(IDR)).toThrow('Decoder input is closed');
  });
});
