import { describe, expect, it } from 'vitest';
import {
  FrameSurface,
  VideoStreamDecoder,
  type DecoderConfig,
  type DecoderFactory,
  type DecoderHandle,
  type RawFrame,
  type RenderTarget,
} from '../src/video-stream-decoder';

const SPS = Buffer.from([0, 0, 0, 1, 0x67, 0x01]);
const PPS = Buffer.from([0, 0, 0, 1, 0x68, 0x02]);
const IDR = Buffer.from([0, 0, 0, 1, 0x65, 0x03]);
const SLICE = Buffer.from([0, 0, 0, 1, 0x41, 0x04]);

interface CreatedDecoder {
  config: DecoderConfig;
  target: RenderTarget;
  onError: (error: Error) => void;
  units: Buffer[];
  released: boolean;
}

class FakeDecoderFactory implements DecoderFactory {
  readonly created: CreatedDecoder[] = [];
  failNextQueue = false;

  create(config: DecoderConfig, target: RenderTarget, onError: (error: Error) => void): DecoderHandle {
    const record: CreatedDecoder = { config, target, onError, units: [], released: false };
    this.created.push(record);
    return {
      queue: (unit) => {
        if (this.failNextQueue) {
          this.failNextQueue = false;
          throw new Error('codec rejected unit');
        }
        record.units.push(unit);
      },
      release: () => {
        record.released = true;
      },
    };
  }
}

const frame: RawFrame = { width: 1, height: 1, data: Buffer.from([1, 2, 3, 4]) };

describe('VideoStreamDecoder', () => {
  it('starts decoding once both parameter sets arrive', () => {
    const factory = new FakeDecoderFactory();
    const decoder = new VideoStreamDecoder(factory);
    expect(decoder.attach(new FrameSurface(), 100, 50)).toBe(true);

    decoder.onChunk(SPS);
    expect(factory.created).toHaveLength(0);
    decoder.onChunk(PPS);
    expect(factory.created).toHaveLength(1);
    expect(factory.created[0].config).toEqual({ csd0: SPS, csd1: PPS, width: 100, height: 50 });

    decoder.onChunk(IDR);
    expect(factory.created[0].units).toEqual([IDR]);
    expect(decoder.isActive).toBe(true);
  });

  it('drains units buffered before the parameter sets', () => {
    const factory = new FakeDecoderFactory();
    const decoder = new VideoStreamDecoder(factory);
    decoder.attach(new FrameSurface(), 100, 50);

    decoder.onChunk(IDR);
    expect(decoder.pendingCount).toBe(1);
    decoder.onChunk(SPS);
    decoder.onChunk(PPS);

    expect(factory.created[0].units).toEqual([IDR]);
    expect(decoder.pendingCount).toBe(0);
  });

  it('resumes after detach and re-attach without new parameter sets', () => {
    const factory = new FakeDecoderFactory();
    const decoder = new VideoStreamDecoder(factory);
    decoder.attach(new FrameSurface(), 100, 50);
    decoder.onChunk(SPS);
    decoder.onChunk(PPS);

    decoder.detach();
    expect(factory.created[0].released).toBe(true);
    expect(decoder.isActive).toBe(false);
    expect(decoder.hasParameterSets).toBe(true);

    decoder.attach(new FrameSurface('second'), 100, 50);
    decoder.onChunk(SLICE);

    expect(factory.created).toHaveLength(2);
    expect(factory.created[1].target.name).toBe('second');
    expect(factory.created[1].units).toEqual([SLICE]);
  });

  it('converts length-prefixed chunks before classifying them', () => {
    const factory = new FakeDecoderFactory();
    const decoder = new VideoStreamDecoder(factory);
    decoder.attach(new FrameSurface(), 100, 50);

    decoder.onChunk(Buffer.from([0, 0, 0, 2, 0x67, 0x01]));
    expect(decoder.hasParameterSets).toBe(false);
    decoder.onChunk(PPS);

    expect(factory.created[0].config.csd0).toEqual(SPS);
  });

  it('keeps the first parameter set it sees', () => {
    const factory = new FakeDecoderFactory();
    const decoder = new VideoStreamDecoder(factory);
    const laterSps = Buffer.from([0, 0, 0, 1, 0x67, 0x09]);

    decoder.onChunk(SPS);
    decoder.onChunk(laterSps);
    decoder.onChunk(PPS);
    decoder.attach(new FrameSurface(), 10, 10);
    decoder.onChunk(IDR);

    expect(factory.created[0].config.csd0).toEqual(SPS);
  });

  it('caps the pending buffer', () => {
    const decoder = new VideoStreamDecoder(new FakeDecoderFactory(), { maxPendingUnits: 2 });
    decoder.onChunk(IDR);
    decoder.onChunk(SLICE);
    decoder.onChunk(SLICE);
    expect(decoder.pendingCount).toBe(2);
  });

  it('rebuilds the decoder after a queue failure', () => {
    const factory = new FakeDecoderFactory();
    const decoder = new VideoStreamDecoder(factory);
    decoder.attach(new FrameSurface(), 100, 50);
    decoder.onChunk(SPS);
    decoder.onChunk(PPS);

    factory.failNextQueue = true;
    decoder.onChunk(IDR);
    expect(factory.created[0].released).toBe(true);
    expect(decoder.isActive).toBe(false);

    decoder.onChunk(SLICE);
    expect(factory.created).toHaveLength(2);
    expect(factory.created[1].units).toEqual([SLICE]);
  });

  it('ignores asynchronous errors from a decoder it already replaced', () => {
    const factory = new FakeDecoderFactory();
    const decoder = new VideoStreamDecoder(factory);
    decoder.attach(new FrameSurface(), 100, 50);
    decoder.onChunk(SPS);
    decoder.onChunk(PPS);

    factory.created[0].onError(new Error('process exited'));
    expect(decoder.isActive).toBe(false);

    decoder.onChunk(SLICE);
    factory.created[0].onError(new Error('late exit'));
    expect(decoder.isActive).toBe(true);
    expect(factory.created[1].released).toBe(false);
  });

  it('rebuilds with the new size after resize', () => {
    const factory = new FakeDecoderFactory();
    const decoder = new VideoStreamDecoder(factory);
    decoder.attach(new FrameSurface(), 100, 50);
    decoder.onChunk(SPS);
    decoder.onChunk(PPS);

    decoder.resize(200, 100);
    expect(factory.created[0].released).toBe(true);
    decoder.onChunk(SLICE);

    expect(factory.created[1].config.width).toBe(200);
    expect(factory.created[1].config.height).toBe(100);
  });

  it('refuses an invalid size', () => {
    const decoder = new VideoStreamDecoder(new FakeDecoderFactory());
    expect(decoder.attach(new FrameSurface(), 0, 50)).toBe(false);
  });

  it('forgets parameter sets on dispose', () => {
    const decoder = new VideoStreamDecoder(new FakeDecoderFactory());
    decoder.onChunk(SPS);
    decoder.onChunk(PPS);
    decoder.dispose();
    expect(decoder.hasParameterSets).toBe(false);
  });

  describe('captureFrame', () => {
    it('encodes the latest frame', async () => {
      const surface = new FrameSurface();
      const decoder = new VideoStreamDecoder(new FakeDecoderFactory(), {
        encoder: async (f) => Buffer.from(`png:${f.width}x${f.height}`),
      });
      decoder.attach(surface, 1, 1);
      surface.present(frame);

      const png = await decoder.captureFrame(50);
      expect(png?.toString()).toBe('png:1x1');
    });

    it('returns null without a target, without a frame, or when encoding fails', async () => {
      const decoder = new VideoStreamDecoder(new FakeDecoderFactory(), {
        encoder: async () => {
          throw new Error('encode failed');
        },
      });
      expect(await decoder.captureFrame(10)).toBeNull();

      const surface = new FrameSurface();
      decoder.attach(surface, 1, 1);
      expect(await decoder.captureFrame(10)).toBeNull();

      surface.present(frame);
      expect(await decoder.captureFrame(10)).toBeNull();
    });
  });
});

describe('FrameSurface', () => {
  it('wakes a waiting reader on the next frame', async () => {
    const surface = new FrameSurface();
    const pending = surface.readFrame(1000);
    surface.present(frame);
    await expect(pending).resolves.toBe(frame);
  });

  it('times out when nothing is presented', async () => {
    const surface = new FrameSurface();
    surface.present(frame);
    surface.clear();
    await expect(surface.readFrame(10)).resolves.toBeNull();
  });
});
