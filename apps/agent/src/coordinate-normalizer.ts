import { NORMALIZED_MAX } from '@phonepilot/protocol';

export const DEFAULT_SCREEN_WIDTH = 1080;
export const DEFAULT_SCREEN_HEIGHT = 2400;

// 大屏阈值：任一边超过此值时 0-1000 内的坐标一律视为归一化坐标
const LARGE_SCREEN_THRESHOLD = 1200;

export interface ScreenSize {
  width: number;
  height: number;
}

/**
 * 坐标换算：模型输出 0-1000 归一化坐标 → 设备像素
 */
export class CoordinateNormalizer {
  private width = DEFAULT_SCREEN_WIDTH;
  private height = DEFAULT_SCREEN_HEIGHT;

  constructor(width?: number, height?: number) {
    if (width !== undefined && height !== undefined) {
      this.setScreenSize(width, height);
    }
  }

  /**
   * 更新屏幕尺寸，非正值回退到默认值
   */
  setScreenSize(width: number, height: number): void {
    this.width = width > 0 ? width : DEFAULT_SCREEN_WIDTH;
    this.height = height > 0 ? height : DEFAULT_SCREEN_HEIGHT;
  }

  getScreenSize(): ScreenSize {
    return { width: this.width, height: this.height };
  }

  /**
   * 判断坐标是否为归一化坐标
   * 小屏上接近右下角边缘的坐标视为像素坐标
   */
  isNormalized(x: number, y: number): boolean {
    if (x < 0 || x > NORMALIZED_MAX || y < 0 || y > NORMALIZED_MAX) {
      return false;
    }

    if (this.width > LARGE_SCREEN_THRESHOLD || this.height > LARGE_SCREEN_THRESHOLD) {
      return true;
    }

    return x < Math.trunc(this.width * 0.9) || y < Math.trunc(this.height * 0.9);
  }

  toPixel(x: number, y: number): [number, number] {
    const px = Math.trunc((x * this.width) / NORMALIZED_MAX);
    const py = Math.trunc((y * this.height) / NORMALIZED_MAX);
    return [clamp(px, 0, this.width), clamp(py, 0, this.height)];
  }

  /** 按顺序两两换算，末尾落单的值丢弃 */
  toPixelBatch(coords: readonly number[]): number[] {
    const result: number[] = [];
    for (let i = 0; i + 1 < coords.length; i += 2) {
      result.push(...this.toPixel(coords[i], coords[i + 1]));
    }
    return result;
  }

  /**
   * 归一化坐标换算为像素，像素坐标原样返回
   */
  resolve(x: number, y: number): [number, number] {
    return this.isNormalized(x, y) ? this.toPixel(x, y) : [x, y];
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
