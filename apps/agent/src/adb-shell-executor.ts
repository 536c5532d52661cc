import { execFile } from 'child_process';
import { promises as fs } from 'fs';
import { config } from './config';
import { describeError } from './errors';
import { logger as rootLogger } from './logger';
import type { AuthorizationGate, LocalExecutor } from './types';

const logger = rootLogger.withTag('AdbShell');

const DEFAULT_TIMEOUT_MS = 30000;
// PNG 截图可能较大
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export interface CommandResult {
  exitCode: number;
  stdout: Buffer;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<CommandResult>;

/**
 * 默认实现：execFile，超时或非零退出码不抛异常，转为 exitCode
 */
export const execFileRunner: CommandRunner = (file, args, timeoutMs) =>
  new Promise((resolve) => {
    execFile(
      file,
      args,
      { encoding: 'buffer', timeout: timeoutMs, maxBuffer: MAX_OUTPUT_BYTES },
      (error, stdout, stderr) => {
        const code = error && typeof error.code === 'number' ? error.code : error ? -1 : 0;
        resolve({
          exitCode: code,
          stdout,
          stderr: error && stderr.length === 0 ? error.message : stderr.toString('utf8'),
        });
      },
    );
  });

export interface AdbOptions {
  adbPath?: string;
  serial?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

/**
 * input text 参数转义：单引号包裹，内部单引号写成 '\''，空格写成 %s
 */
export function escapeInputText(text: string): string {
  return `'${text.replace(/'/g, "'\\''").replace(/ /g, '%s')}'`;
}

abstract class AdbClient {
  protected readonly adbPath: string;
  protected readonly serial?: string;
  protected readonly timeoutMs: number;
  protected readonly runner: CommandRunner;

  constructor(options: AdbOptions = {}) {
    this.adbPath = options.adbPath ?? config.adbPath;
    this.serial = options.serial ?? config.adbSerial;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.runner = options.runner ?? execFileRunner;
  }

  protected async adb(args: string[]): Promise<CommandResult> {
    const fullArgs = this.serial ? ['-s', this.serial, ...args] : args;
    logger.debug('Executing command', { command: [this.adbPath, ...fullArgs].join(' ') });

    try {
      const result = await this.runner(this.adbPath, fullArgs, this.timeoutMs);
      if (result.exitCode !== 0) {
        logger.warn('Command failed', {
          command: args.join(' '),
          exit_code: result.exitCode,
          stderr: result.stderr.slice(0, 500),
        });
      }
      return result;
    } catch (error) {
      logger.error('Error executing command', error, { command: args.join(' ') });
      return { exitCode: -1, stdout: Buffer.alloc(0), stderr: describeError(error) };
    }
  }
}

/**
 * 本地执行器：通过 adb shell 操作设备
 */
export class AdbShellExecutor extends AdbClient implements LocalExecutor {
  private async shell(command: string): Promise<boolean> {
    const result = await this.adb(['shell', command]);
    return result.exitCode === 0;
  }

  tap(x: number, y: number): Promise<boolean> {
    return this.shell(`input tap ${Math.trunc(x)} ${Math.trunc(y)}`);
  }

  swipe(x1: number, y1: number, x2: number, y2: number, durationMs = 300): Promise<boolean> {
    const coords = [x1, y1, x2, y2].map(Math.trunc).join(' ');
    return this.shell(`input swipe ${coords} ${Math.trunc(durationMs)}`);
  }

  keyEvent(keyCode: number): Promise<boolean> {
    return this.shell(`input keyevent ${keyCode}`);
  }

  inputText(text: string): Promise<boolean> {
    return this.shell(`input text ${escapeInputText(text)}`);
  }

  launchApp(packageName: string): Promise<boolean> {
    return this.shell(`monkey -p ${packageName} -c android.intent.category.LAUNCHER 1`);
  }

  /**
   * 截图为 PNG 字节，失败返回 null
   */
  async capture(): Promise<Buffer | null> {
    const result = await this.adb(['exec-out', 'screencap', '-p']);
    if (result.exitCode !== 0 || result.stdout.length === 0) {
      return null;
    }
    return result.stdout;
  }

  async screenshot(outputPath: string): Promise<boolean> {
    const png = await this.capture();
    if (!png) return false;

    try {
      await fs.writeFile(outputPath, png);
      return true;
    } catch (error) {
      logger.error('Failed to write screenshot', error, { path: outputPath });
      return false;
    }
  }
}

/**
 * 权限检查：设备已连接并授权调试
 */
export class AdbAuthorizer extends AdbClient implements AuthorizationGate {
  async hasPermission(): Promise<boolean> {
    const result = await this.adb(['get-state']);
    return result.exitCode === 0 && result.stdout.toString('utf8').trim() === 'device';
  }
}
