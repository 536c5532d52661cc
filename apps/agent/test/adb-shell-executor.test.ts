import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import {
  AdbAuthorizer,
  AdbShellExecutor,
  escapeInputText,
  type CommandResult,
  type CommandRunner,
} from '../src/adb-shell-executor';

interface Invocation {
  file: string;
  args: string[];
  timeoutMs: number;
}

function fakeRunner(respond: (args: string[]) => Partial<CommandResult> | Error = () => ({})) {
  const invocations: Invocation[] = [];
  const runner: CommandRunner = async (file, args, timeoutMs) => {
    invocations.push({ file, args, timeoutMs });
    const response = respond(args);
    if (response instanceof Error) throw response;
    return { exitCode: 0, stdout: Buffer.alloc(0), stderr: '', ...response };
  };
  return { runner, invocations };
}

describe('escapeInputText', () => {
  it('quotes the text and encodes spaces', () => {
    expect(escapeInputText("it's ok")).toBe("'it'\\''s%sok'");
    expect(escapeInputText('hello')).toBe("'hello'");
  });
});

describe('AdbShellExecutor', () => {
  const serial = 'emulator-5554';

  it('targets the configured device serial', async () => {
    const { runner, invocations } = fakeRunner();
    const executor = new AdbShellExecutor({ adbPath: '/opt/adb', serial, timeoutMs: 5000, runner });

    await expect(executor.tap(10.7, 20.2)).resolves.toBe(true);

    expect(invocations).toEqual([
      { file: '/opt/adb', args: ['-s', serial, 'shell', 'input tap 10 20'], timeoutMs: 5000 },
    ]);
  });

  it('builds input commands', async () => {
    const { runner, invocations } = fakeRunner();
    const executor = new AdbShellExecutor({ serial, runner });

    await executor.swipe(1, 2, 3, 4, 400.9);
    await executor.keyEvent(4);
    await executor.inputText("it's ok");
    await executor.launchApp('com.tencent.mm');

    expect(invocations.map(i => i.args[3])).toEqual([
      'input swipe 1 2 3 4 400',
      'input keyevent 4',
      "input text 'it'\\''s%sok'",
      'monkey -p com.tencent.mm -c android.intent.category.LAUNCHER 1',
    ]);
  });

  it('reports a non-zero exit as failure', async () => {
    const { runner } = fakeRunner(() => ({ exitCode: 1, stderr: 'error: device offline' }));
    const executor = new AdbShellExecutor({ serial, runner });
    await expect(executor.keyEvent(3)).resolves.toBe(false);
  });

  it('reports a runner exception as failure', async () => {
    const { runner } = fakeRunner(() => new Error('spawn adb ENOENT'));
    const executor = new AdbShellExecutor({ serial, runner });
    await expect(executor.tap(1, 1)).resolves.toBe(false);
  });

  describe('screenshots', () => {
    let dir: string | null = null;

    afterEach(async () => {
      if (dir) await fs.rm(dir, { recursive: true, force: true });
      dir = null;
    });

    it('writes the captured PNG to disk', async () => {
      const { runner, invocations } = fakeRunner(() => ({ stdout: Buffer.from('png-bytes') }));
      const executor = new AdbShellExecutor({ serial, runner });
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'adb-test-'));
      const file = path.join(dir, 'screen.png');

      await expect(executor.screenshot(file)).resolves.toBe(true);

      expect(invocations[0].args).toEqual(['-s', serial, 'exec-out', 'screencap', '-p']);
      expect((await fs.readFile(file)).toString()).toBe('png-bytes');
    });

    it('returns null for an empty capture', async () => {
      const { runner } = fakeRunner();
      const executor = new AdbShellExecutor({ serial, runner });
      await expect(executor.capture()).resolves.toBeNull();
    });
  });
});

describe('AdbAuthorizer', () => {
  it('requires the device state to be "device"', async () => {
    const ready = new AdbAuthorizer({ serial: 'x', runner: fakeRunner(() => ({ stdout: Buffer.from('device\n') })).runner });
    const unauthorized = new AdbAuthorizer({
      serial: 'x',
      runner: fakeRunner(() => ({ stdout: Buffer.from('unauthorized\n') })).runner,
    });
    const missing = new AdbAuthorizer({ serial: 'x', runner: fakeRunner(() => ({ exitCode: 1 })).runner });

    await expect(ready.hasPermission()).resolves.toBe(true);
    await expect(unauthorized.hasPermission()).resolves.toBe(false);
    await expect(missing.hasPermission()).resolves.toBe(false);
  });
});
