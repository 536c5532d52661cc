import readline from 'readline/promises';
import { AdbAuthorizer, AdbShellExecutor } from './adb-shell-executor';
import { config, validateConfig } from './config';
import { FfmpegDecoderFactory } from './ffmpeg-decoder';
import { bindInterrupts, createInterruptHandler } from './interrupts';
import { logger } from './logger';
import { ModelClient } from './model-client';
import { PhoneAgent } from './phone-agent';
import { RemoteControlChannel } from './remote-control-channel';
import { FrameSurface, VideoStreamDecoder } from './video-stream-decoder';

/**
 * PhonePilot Agent 入口
 *
 * 用法: phonepilot "打开微信给张三发消息"
 */
async function main() {
  const goal = process.argv.slice(2).join(' ').trim();
  if (!goal) {
    console.error('Usage: phonepilot <task description>');
    process.exit(2);
  }

  // 验证配置
  try {
    validateConfig();
  } catch (error) {
    logger.error('Config validation failed', error);
    process.exit(1);
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  const remote = config.useVirtualDisplay ? new RemoteControlChannel() : null;
  const decoder = remote ? new VideoStreamDecoder(new FfmpegDecoderFactory()) : null;
  decoder?.attach(new FrameSurface('virtual-display'), config.screenWidth, config.screenHeight);

  const agent = new PhoneAgent({
    model: new ModelClient(),
    local: new AdbShellExecutor(),
    authorization: new AdbAuthorizer(),
    remote,
    decoder,
    onConfirmation: async (message) => {
      const answer = await rl.question(`\n⚠️  ${message}\n确认执行? [y/N] `);
      return ['y', 'yes'].includes(answer.trim().toLowerCase());
    },
    onTakeover: async (message) => {
      console.log(`\n🙋 需要人工接管: ${message}`);
    },
    onStep: (step) => {
      const mark = step.success ? '✓' : '✗';
      console.log(`[${step.stepNumber}] ${mark} ${step.action}${step.message ? ` (${step.message})` : ''}`);
    },
  });

  // 优雅关闭：第一次信号取消任务，第二次直接退出
  const shutdown = createInterruptHandler({
    stop: (signal) => {
      logger.info('Stopping task...', { signal });
      agent.stop();
    },
    forceExit: () => process.exit(130),
  });
  bindInterrupts(shutdown, rl);

  logger.info('Starting PhonePilot Agent...', { model: config.aiModel, max_steps: config.maxSteps });

  try {
    const execution = await agent.runTask(goal);

    console.log(`\nStatus: ${execution.status}`);
    if (execution.result) console.log(`Result: ${execution.result}`);
    if (execution.errorMessage) console.log(`Message: ${execution.errorMessage}`);

    process.exitCode = execution.status === 'completed' ? 0 : 1;
  } finally {
    rl.close();
    decoder?.dispose();
  }
}

main().catch(error => {
  logger.error('Agent failed', error);
  process.exit(1);
});
