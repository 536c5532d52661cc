import dotenv from 'dotenv';
import path from 'path';
import { DEFAULT_REMOTE_PORT } from '@phonepilot/protocol';

// 加载环境变量
dotenv.config({ path: path.join(__dirname, '../.env') });

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AgentConfig {
  // Logging
  logLevel: LogLevel;

  // 虚拟屏幕控制通道
  remoteHost: string;
  remotePort: number;
  remoteConnectTimeout: number; // 建立连接超时 (ms)
  screenshotTimeout: number;    // 单次远程截图超时 (ms)
  useVirtualDisplay: boolean;

  // 屏幕
  screenWidth: number;
  screenHeight: number;
  screenDpi: number;
  videoBitrateKbps: number;
  normalizeCoordinates: boolean; // 是否将 0-1000 坐标换算为像素

  // 本地执行器
  adbPath: string;
  adbSerial?: string;
  ffmpegPath: string;

  // AI
  aiApiUrl: string;
  aiApiKey?: string;
  aiModel: string;
  aiMaxTokens: number;

  // AI Retry
  aiRetryMaxAttempts: number;
  aiRetryBaseDelay: number;
  aiRetryMaxDelay: number;
  aiRetryBackoffMultiplier: number;

  // Task
  maxSteps: number;  // 最大步骤数
  stepDelay: number; // 步骤间等待界面响应 (ms)
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function getEnv(env: Env, key: string, defaultValue?: string): string {
  const value = env[key] || defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const num = Number(value);
  if (isNaN(num)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return num;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new Error(`Environment variable ${key} must be a boolean`);
}

function getLogLevel(env: Env): LogLevel {
  const value = (env.LOG_LEVEL || 'info').toLowerCase();
  const level = LOG_LEVELS.find(l => l === value);
  if (!level) {
    throw new Error(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

export function loadConfig(env: Env = process.env): AgentConfig {
  return {
    logLevel: getLogLevel(env),

    remoteHost: getEnv(env, 'REMOTE_HOST', '127.0.0.1'),
    remotePort: getEnvNumber(env, 'REMOTE_PORT', DEFAULT_REMOTE_PORT),
    remoteConnectTimeout: getEnvNumber(env, 'REMOTE_CONNECT_TIMEOUT', 5000),
    screenshotTimeout: getEnvNumber(env, 'SCREENSHOT_TIMEOUT', 3000),
    useVirtualDisplay: getEnvBoolean(env, 'USE_VIRTUAL_DISPLAY', true),

    screenWidth: getEnvNumber(env, 'SCREEN_WIDTH', 1080),
    screenHeight: getEnvNumber(env, 'SCREEN_HEIGHT', 2400),
    screenDpi: getEnvNumber(env, 'SCREEN_DPI', 440),
    videoBitrateKbps: getEnvNumber(env, 'VIDEO_BITRATE_KBPS', 3000),
    normalizeCoordinates: getEnvBoolean(env, 'NORMALIZE_COORDINATES', true),

    adbPath: getEnv(env, 'ADB_PATH', 'adb'),
    adbSerial: env.ADB_SERIAL || undefined,
    ffmpegPath: getEnv(env, 'FFMPEG_PATH', 'ffmpeg'),

    aiApiUrl: getEnv(env, 'AI_API_URL', 'https://open.bigmodel.cn/api/paas/v4'),
    aiApiKey: env.AI_API_KEY || undefined,
    aiModel: getEnv(env, 'AI_MODEL', 'autoglm-phone'),
    aiMaxTokens: getEnvNumber(env, 'AI_MAX_TOKENS', 1024),

    aiRetryMaxAttempts: getEnvNumber(env, 'AI_RETRY_MAX_ATTEMPTS', 3),
    aiRetryBaseDelay: getEnvNumber(env, 'AI_RETRY_BASE_DELAY', 1000),
    aiRetryMaxDelay: getEnvNumber(env, 'AI_RETRY_MAX_DELAY', 10000),
    aiRetryBackoffMultiplier: getEnvNumber(env, 'AI_RETRY_BACKOFF_MULTIPLIER', 2),

    maxSteps: getEnvNumber(env, 'MAX_STEPS', 30),
    stepDelay: getEnvNumber(env, 'STEP_DELAY', 500),
  };
}

export const config: AgentConfig = loadConfig();

// 配置验证
export function validateConfig(cfg: AgentConfig = config): void {
  if (!cfg.aiApiKey) {
    throw new Error('AI_API_KEY is required');
  }

  if (cfg.screenWidth <= 0 || cfg.screenHeight <= 0) {
    throw new Error('SCREEN_WIDTH and SCREEN_HEIGHT must be positive');
  }

  if (cfg.maxSteps <= 0) {
    throw new Error('MAX_STEPS must be positive');
  }

  console.log('[Config] Agent config loaded:');
  console.log(`  - AI Model: ${cfg.aiModel}`);
  console.log(`  - AI Retry: ${cfg.aiRetryMaxAttempts} attempts`);
  console.log(`  - Virtual Display: ${cfg.useVirtualDisplay ? `ws://${cfg.remoteHost}:${cfg.remotePort}` : 'disabled'}`);
  console.log(`  - Screen: ${cfg.screenWidth}x${cfg.screenHeight} @ ${cfg.screenDpi}dpi`);
  console.log(`  - Max Steps: ${cfg.maxSteps}`);
}
