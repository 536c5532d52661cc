import { z } from 'zod';
import { extractActionText, extractThinking } from './action-parser';
import { config } from './config';
import { ControlPlaneError, describeError } from './errors';
import { logger as rootLogger } from './logger';
import { sleep } from './timing';
import type { ModelStepRequest, ModelStepResponse, StepModel } from './types';

const logger = rootLogger.withTag('ModelClient');

// 发给模型的历史动作条数
const HISTORY_WINDOW = 5;

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .partial()
    .optional(),
});

export interface RetryPolicy {
  maxAttempts: number;
  baseDelay: number;
  maxDelay: number;
  multiplier: number;
}

export interface ModelClientOptions {
  apiUrl?: string;
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  retry?: Partial<RetryPolicy>;
  fetchImpl?: typeof fetch;
  random?: () => number;
  delay?: (ms: number) => Promise<void>;
}

const SYSTEM_PROMPT = `你是一个手机自动化助手。用户会给你一个任务和当前屏幕截图，你需要分析屏幕内容并决定下一步操作。

## 坐标
所有坐标使用 0-1000 的相对坐标，左上角为 [0,0]，右下角为 [1000,1000]。

## 可用操作
- do(launch, app="应用名") - 启动应用
- do(tap, element=[x,y]) - 点击
- do(double_tap, element=[x,y]) - 双击
- do(long_press, element=[x,y]) - 长按
- do(type, text="文本") - 在当前输入框输入文本
- do(swipe, start=[x1,y1], end=[x2,y2], duration=300) - 滑动（毫秒）
- do(back) - 返回
- do(home) - 回到桌面
- do(wait, duration="2 seconds") - 等待页面加载
- do(take_over, message="原因") - 需要用户接管（登录、验证码等）
- finish("结果") - 任务完成

涉及支付、删除、发送等敏感操作时，追加 sensitive=true, message="需要确认的内容"。

## 回复格式
<think>你的思考过程</think>
<action>你要执行的操作</action>`;

/**
 * 模型客户端 - 发送截图与任务，返回思考与动作
 *
 * 可重试错误按指数退避 + 抖动重试
 */
export class ModelClient implements StepModel {
  private readonly apiUrl: string;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly retry: RetryPolicy;
  private readonly fetchImpl: typeof fetch;
  private readonly random: () => number;
  private readonly delay: (ms: number) => Promise<void>;

  constructor(options: ModelClientOptions = {}) {
    this.apiUrl = (options.apiUrl ?? config.aiApiUrl).replace(/\/+$/, '');
    this.apiKey = options.apiKey ?? config.aiApiKey;
    this.model = options.model ?? config.aiModel;
    this.maxTokens = options.maxTokens ?? config.aiMaxTokens;
    this.retry = {
      maxAttempts: options.retry?.maxAttempts ?? config.aiRetryMaxAttempts,
      baseDelay: options.retry?.baseDelay ?? config.aiRetryBaseDelay,
      maxDelay: options.retry?.maxDelay ?? config.aiRetryMaxDelay,
      multiplier: options.retry?.multiplier ?? config.aiRetryBackoffMultiplier,
    };
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.random = options.random ?? Math.random;
    this.delay = options.delay ?? sleep;
  }

  /**
   * 构建用户消息文本
   */
  buildUserText(request: ModelStepRequest): string {
    const lines = [`任务: ${request.goal}`, `当前步骤: ${request.stepNumber}`];
    if (request.previousActions.length > 0) {
      lines.push(`之前的操作: ${request.previousActions.slice(-HISTORY_WINDOW).join(', ')}`);
    }
    lines.push('', '请分析当前屏幕并决定下一步操作。');
    return lines.join('\n');
  }

  /**
   * 计算退避延迟时间（指数退避 + 抖动）
   */
  calculateBackoffDelay(attempt: number): number {
    const exponentialDelay = this.retry.baseDelay * Math.pow(this.retry.multiplier, attempt);

    // ±20% 抖动
    const jitter = 0.8 + this.random() * 0.4;

    return Math.min(exponentialDelay * jitter, this.retry.maxDelay);
  }

  /**
   * 判断错误是否可重试
   */
  isRetryableError(error: Error): boolean {
    const retryableErrors = [
      'ECONNRESET',
      'ETIMEDOUT',
      'ECONNREFUSED',
      'ENOTFOUND',
      'EAI_AGAIN',
      'network error',
      'timeout',
      'rate limit',
      '429',
      '502',
      '503',
      '504',
    ];

    const errorMessage = error.message.toLowerCase();
    return retryableErrors.some(pattern => errorMessage.includes(pattern.toLowerCase()));
  }

  /**
   * 发送一步请求（带重试）
   */
  async sendStep(request: ModelStepRequest): Promise<ModelStepResponse> {
    const maxAttempts = Math.max(1, this.retry.maxAttempts);
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        logger.debug('Model call attempt', { step: request.stepNumber, attempt: attempt + 1, max_attempts: maxAttempts });
        const response = await this.callModel(request);

        if (attempt > 0) {
          logger.info('Model call succeeded after retry', { attempts: attempt + 1 });
        }
        return response;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (!this.isRetryableError(lastError)) {
          logger.warn('Non-retryable error from model API', { error: lastError.message });
          throw lastError;
        }

        if (attempt < maxAttempts - 1) {
          const delay = this.calculateBackoffDelay(attempt);
          logger.warn('Model call failed, retrying', {
            attempt: attempt + 1,
            max_attempts: maxAttempts,
            delay_ms: Math.round(delay),
            error: lastError.message,
          });
          await this.delay(delay);
        }
      }
    }

    throw lastError ?? new ControlPlaneError('execution', 'Model call failed after all retries');
  }

  private async callModel(request: ModelStepRequest): Promise<ModelStepResponse> {
    if (!this.apiKey) {
      throw new ControlPlaneError('execution', 'AI_API_KEY not configured');
    }

    const userText = this.buildUserText(request);
    const requestBody = {
      model: this.model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        {
          role: 'user',
          content: [
            { type: 'text', text: userText },
            {
              type: 'image_url',
              image_url: { url: `data:image/png;base64,${request.screenshot.toString('base64')}` },
            },
          ],
        },
      ],
      max_tokens: this.maxTokens,
    };

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.apiUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(requestBody),
      });
    } catch (networkError) {
      throw new ControlPlaneError('connection', `Network error: ${describeError(networkError)}`, {
        cause: networkError,
      });
    }

    if (!response.ok) {
      const errorText = await response.text();
      let errorMessage = `Model API error (${response.status})`;

      if (response.status === 401) {
        errorMessage = 'API认证失败 (401)：请检查AI_API_KEY是否正确';
      } else if (response.status === 429) {
        errorMessage = 'API速率限制 (429)：请求过于频繁，请稍后重试';
      } else if (response.status >= 500) {
        errorMessage = `API服务器错误 (${response.status})，请稍后重试`;
      }

      throw new ControlPlaneError('execution', `${errorMessage} - ${errorText.slice(0, 500)}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (parseError) {
      throw new ControlPlaneError('protocol', 'Failed to parse API response: invalid JSON', { cause: parseError });
    }

    const parsed = completionSchema.safeParse(body);
    if (!parsed.success) {
      throw new ControlPlaneError('protocol', `Unexpected API response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }

    const content = parsed.data.choices[0].message.content ?? '';
    if (!content) {
      throw new ControlPlaneError('protocol', 'Empty response from model: no content in choices');
    }

    const usage = parsed.data.usage;
    return {
      thinking: extractThinking(content),
      action: extractActionText(content),
      content,
      inputTokens: usage?.prompt_tokens ?? this.estimateTokens(SYSTEM_PROMPT + userText),
      outputTokens: usage?.completion_tokens ?? this.estimateTokens(content),
    };
  }

  /**
   * 估算Token数（API未返回usage时兜底）
   */
  private estimateTokens(text: string): number {
    return Math.ceil(text.length / 4);
  }
}
