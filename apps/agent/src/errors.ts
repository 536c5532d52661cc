/**
 * 控制面错误分类
 * 公共操作不向外抛出，错误以结果值（ActionResult.errorKind 等）返回
 */
export type ErrorKind =
  | 'parse'               // 动作文本格式错误，非致命
  | 'connection'          // 通道未连接或连接超时，非致命
  | 'protocol'            // 无法识别的响应行，仅记录
  | 'decode'              // 解码提交失败，内部自动恢复
  | 'confirmation_denied' // 用户拒绝敏感操作，终止任务
  | 'cancelled'           // 等待/接管期间被取消
  | 'execution';          // 执行器失败

export class ControlPlaneError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ControlPlaneError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
