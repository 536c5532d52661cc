import type { Action, ActionKind } from '@phonepilot/protocol';
import { logger as rootLogger } from './logger';

const logger = rootLogger.withTag('ActionParser');

export const EMPTY_ACTION_MESSAGE = 'Completed with no action';
export const DEFAULT_TAKEOVER_MESSAGE = 'Please finish the current operation, then continue';
const DEFAULT_SWIPE_DURATION_MS = 300;
const DEFAULT_WAIT_MS = 1000;

/**
 * 解析中间态：构造后立即用于生成 Action，随后丢弃
 */
export interface ParsedCommandLine {
  name: string;
  args: string[];
  params: Record<string, string>;
  sensitive: boolean;
  matched: string;
  /** 括号内的原始内容 */
  body: string;
}

export type ParseResult =
  | { ok: true; action: Action }
  | { ok: false; error: string; raw: string };

type CallStyle = 'do' | 'bare';

const COORDINATE_KEYS: ReadonlySet<string> = new Set(['element', 'point', 'start', 'end']);
const NUMBER = /^-?\d+(\.\d+)?$/;

// 动作名（小写）→ 动作类型，含同义词
const ACTION_NAMES: Record<string, ActionKind> = {
  launch: 'launch',
  open_app: 'launch',
  tap: 'tap',
  click: 'tap',
  double_tap: 'double_tap',
  doubletap: 'double_tap',
  long_press: 'long_press',
  longpress: 'long_press',
  type: 'type',
  type_name: 'type',
  input: 'type',
  swipe: 'swipe',
  scroll: 'swipe',
  back: 'back',
  home: 'home',
  wait: 'wait',
  take_over: 'take_over',
  takeover: 'take_over',
  finish: 'finish',
  done: 'finish',
  note: 'note',
  call_api: 'call_api',
  callapi: 'call_api',
  interact: 'interact',
};

/**
 * 返回与 openIndex 处 '(' 匹配的 ')' 下标，引号内的括号不计入
 * 未找到返回 -1
 */
export function findMatchingParen(s: string, openIndex: number): number {
  let depth = 0;
  let quote: '"' | "'" | null = null;

  for (let i = openIndex + 1; i < s.length; i++) {
    const c = s[i];

    if (quote) {
      if (c === '\\') {
        i++;
      } else if (c === quote) {
        quote = null;
      }
      continue;
    }

    if (c === '"' || c === "'") {
      quote = c;
    } else if (c === '(') {
      depth++;
    } else if (c === ')') {
      if (depth === 0) return i;
      depth--;
    }
  }

  return -1;
}

/**
 * 在顶层逗号处切分（忽略引号、方括号、圆括号内的逗号）
 */
export function splitTopLevel(s: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: '"' | "'" | null = null;
  let start = 0;

  for (let i = 0; i < s.length; i++) {
    const c = s[i];

    if (quote) {
      if (c === '\\') {
        i++;
      } else if (c === quote) {
        quote = null;
      }
      continue;
    }

    if (c === '"' || c === "'") {
      quote = c;
    } else if (c === '[' || c === '(' || c === '{') {
      depth++;
    } else if (c === ']' || c === ')' || c === '}') {
      depth = Math.max(0, depth - 1);
    } else if (c === ',' && depth === 0) {
      parts.push(s.slice(start, i));
      start = i + 1;
    }
  }

  parts.push(s.slice(start));
  return parts.map(part => part.trim()).filter(part => part.length > 0);
}

export function unquote(value: string): string {
  const v = value.trim();
  if (v.length >= 2) {
    const first = v[0];
    const last = v[v.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return v.slice(1, -1).replace(/\\(["'\\])/g, '$1');
    }
  }
  return v;
}

/**
 * 解析坐标：[x, y] / (x, y) / x,y
 * 数量不足两个时返回 null
 */
export function parseCoordinates(value: string | undefined): number[] | null {
  if (value === undefined || value.trim() === '') return null;

  const cleaned = unquote(value).replace(/^[[(]\s*/, '').replace(/\s*[\])]$/, '');
  const coords = cleaned
    .split(',')
    .map(part => part.trim())
    .filter(part => part !== '')
    .map(part => Number(part))
    .filter(n => Number.isFinite(n));

  return coords.length >= 2 ? coords : null;
}

/**
 * 解析时长为毫秒，"2 seconds" / "500ms" / "1.5s" / "3"
 * 无单位时按 defaultUnit 解释
 */
export function parseDuration(value: string | undefined, defaultUnit: 'ms' | 's'): number | null {
  if (value === undefined) return null;
  const match = unquote(value).match(/(\d+(?:\.\d+)?)\s*(ms|milliseconds?|s|secs?|seconds?)?/i);
  if (!match) return null;

  const amount = Number(match[1]);
  const unit = match[2]?.toLowerCase();
  const isMs = unit ? unit.startsWith('m') : defaultUnit === 'ms';
  return Math.round(isMs ? amount : amount * 1000);
}

function isTruthy(value: string | undefined): boolean {
  if (value === undefined) return false;
  return ['true', '1', 'yes'].includes(unquote(value).toLowerCase());
}

function buildCommandLine(name: string, body: string, matched: string): ParsedCommandLine {
  const args: string[] = [];
  const params: Record<string, string> = {};
  let lastKey: string | null = null;

  for (const segment of splitTopLevel(body)) {
    const kv = segment.match(/^(\w+)\s*=\s*([\s\S]*)$/);
    if (kv) {
      lastKey = kv[1].toLowerCase();
      params[lastKey] = unquote(kv[2]);
    } else if (lastKey && COORDINATE_KEYS.has(lastKey) && NUMBER.test(segment) && NUMBER.test(params[lastKey])) {
      // element=500,300 这种不带括号的坐标
      params[lastKey] = `${params[lastKey]},${segment}`;
      lastKey = null;
    } else {
      lastKey = null;
      args.push(unquote(segment));
    }
  }

  return {
    name,
    args,
    params,
    sensitive: isTruthy(params.sensitive),
    matched,
    body,
  };
}

/**
 * 提取 s 中从 openIndex 开始的调用内容
 * 找不到匹配括号时退化为截取到最后一个 ')'
 */
function extractCall(s: string, openIndex: number): { content: string; matched: string } {
  let end = findMatchingParen(s, openIndex);
  if (end === -1) {
    const lastClose = s.lastIndexOf(')');
    end = lastClose > openIndex ? lastClose : s.length;
    logger.debug('No matching parenthesis, using best-effort content', { input: s });
  }
  return {
    content: s.slice(openIndex + 1, end),
    matched: s.slice(0, Math.min(end + 1, s.length)),
  };
}

function ok(action: Action): ParseResult {
  return { ok: true, action: Object.freeze(action) };
}

function fail(error: string, raw: string): ParseResult {
  logger.warn('Action parse failed', { error, raw });
  return { ok: false, error, raw };
}

/**
 * 解析模型输出的动作字符串
 *
 * 支持格式：
 * - do(action_name, key=value, ...)，也兼容 do(action="Tap", ...)
 * - finish("message") / finish(message="...")
 * - tap(100, 200) 等直接调用形式
 */
export function parseAction(raw: string): ParseResult {
  let trimmed = raw.trim();

  // 空输入视为完成，避免循环卡死
  if (trimmed === '') {
    return ok({ kind: 'finish', message: EMPTY_ACTION_MESSAGE });
  }

  // 已经以调用开头时直接解析，引号内的 do( / finish( 不作为起点
  const leadingCall = /^(?:(?:do|finish)\s*\(|[A-Za-z_]\w*\()/i.test(trimmed);
  if (!leadingCall) {
    const wrapper = trimmed.search(/\b(do|finish)\s*\(/i);
    if (wrapper > 0) {
      trimmed = trimmed.slice(wrapper);
    }
  }

  const finishMatch = trimmed.match(/^finish\s*\(/i);
  if (finishMatch) {
    const { content } = extractCall(trimmed, finishMatch[0].length - 1);
    const message = unquote(content.trim().replace(/^message\s*=\s*/i, ''));
    return ok({ kind: 'finish', message });
  }

  const doMatch = trimmed.match(/^do\s*\(/i);
  if (doMatch) {
    const { content, matched } = extractCall(trimmed, doMatch[0].length - 1);
    return parseDoContent(content, matched);
  }

  return parseDirectCall(trimmed);
}

function parseDoContent(content: string, matched: string): ParseResult {
  const firstComma = splitTopLevel(content)[0] ?? '';
  const rest = content.slice(content.indexOf(firstComma) + firstComma.length).replace(/^\s*,/, '');
  const name = unquote(firstComma.replace(/^action\s*=\s*/i, ''));

  if (name === '') {
    return fail('Missing action name', matched);
  }

  return buildAction(buildCommandLine(name, rest, matched), 'do');
}

function parseDirectCall(input: string): ParseResult {
  const match = input.match(/([A-Za-z_]\w*)\s*\(/);
  if (!match || match.index === undefined) {
    return fail('Unrecognized action format', input);
  }

  const openIndex = match.index + match[0].length - 1;
  const { content } = extractCall(input, openIndex);
  const matched = input.slice(match.index, Math.min(openIndex + content.length + 2, input.length));
  return buildAction(buildCommandLine(match[1], content, matched), 'bare');
}

function numbersFromArgs(args: string[]): number[] {
  return args
    .flatMap(arg => arg.replace(/[[\]()]/g, '').split(','))
    .map(part => part.trim())
    .filter(part => part !== '')
    .map(part => Number(part))
    .filter(n => Number.isFinite(n));
}

function textArgument(line: ParsedCommandLine): string {
  if (line.args.length === 1) return line.args[0];
  return unquote(line.body);
}

function buildAction(line: ParsedCommandLine, style: CallStyle): ParseResult {
  const kind = ACTION_NAMES[line.name.toLowerCase()];
  const { params, args } = line;
  const message = params.message;
  const confirmation = line.sensitive && message ? { confirmation: message } : {};

  if (!kind) {
    logger.warn('Unknown action name', { name: line.name });
    return ok({ kind: 'unknown', name: line.name, raw: line.matched, ...confirmation });
  }

  switch (kind) {
    case 'finish':
      return ok({ kind, message: message ?? (args.length > 0 ? textArgument(line) : ''), ...confirmation });

    case 'launch': {
      const app = params.app ?? params.package ?? (args.length > 0 ? textArgument(line) : '');
      if (app.trim() === '') {
        return fail('No app name specified', line.matched);
      }
      return ok({ kind, app: app.trim(), ...confirmation });
    }

    case 'tap':
    case 'double_tap':
    case 'long_press': {
      const coords = parseCoordinates(params.element ?? params.point) ?? numbersFromArgs(args);
      if (coords.length < 2) {
        return fail(`No element coordinates for ${kind}`, line.matched);
      }
      return ok({ kind, x: coords[0], y: coords[1], ...confirmation });
    }

    case 'type': {
      const text = params.text ?? params.content ?? (args.length > 0 ? textArgument(line) : '');
      return ok({ kind, text, ...confirmation });
    }

    case 'swipe': {
      let points: number[] | null = null;
      const start = parseCoordinates(params.start);
      const end = parseCoordinates(params.end);
      if (start && end) {
        points = [start[0], start[1], end[0], end[1]];
      } else {
        const numbers = numbersFromArgs(args);
        if (numbers.length >= 4) {
          points = numbers.slice(0, 4);
          if (numbers.length >= 5 && params.duration === undefined) {
            params.duration = String(numbers[4]);
          }
        }
      }
      if (!points) {
        return fail('Missing swipe coordinates', line.matched);
      }
      const durationMs = parseDuration(params.duration, 'ms') ?? DEFAULT_SWIPE_DURATION_MS;
      return ok({
        kind,
        x1: points[0],
        y1: points[1],
        x2: points[2],
        y2: points[3],
        durationMs,
        ...confirmation,
      });
    }

    case 'back':
    case 'home':
      return ok({ kind, ...confirmation });

    case 'wait': {
      // do(wait, duration="2") 按秒；wait(2000) 按毫秒
      const value = params.duration ?? args[0];
      const durationMs = parseDuration(value, style === 'do' ? 's' : 'ms') ?? DEFAULT_WAIT_MS;
      return ok({ kind, durationMs, ...confirmation });
    }

    case 'take_over':
      return ok({
        kind,
        message: message ?? (args.length > 0 ? textArgument(line) : DEFAULT_TAKEOVER_MESSAGE),
        ...confirmation,
      });

    case 'note':
      return ok({ kind, text: message ?? params.text ?? args.join(', '), ...confirmation });

    case 'call_api':
      return ok({ kind, instruction: params.instruction ?? message ?? args.join(', '), ...confirmation });

    case 'interact':
      return ok({ kind, text: message ?? args.join(', '), ...confirmation });

    case 'unknown':
      return ok({ kind, name: line.name, raw: line.matched, ...confirmation });
  }
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function formatWait(durationMs: number): string {
  return durationMs % 1000 === 0 ? `${durationMs / 1000} seconds` : `${durationMs} ms`;
}

/**
 * 序列化为标准 do(...) / finish(...) 形式
 */
export function serializeAction(action: Action): string {
  const sensitive = action.confirmation ? `, sensitive=true, message=${quote(action.confirmation)}` : '';

  switch (action.kind) {
    case 'finish':
      return `finish(${quote(action.message)})`;
    case 'launch':
      return `do(launch, app=${quote(action.app)}${sensitive})`;
    case 'tap':
    case 'double_tap':
    case 'long_press':
      return `do(${action.kind}, element=[${action.x},${action.y}]${sensitive})`;
    case 'type':
      return `do(type, text=${quote(action.text)}${sensitive})`;
    case 'swipe':
      return `do(swipe, start=[${action.x1},${action.y1}], end=[${action.x2},${action.y2}], duration=${action.durationMs}${sensitive})`;
    case 'back':
    case 'home':
      return `do(${action.kind}${sensitive})`;
    case 'wait':
      return `do(wait, duration=${quote(formatWait(action.durationMs))}${sensitive})`;
    case 'take_over':
      return `do(take_over, message=${quote(action.message)})`;
    case 'note':
      return `do(note, message=${quote(action.text)})`;
    case 'call_api':
      return `do(call_api, instruction=${quote(action.instruction)})`;
    case 'interact':
      return `do(interact, message=${quote(action.text)})`;
    case 'unknown':
      return action.raw;
  }
}

/**
 * 从模型回复中提取动作文本
 * 优先 <action> 标签，其次取最后一个 do(/finish( 调用
 */
export function extractActionText(content: string): string {
  const tagged = content.match(/<action>([\s\S]*?)<\/action>/i);
  if (tagged) {
    return tagged[1].trim();
  }

  const withoutThinking = content.replace(/<think>[\s\S]*?<\/think>/gi, '');
  const calls = [...withoutThinking.matchAll(/\b(do|finish)\s*\(/gi)];
  const last = calls[calls.length - 1];
  if (last && last.index !== undefined) {
    return withoutThinking.slice(last.index).trim();
  }

  return withoutThinking.trim();
}

/**
 * 从模型回复中提取思考过程
 */
export function extractThinking(content: string): string {
  const match = content.match(/<think>([\s\S]*?)<\/think>/i);
  return match ? match[1].trim() : '';
}
