import { describe, expect, it } from 'vitest';
import type { Action } from '@phonepilot/protocol';
import {
  DEFAULT_TAKEOVER_MESSAGE,
  EMPTY_ACTION_MESSAGE,
  extractActionText,
  extractThinking,
  findMatchingParen,
  parseAction,
  parseCoordinates,
  parseDuration,
  serializeAction,
  splitTopLevel,
} from '../src/action-parser';

function parsed(raw: string): Action {
  const result = parseAction(raw);
  if (!result.ok) {
    throw new Error(`expected ${raw} to parse: ${result.error}`);
  }
  return result.action;
}

describe('findMatchingParen', () => {
  it('ignores parentheses inside quotes', () => {
    expect(findMatchingParen('do(a, b="x)")', 2)).toBe(12);
  });

  it('tracks nesting', () => {
    expect(findMatchingParen('f(g(1), 2) tail', 1)).toBe(9);
  });

  it('returns -1 when unbalanced', () => {
    expect(findMatchingParen('do(a', 2)).toBe(-1);
  });
});

describe('splitTopLevel', () => {
  it('keeps bracketed and quoted commas together', () => {
    expect(splitTopLevel('swipe, start=[1, 2], text="a, b"')).toEqual(['swipe', 'start=[1, 2]', 'text="a, b"']);
  });

  it('drops empty segments', () => {
    expect(splitTopLevel(' a , , b ')).toEqual(['a', 'b']);
  });
});

describe('parseCoordinates / parseDuration', () => {
  it('accepts brackets, parentheses and bare pairs', () => {
    expect(parseCoordinates('[500, 300]')).toEqual([500, 300]);
    expect(parseCoordinates('(10,20)')).toEqual([10, 20]);
    expect(parseCoordinates('7,8')).toEqual([7, 8]);
  });

  it('rejects fewer than two numbers', () => {
    expect(parseCoordinates('[5]')).toBeNull();
    expect(parseCoordinates('')).toBeNull();
    expect(parseCoordinates(undefined)).toBeNull();
  });

  it('converts units to milliseconds', () => {
    expect(parseDuration('"2 seconds"', 'ms')).toBe(2000);
    expect(parseDuration('500ms', 's')).toBe(500);
    expect(parseDuration('1.5s', 'ms')).toBe(1500);
    expect(parseDuration('3', 's')).toBe(3000);
    expect(parseDuration('3', 'ms')).toBe(3);
    expect(parseDuration('soon', 'ms')).toBeNull();
  });
});

describe('parseAction', () => {
  it('keeps parentheses inside quoted text', () => {
    expect(parsed('do(type, text="close (it)")')).toEqual({ kind: 'type', text: 'close (it)' });
  });

  it('parses a swipe with an explicit duration', () => {
    expect(parsed('do(swipe, start=[100,800], end=[100,200], duration=400)')).toEqual({
      kind: 'swipe',
      x1: 100,
      y1: 800,
      x2: 100,
      y2: 200,
      durationMs: 400,
    });
  });

  it('defaults the swipe duration', () => {
    expect(parsed('do(scroll, start=[1,2], end=[3,4])')).toEqual({
      kind: 'swipe',
      x1: 1,
      y1: 2,
      x2: 3,
      y2: 4,
      durationMs: 300,
    });
  });

  it('accepts the action= form and mixed case names', () => {
    expect(parsed('do(action="Tap", element=[500,300])')).toEqual({ kind: 'tap', x: 500, y: 300 });
  });

  it('accepts bare coordinate pairs', () => {
    expect(parsed('do(tap, element=500,300)')).toEqual({ kind: 'tap', x: 500, y: 300 });
    expect(parsed('do(swipe, start=1,2, end=3,4)')).toEqual({
      kind: 'swipe',
      x1: 1,
      y1: 2,
      x2: 3,
      y2: 4,
      durationMs: 300,
    });
  });

  it('maps synonyms', () => {
    expect(parsed('do(click, element=[1,2])')).toEqual({ kind: 'tap', x: 1, y: 2 });
    expect(parsed('do(longpress, element=[1,2])')).toEqual({ kind: 'long_press', x: 1, y: 2 });
    expect(parsed('do(open_app, app="微信")')).toEqual({ kind: 'launch', app: '微信' });
    expect(parsed('do(input, text="hi")')).toEqual({ kind: 'type', text: 'hi' });
  });

  it('parses the bare call form', () => {
    expect(parsed('tap(100, 200)')).toEqual({ kind: 'tap', x: 100, y: 200 });
    expect(parsed('swipe(100, 800, 100, 200, 400)')).toEqual({
      kind: 'swipe',
      x1: 100,
      y1: 800,
      x2: 100,
      y2: 200,
      durationMs: 400,
    });
    expect(parsed('type("hello, world")')).toEqual({ kind: 'type', text: 'hello, world' });
    expect(parsed('take_over()')).toEqual({ kind: 'take_over', message: DEFAULT_TAKEOVER_MESSAGE });
  });

  it('reads wait durations in seconds for do() and milliseconds for bare calls', () => {
    expect(parsed('do(wait, duration="2 seconds")')).toEqual({ kind: 'wait', durationMs: 2000 });
    expect(parsed('do(wait, duration=3)')).toEqual({ kind: 'wait', durationMs: 3000 });
    expect(parsed('wait(1500)')).toEqual({ kind: 'wait', durationMs: 1500 });
    expect(parsed('do(wait)')).toEqual({ kind: 'wait', durationMs: 1000 });
  });

  it('parses finish in both forms', () => {
    expect(parsed('finish(message="All done")')).toEqual({ kind: 'finish', message: 'All done' });
    expect(parsed('finish("done, thanks")')).toEqual({ kind: 'finish', message: 'done, thanks' });
  });

  it('starts from the first do( or finish( in surrounding prose', () => {
    expect(parsed('Next I go back. do(back)')).toEqual({ kind: 'back' });
  });

  it('keeps do( and finish( inside quoted arguments of a bare call', () => {
    expect(parsed('type("please do(this) now")')).toEqual({ kind: 'type', text: 'please do(this) now' });
    expect(parsed('take_over("log in, then finish(setup)")')).toEqual({
      kind: 'take_over',
      message: 'log in, then finish(setup)',
    });
  });

  it('treats empty input as completion', () => {
    expect(parsed('   ')).toEqual({ kind: 'finish', message: EMPTY_ACTION_MESSAGE });
  });

  it('keeps unknown names with their raw text', () => {
    expect(parsed('do(fly, to="moon")')).toEqual({ kind: 'unknown', name: 'fly', raw: 'do(fly, to="moon")' });
  });

  it('attaches a confirmation prompt to sensitive actions', () => {
    expect(parsed('do(tap, element=[10,20], sensitive=true, message="Pay 5 yuan")')).toEqual({
      kind: 'tap',
      x: 10,
      y: 20,
      confirmation: 'Pay 5 yuan',
    });
    expect(parsed('do(tap, element=[10,20], sensitive=true)')).toEqual({ kind: 'tap', x: 10, y: 20 });
  });

  it('recovers from an unterminated quote', () => {
    expect(parsed("do(type, text=it's fine)")).toEqual({ kind: 'type', text: "it's fine" });
  });

  it('returns frozen actions', () => {
    expect(Object.isFrozen(parsed('do(home)'))).toBe(true);
  });

  it('reports missing coordinates and app names', () => {
    expect(parseAction('do(tap)')).toEqual({ ok: false, error: 'No element coordinates for tap', raw: 'do(tap)' });
    expect(parseAction('do(swipe, start=[1,2])')).toMatchObject({ ok: false, error: 'Missing swipe coordinates' });
    expect(parseAction('do(launch)')).toMatchObject({ ok: false, error: 'No app name specified' });
    expect(parseAction('do()')).toMatchObject({ ok: false, error: 'Missing action name' });
  });

  it('rejects text with no call at all', () => {
    expect(parseAction('hello world')).toEqual({ ok: false, error: 'Unrecognized action format', raw: 'hello world' });
  });
});

describe('serializeAction', () => {
  it('writes the canonical form', () => {
    expect(serializeAction({ kind: 'tap', x: 1, y: 2 })).toBe('do(tap, element=[1,2])');
    expect(serializeAction({ kind: 'wait', durationMs: 2000 })).toBe('do(wait, duration="2 seconds")');
    expect(serializeAction({ kind: 'wait', durationMs: 250 })).toBe('do(wait, duration="250 ms")');
    expect(serializeAction({ kind: 'type', text: 'say "hi"' })).toBe('do(type, text="say \\"hi\\"")');
    expect(serializeAction({ kind: 'unknown', name: 'fly', raw: 'do(fly)' })).toBe('do(fly)');
  });

  it('parses back to the same action', () => {
    const actions: Action[] = [
      { kind: 'launch', app: '微信' },
      { kind: 'tap', x: 500, y: 300 },
      { kind: 'double_tap', x: 5, y: 6 },
      { kind: 'long_press', x: 7, y: 8 },
      { kind: 'type', text: 'say "hi" \\ ok' },
      { kind: 'swipe', x1: 100, y1: 800, x2: 100, y2: 200, durationMs: 400 },
      { kind: 'back' },
      { kind: 'home' },
      { kind: 'wait', durationMs: 2000 },
      { kind: 'wait', durationMs: 1500 },
      { kind: 'take_over', message: 'Log in please' },
      { kind: 'finish', message: 'done, thanks' },
      { kind: 'tap', x: 1, y: 2, confirmation: 'Pay' },
    ];

    for (const action of actions) {
      expect(parsed(serializeAction(action))).toEqual(action);
    }
  });
});

describe('extractActionText / extractThinking', () => {
  it('prefers the action tag', () => {
    const content = '<think>look</think><action>do(back)</action>';
    expect(extractActionText(content)).toBe('do(back)');
    expect(extractThinking(content)).toBe('look');
  });

  it('takes the last call outside the thinking block', () => {
    expect(extractActionText('I will tap. do(tap, element=[1,2])')).toBe('do(tap, element=[1,2])');
    expect(extractActionText('<think>maybe do(home)</think> finish("ok")')).toBe('finish("ok")');
  });

  it('falls back to the trimmed text', () => {
    expect(extractActionText('  nothing  ')).toBe('nothing');
    expect(extractThinking('nothing')).toBe('');
  });
});
