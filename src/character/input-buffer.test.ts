import { describe, test, expect } from 'vitest';
import { ageBuffer, consumeAction, hasAction, pushPresses } from './input-buffer';
import { ActionFlags } from '../core/input';
import type { BufferedAction } from '../components';

describe('character input buffer', () => {
  test('presses are queued in attack, dash, jump order', () => {
    const buffer: BufferedAction[] = [];
    pushPresses(buffer, ActionFlags.Jump | ActionFlags.Attack | ActionFlags.Dash);
    expect(buffer).toEqual([
      { action: ActionFlags.Attack, age: 0 },
      { action: ActionFlags.Dash, age: 0 },
      { action: ActionFlags.Jump, age: 0 }
    ]);
  });

  test('pressing a waiting action refreshes it', () => {
    const buffer: BufferedAction[] = [{ action: ActionFlags.Dash, age: 4 }, { action: ActionFlags.Jump, age: 2 }];
    pushPresses(buffer, ActionFlags.Dash);
    expect(buffer).toEqual([{ action: ActionFlags.Jump, age: 2 }, { action: ActionFlags.Dash, age: 0 }]);
  });

  test('entries expire once older than the window', () => {
    const buffer: BufferedAction[] = [{ action: ActionFlags.Attack, age: 14 }, { action: ActionFlags.Dash, age: 15 }];
    ageBuffer(buffer, 15);
    expect(buffer).toEqual([{ action: ActionFlags.Attack, age: 15 }]);
  });

  test('consume removes one waiting action', () => {
    const buffer: BufferedAction[] = [{ action: ActionFlags.Attack, age: 1 }];
    expect(hasAction(buffer, ActionFlags.Attack)).toBe(true);
    expect(consumeAction(buffer, ActionFlags.Attack)).toBe(true);
    expect(consumeAction(buffer, ActionFlags.Attack)).toBe(false);
    expect(buffer).toEqual([]);
  });
});
