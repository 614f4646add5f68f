import { describe, it, expect } from 'vitest';
import { MessageLevel } from '../types/enums';
import { MessageLog } from './log';

describe('MessageLog', () => {
  it('keeps the newest messages first up to capacity', () => {
    let clock = 0;
    const log = new MessageLog(2, () => ++clock);
    log.push('one');
    log.push('two');
    log.warn('three');
    expect(log.all()).toEqual([
      { text: 'three', level: MessageLevel.Warn, t: 3 },
      { text: 'two', level: MessageLevel.Info, t: 2 }
    ]);
    expect(log.latest()?.text).toBe('three');
  });

  it('holds at least one message', () => {
    const log = new MessageLog(0);
    log.push('a');
    log.push('b');
    expect(log.all().map((m) => m.text)).toEqual(['b']);
  });

  it('clears', () => {
    const log = new MessageLog(5);
    log.push('a');
    log.clear();
    expect(log.latest()).toBeUndefined();
    expect(log.all()).toEqual([]);
  });
});
