import { errors } from 'playwright';
import { describe, expect, it } from 'vitest';
import { describeError, isTimeoutError, UIInteractionError } from '../errors';

describe('UIInteractionError', () => {
  it('names a Playwright timeout as such', () => {
    const error = new UIInteractionError('click "button.next"', new errors.TimeoutError('Timeout 3000ms exceeded.'));

    expect(error.message).toBe('click "button.next" timed out: Timeout 3000ms exceeded.');
    expect(error.timedOut).toBe(true);
    expect(isTimeoutError(error)).toBe(true);
    expect(isTimeoutError(error.cause)).toBe(true);
  });

  it('reports other failures plainly', () => {
    const error = new UIInteractionError('fill "#email"', new Error('Element is not an <input>'));

    expect(error.message).toBe('fill "#email" failed: Element is not an <input>');
    expect(isTimeoutError(error)).toBe(false);
    expect(isTimeoutError(new Error('Timeout 3000ms exceeded.'))).toBe(false);
  });
});

describe('describeError', () => {
  it('renders any thrown value', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError({ code: 7 })).toBe('{"code":7}');
  });
});
