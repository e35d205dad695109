import { Deadline } from './deadline';
import { ExtractionTimeoutError } from '../outline/errors/outline-errors';

describe('Deadline', () => {
  it('passes while inside the budget', () => {
    let clock = 1000;
    const deadline = new Deadline(50, () => clock);

    clock = 1050;
    expect(() => deadline.check()).not.toThrow();
    expect(deadline.elapsedMs).toBe(50);
  });

  it('throws a non-retryable timeout once exceeded', () => {
    let clock = 0;
    const deadline = new Deadline(50, () => clock);
    clock = 80;

    let caught: unknown;
    try {
      deadline.check();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ExtractionTimeoutError);
    expect(caught).toMatchObject({
      code: 'OUTLINE_TIMEOUT',
      retryable: false,
      elapsedMs: 80,
      budgetMs: 50,
    });
  });

  it('never expires when unlimited', () => {
    expect(() => Deadline.unlimited().check()).not.toThrow();
  });
});
