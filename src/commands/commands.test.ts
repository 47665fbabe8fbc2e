import { describe, it, expect } from 'vitest';
import { executeColor } from './color';
import { executeGuess } from './guess';
import { executeName } from './name';
import { ANIMALS, executeSafari } from './safari';
import { CLEAR_SEQUENCE, NAVIGATION_PROMPT, createMemoryTerminal } from '../cli';
import { ConfigurationError } from '../utils/errors';

describe('executeGuess', () => {
  it('should give hints until the secret number is found', async () => {
    // secret = 1 + floor(0.5 * 100) = 51
    const terminal = createMemoryTerminal(['50', '70', '51']);

    const guesses = await executeGuess({ clear: false }, terminal, () => 0.5);

    expect(guesses).toBe(3);
    expect(terminal.output).toEqual([
      'Pick a number between 1 and 100!',
      '50 is too low!',
      'Pick a number between 1 and 100!',
      '70 is too high!',
      'Pick a number between 1 and 100!',
      'YOU WIN!',
      '51 was the secret number!',
      'Number of guesses: 3',
    ]);
  });

  it('should clear the screen before the game and after each guess', async () => {
    const terminal = createMemoryTerminal(['3']);

    await executeGuess({ min: 3, max: 3 }, terminal, () => 0);

    expect(terminal.output).toEqual([
      CLEAR_SEQUENCE,
      'Pick a number between 3 and 3!',
      CLEAR_SEQUENCE,
      'YOU WIN!',
      '3 was the secret number!',
      'Number of guesses: 1',
    ]);
  });

  it('should refuse an empty range', async () => {
    const terminal = createMemoryTerminal([]);

    await expect(executeGuess({ min: 10, max: 1 }, terminal)).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('executeColor', () => {
  it('should accept a color in any case', async () => {
    const terminal = createMemoryTerminal(['Teal', 'purple']);

    const color = await executeColor({ clear: false }, terminal);

    expect(color).toBe('purple');
    expect(terminal.output).toEqual([
      'Enter your favorite color!',
      'Your input (Teal) is not a valid choice. (Case Sensitive: false)',
      "That isn't a color!",
      'Your favorite color is purple!',
    ]);
  });
});

describe('executeSafari', () => {
  it('should show the first page of animals', async () => {
    const terminal = createMemoryTerminal(['e']);

    await executeSafari({ perPage: 5, clear: false }, terminal);

    expect(terminal.output).toEqual([
      'Animals seen on the Super Cool Safari:',
      ...ANIMALS.slice(0, 5),
      '(Page 1 of 3)',
      NAVIGATION_PROMPT,
    ]);
  });
});

describe('executeName', () => {
  it('should greet the user', async () => {
    const terminal = createMemoryTerminal(['Ada']);

    const name = await executeName({}, terminal);

    expect(name).toBe('Ada');
    expect(terminal.output).toEqual(['Enter your name:', 'Hello, Ada!']);
  });
});
