import { describe, it, expect, vi, beforeEach } from 'vitest';

const log = vi.hoisted(() => ({
  trace: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock('../utils/logger', () => {
  const contextLogger = { ...log, child: () => contextLogger };
  return {
    logger: contextLogger,
    createContextLogger: () => contextLogger,
  };
});

import { getNumber, selectNumberFromChoices, selectStringFromChoices } from './prompt';
import { paginatedList } from './pagination';
import { createMemoryTerminal } from './terminal';
import { ConfigurationError, InputStreamError } from '../utils/errors';

describe('fatal error logging', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should log an empty string choice set before throwing', async () => {
    const terminal = createMemoryTerminal([]);

    await expect(selectStringFromChoices({ choices: [] }, terminal)).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(log.error).toHaveBeenCalledTimes(1);
    expect(log.error).toHaveBeenCalledWith(
      'Refusing to prompt: unsatisfiable configuration',
      { kind: 'string', choices: 0 },
      expect.any(ConfigurationError)
    );
  });

  it('should log an empty number choice set before throwing', async () => {
    const terminal = createMemoryTerminal([]);

    await expect(selectNumberFromChoices({ choices: [] }, terminal)).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(log.error).toHaveBeenCalledWith(
      'Refusing to prompt: unsatisfiable configuration',
      { kind: 'number', choices: 0 },
      expect.any(ConfigurationError)
    );
  });

  it('should log inverted bounds before throwing', async () => {
    const terminal = createMemoryTerminal([]);

    await expect(getNumber({ min: 10, max: 1 }, terminal)).rejects.toBeInstanceOf(ConfigurationError);
    expect(log.error).toHaveBeenCalledWith(
      'Refusing to prompt: unsatisfiable configuration',
      { min: 10, max: 1 },
      expect.any(ConfigurationError)
    );
  });

  it('should log a bad page size before throwing', async () => {
    const terminal = createMemoryTerminal([]);

    await expect(paginatedList({ items: [1], itemsPerPage: 0 }, terminal)).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(log.error).toHaveBeenCalledWith(
      'Refusing to paginate: unsatisfiable configuration',
      { itemsPerPage: 0 },
      expect.any(ConfigurationError)
    );
  });

  it('should report end of input only at debug level', async () => {
    const terminal = createMemoryTerminal([]);

    await expect(getNumber({}, terminal)).rejects.toBeInstanceOf(InputStreamError);
    expect(log.error).not.toHaveBeenCalled();
    expect(log.debug).toHaveBeenCalledWith('Aborting prompt: input could not be read', {
      error: 'Input stream ended before a valid value was entered.',
    });
  });
});
