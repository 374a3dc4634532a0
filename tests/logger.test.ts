import { createLogger, silentLogger } from '../src/logger';

const clock = (): Date => new Date('2024-03-05T14:07:30.000Z');

describe('createLogger', () => {
  it('formats lines with time, name and level', () => {
    const lines: string[] = [];
    const logger = createLogger('test', 'debug', (line) => lines.push(line), clock);

    logger.info('Saved %s notes', 3);

    expect(lines).toEqual(['2024-03-05T14:07:30.000Z - test - INFO - Saved 3 notes']);
  });

  it('drops lines below the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger('test', 'warn', (line) => lines.push(line), clock);

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(lines).toEqual([
      '2024-03-05T14:07:30.000Z - test - WARN - shown',
      '2024-03-05T14:07:30.000Z - test - ERROR - shown too',
    ]);
  });

  it('defaults to warn', () => {
    const lines: string[] = [];
    const logger = createLogger('test', undefined, (line) => lines.push(line), clock);
    logger.info('hidden');
    expect(lines).toEqual([]);
  });
});

describe('silentLogger', () => {
  it('accepts calls without output', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    silentLogger.error('nothing %s', 'here');
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });
});
