import type { Logger } from 'pino';
import { configure, createLogger, decorator, getConfig, useLogger } from 'veneer';

function createMemoryDestination(): { destination: { write: (line: string) => void }; records: () => Array<Record<string, unknown>> } {
  const chunks: Array<string> = [];

  return {
    destination: {
      write: (line: string) => {
        chunks.push(line);
      }
    },
    records: () =>
      chunks
        .join('')
        .split('\n')
        .filter((line) => line.length > 0)
        .map((line): Record<string, unknown> => JSON.parse(line))
  };
}

describe('logger', () => {
  let previous: Logger | undefined;

  afterEach(() => {
    if (previous) {
      useLogger(previous);
      previous = undefined;
    }
  });

  test('is silent by default', () => {
    expect(createLogger().level).toBe('silent');
  });

  test('reports decorator creation and classification at debug level', () => {
    const { destination, records } = createMemoryDestination();

    previous = useLogger(createLogger('debug', destination));

    const traced = decorator(function traced(wrapped, _instance, args) {
      return wrapped(...args);
    });
    const add = traced(function add(a: number, b: number): number {
      return a + b;
    });

    expect(add(1, 2)).toBe(3);
    expect(records().map((record) => record.msg)).toEqual(['created decorator', 'classified wrap target']);
    expect(records()[0]).toMatchObject({ level: 20, name: 'veneer', wrapper: 'traced' });
    expect(records()[1]).toMatchObject({ level: 20, binding: 'function', target: 'add' });
  });

  test('reports every resolved binding at trace level', () => {
    const { destination, records } = createMemoryDestination();

    previous = useLogger(createLogger('trace', destination));

    const identity = decorator((wrapped, _instance, args) => wrapped(...args));
    const noop = identity(() => undefined);

    noop();

    expect(records().filter((record) => record.msg === 'resolved binding')).toEqual([
      expect.objectContaining({ level: 10, binding: 'function', bound: false })
    ]);
  });

  test('leaves the level of an installed logger alone until the next configure', () => {
    const next = createLogger('warn');

    previous = useLogger(next);

    expect(next.level).toBe('warn');
    expect(getConfig().logLevel).toBe('silent');

    configure({ logLevel: 'error' });

    expect(next.level).toBe('error');

    configure();
  });

  test('hands back the logger it replaces', () => {
    const first = createLogger();
    const second = createLogger();

    previous = useLogger(first);

    expect(useLogger(second)).toBe(first);
  });
});
