import { Logger } from '../src/Logger';

describe('The Logger', () => {

  afterEach(() => {
    Logger.configure(null);
  });

  it('caches one child logger per area', () => {
    expect(Logger.getLogger('store')).toBe(Logger.getLogger('store'));
    expect(Logger.getLogger('store')).not.toBe(Logger.getLogger('parser'));
  });

  it('rebuilds the loggers with the configured level', () => {
    const before = Logger.getLogger('store');
    Logger.configure('warn');
    const after = Logger.getLogger('store');
    expect(after).not.toBe(before);
    expect(after.level()).toBe(40);
    expect(Logger.getLogger('main').level()).toBe(40);
  });
});
