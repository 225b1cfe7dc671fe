import { DEFAULT_OLD_RUNTIMES, isLogLevel, parseRuntimeList } from '../src/config.js';

describe('parseRuntimeList', () => {
  it('should split, trim and drop empty entries', () => {
    expect(parseRuntimeList(' python3.6, python3.7 ,,python2.7,')).toEqual(['python3.6', 'python3.7', 'python2.7']);
  });

  it('should return an empty list when nothing is named', () => {
    expect(parseRuntimeList(' , ')).toEqual([]);
  });

  it('should round-trip the default runtimes', () => {
    expect(parseRuntimeList(DEFAULT_OLD_RUNTIMES.join(','))).toEqual([
      'python3.9',
      'python3.8',
      'python3.7',
      'python3.6',
      'python2.7',
    ]);
  });
});

describe('isLogLevel', () => {
  it('should accept the upper-case level names only', () => {
    expect(isLogLevel('WARNING')).toBe(true);
    expect(isLogLevel('CRITICAL')).toBe(true);
    expect(isLogLevel('warning')).toBe(false);
    expect(isLogLevel('WARN')).toBe(false);
  });
});
