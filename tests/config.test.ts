import config, { parseLogLevel } from '../src/config';

describe('config', () => {
  it('should read the environment set up for tests', () => {
    expect(config.env).toBe('test');
    expect(config.logLevel).toBe('debug');
  });

  describe('parseLogLevel', () => {
    it('should accept winston npm levels regardless of case', () => {
      expect(parseLogLevel('warn')).toBe('warn');
      expect(parseLogLevel(' DEBUG ')).toBe('debug');
    });

    it('should fall back to info', () => {
      expect(parseLogLevel(undefined)).toBe('info');
      expect(parseLogLevel('loud')).toBe('info');
    });
  });
});
