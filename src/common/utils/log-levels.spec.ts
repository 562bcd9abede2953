import { resolveLogLevels } from './log-levels';

describe('resolveLogLevels', () => {
  it('should map info to error, warn and log', () => {
    expect(resolveLogLevels('info')).toEqual(['error', 'warn', 'log']);
  });

  it('should include everything up to the requested level', () => {
    expect(resolveLogLevels('error')).toEqual(['error']);
    expect(resolveLogLevels('DEBUG')).toEqual(['error', 'warn', 'log', 'debug']);
    expect(resolveLogLevels('verbose')).toEqual(['error', 'warn', 'log', 'debug', 'verbose']);
  });

  it('should default to info', () => {
    expect(resolveLogLevels(undefined)).toEqual(['error', 'warn', 'log']);
    expect(resolveLogLevels('chatty')).toEqual(['error', 'warn', 'log']);
  });
});
