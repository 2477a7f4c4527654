import { parseCli } from '../cli';
import { ConfigError } from '../core/errors';

describe('CLI arguments', () => {
  it('runs one interactive cycle by default', () => {
    expect(parseCli([])).toEqual({ listen: false, help: false });
  });

  it('accepts the short and long listen flags', () => {
    expect(parseCli(['-l']).listen).toBe(true);
    expect(parseCli(['--listen']).listen).toBe(true);
  });

  it('takes a config path', () => {
    expect(parseCli(['--config', '/etc/screenswitch.json', '--listen'])).toEqual({
      listen: true,
      help: false,
      configPath: '/etc/screenswitch.json'
    });
    expect(parseCli(['-c', 'local.json']).configPath).toBe('local.json');
  });

  it('rejects a config flag without a path', () => {
    expect(() => parseCli(['--config'])).toThrow(new ConfigError('--config needs a path'));
  });

  it('rejects unknown arguments', () => {
    expect(() => parseCli(['--dry-run'])).toThrow('Unknown argument: --dry-run');
  });

  it('recognises help', () => {
    expect(parseCli(['-h']).help).toBe(true);
  });
});
