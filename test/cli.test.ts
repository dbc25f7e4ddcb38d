import { describe, expect, it } from 'vitest';
import { main } from '../src/cli/main.js';
import type { CliIO } from '../src/cli/main.js';
import { parseCliArgs, resolvePort, USAGE } from '../src/cli/options.js';
import { ConfigError } from '../src/errors.js';
import { ampDefinition, bundledDefinition, FIXTURE_DEFINITIONS_DIR } from './helpers/definitions.js';

function captureIO(): CliIO & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return { stdout, stderr, out: text => stdout.push(text), err: text => stderr.push(text) };
}

describe('parseCliArgs', () => {
  it('applies defaults', () => {
    expect(parseCliArgs([])).toEqual({
      model: null,
      port: null,
      host: '0.0.0.0',
      supported: false,
      definitions: null,
      outOfRange: 'reject',
      idleTimeout: 300_000,
      logLevel: 'info',
      help: false,
    });
  });

  it('reads flags', () => {
    const options = parseCliArgs([
      '--model',
      'mcintosh_mx160',
      '--port',
      '5000',
      '--host',
      '127.0.0.1',
      '--out-of-range',
      'clamp',
      '--idle-timeout',
      '30',
      '-d',
    ]);
    expect(options).toMatchObject({
      model: 'mcintosh_mx160',
      port: 5000,
      host: '127.0.0.1',
      outOfRange: 'clamp',
      idleTimeout: 30_000,
      logLevel: 'debug',
    });
  });

  it('lets quiet win over debug', () => {
    expect(parseCliArgs(['-q', '-d']).logLevel).toBe('warn');
  });

  it('rejects malformed values and unknown flags', () => {
    expect(() => parseCliArgs(['--port', 'abc'])).toThrow("--port must be an integer, got 'abc'");
    expect(() => parseCliArgs(['--port', '70000'])).toThrow('--port must be between 0 and 65535, got 70000');
    expect(() => parseCliArgs(['--out-of-range', 'wrap'])).toThrow(
      "--out-of-range must be reject or clamp, got 'wrap'"
    );
    expect(() => parseCliArgs(['--bogus'])).toThrow(ConfigError);
  });
});

describe('resolvePort', () => {
  it('prefers the explicit port, then the device default', () => {
    const mx160 = bundledDefinition('mcintosh/mx160');
    expect(resolvePort(5000, mx160)).toBe(5000);
    expect(resolvePort(null, mx160)).toBe(84);
    expect(resolvePort(null, ampDefinition())).toBe(4999);
  });
});

describe('main', () => {
  it('prints usage on --help', async () => {
    const io = captureIO();
    expect(await main(['--help'], io)).toBe(0);
    expect(io.stdout).toEqual([USAGE]);
  });

  it('lists supported models in both spellings', async () => {
    const io = captureIO();
    expect(await main(['--supported', '--definitions', FIXTURE_DEFINITIONS_DIR], io)).toBe(0);
    expect(io.stdout[0]).toBe('\nModels supported by avemu:\n');
    expect(io.stdout[1]).toContain('acme/amp1');
    expect(io.stdout[1]).toContain('acme_amp1');
  });

  it('fails without a model', async () => {
    const io = captureIO();
    expect(await main([], io)).toBe(1);
    expect(io.stderr[0]).toBe('Error: --model is required unless using --supported\n');
  });

  it('fails for an unknown model', async () => {
    const io = captureIO();
    expect(await main(['--model', 'acme/nothing', '--definitions', FIXTURE_DEFINITIONS_DIR], io)).toBe(1);
    expect(io.stderr[0]).toBe("\nError: Could not load model 'acme/nothing'");
  });

  it('fails for an invalid flag', async () => {
    const io = captureIO();
    expect(await main(['--port', 'x'], io)).toBe(1);
    expect(io.stderr[0]).toBe("Error: --port must be an integer, got 'x'\n");
  });
});
