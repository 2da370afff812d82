import path from 'path';
import { describe, expect, it } from 'vitest';
import { resolveConfig } from '../lib/config';
import { ConfigError } from '../lib/errors';

const cwd = path.resolve('/work/examples');

describe('resolveConfig', () => {
  it('falls back to the built-in layout', () => {
    const { help, config } = resolveConfig([], cwd);
    expect(help).toBe(false);
    expect(config).toEqual({
      sourceDir:     path.join(cwd, 'notebooks'),
      markdownDir:   path.join(cwd, 'markdown'),
      scriptDir:     path.join(cwd, 'julia'),
      publishDir:    path.resolve(cwd, '../documentation/src/examples'),
      kernel:        'julia-0.6',
      template:      path.join(cwd, 'markdown_template.tpl'),
      command:       'jupyter-nbconvert',
      extension:     '.ipynb',
      failurePolicy: 'halt',
      publish:       true,
    });
  });

  it('reads every option from flags', () => {
    const { config } = resolveConfig([
      '--source', 'nb',
      '--markdown', 'out/md',
      '--scripts', 'out/jl',
      '--publish', '/srv/site/examples',
      '--kernel', 'julia-1.10',
      '--template', 'tpl/md.tpl',
      '--nbconvert', 'jupyter',
      '--ext', 'nb',
      '--keep-going',
      '--no-publish',
    ], cwd);

    expect(config.sourceDir).toBe(path.join(cwd, 'nb'));
    expect(config.markdownDir).toBe(path.join(cwd, 'out/md'));
    expect(config.scriptDir).toBe(path.join(cwd, 'out/jl'));
    expect(config.publishDir).toBe(path.resolve('/srv/site/examples'));
    expect(config.kernel).toBe('julia-1.10');
    expect(config.template).toBe(path.join(cwd, 'tpl/md.tpl'));
    expect(config.command).toBe('jupyter');
    expect(config.extension).toBe('.nb');
    expect(config.failurePolicy).toBe('continue');
    expect(config.publish).toBe(false);
  });

  it('drops the template with --no-template', () => {
    expect(resolveConfig(['--no-template'], cwd).config.template).toBeNull();
  });

  it('reports --help', () => {
    expect(resolveConfig(['-h'], cwd).help).toBe(true);
  });

  it('returns a frozen config', () => {
    expect(Object.isFrozen(resolveConfig([], cwd).config)).toBe(true);
  });

  it('rejects unknown flags and stray arguments', () => {
    expect(() => resolveConfig(['--watch'], cwd)).toThrow(ConfigError);
    expect(() => resolveConfig(['notebooks'], cwd)).toThrow(ConfigError);
  });

  it('rejects conflicting or empty settings', () => {
    expect(() => resolveConfig(['--template', 'a.tpl', '--no-template'], cwd))
      .toThrow('--template and --no-template are mutually exclusive');
    expect(() => resolveConfig(['--markdown', 'out', '--scripts', 'out'], cwd))
      .toThrow('--markdown and --scripts must be different directories');
    expect(() => resolveConfig(['--kernel', ' '], cwd)).toThrow('--kernel must not be empty');
    expect(() => resolveConfig(['--ext', '.'], cwd)).toThrow('--ext must name an extension');
  });
});
