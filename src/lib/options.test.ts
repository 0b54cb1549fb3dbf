import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { Command } from 'commander';
import { addBuildOptions, cliLayer, splitList, type BuildCliOptions } from './options.js';

function parse(argv: string[]) {
  const cmd = addBuildOptions(new Command('build').argument('[kodiDir]').exitOverride());
  cmd.parse(argv, { from: 'user' });
  return { args: cmd.args, opts: cmd.opts<BuildCliOptions>() };
}

describe('build options', () => {
  it('leaves a folder given after --include as the Kodi folder', () => {
    const { args, opts } = parse(['--include', 'userdata', '/media/kodi']);
    expect(args).toEqual(['/media/kodi']);
    expect(opts.include).toEqual(['userdata']);
  });

  it('collects repeated and comma-separated lists', () => {
    const { opts } = parse(['--include', 'userdata,addons', '--include', 'media', '--exclude', '*.log']);
    expect(splitList(opts.include)).toEqual(['userdata', 'addons', 'media']);
    expect(splitList(opts.exclude)).toEqual(['*.log']);
  });

  it('turns given flags into a config layer', () => {
    const { args, opts } = parse(['kodi', '--public', '--no-info', '--skip-large', '0', '-o', 'out']);
    expect(cliLayer(args[0], opts, '/work')).toEqual({
      kodi: path.resolve('/work', 'kodi'),
      out: path.resolve('/work', 'out'),
      skipLarge: '0',
      mode: 'public',
      buildInfo: false,
    });
  });

  it('sets nothing when no flags are given', () => {
    const { args, opts } = parse([]);
    expect(args).toEqual([]);
    expect(cliLayer(args[0], opts, '/work')).toEqual({});
  });
});
