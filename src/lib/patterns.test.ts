import { describe, it, expect } from 'vitest';
import { compileExclusions, compileGlobs } from './patterns.js';

describe('compileExclusions', () => {
  it('matches the whole relative path', () => {
    const m = compileExclusions(['cache/*']);
    expect(m('cache/a.tmp')).toBe(true);
    expect(m('userdata/cache/a.tmp')).toBe(false);
  });

  it('lets * run across directory separators', () => {
    const m = compileExclusions(['addons/packages/*', '*.log']);
    expect(m('addons/packages/plugin.video.x-1.0.zip')).toBe(true);
    expect(m('addons/packages/nested/deep.zip')).toBe(true);
    expect(m('userdata/addon_data/plugin.video.x/kodi.log')).toBe(true);
    expect(m('userdata/addon_data/plugin.video.x/log.txt')).toBe(false);
  });

  it('does not treat dotfiles specially', () => {
    const m = compileExclusions(['*.cache']);
    expect(m('userdata/.hidden/.cache')).toBe(true);
  });

  it('supports character classes', () => {
    const m = compileExclusions(['userdata/Database/Textures[0-9][0-9].db']);
    expect(m('userdata/Database/Textures13.db')).toBe(true);
    expect(m('userdata/Database/MyVideos131.db')).toBe(false);
  });

  it('honours the case setting', () => {
    expect(compileExclusions(['*.LOG'], { nocase: false })('userdata/kodi.log')).toBe(false);
    expect(compileExclusions(['*.LOG'], { nocase: true })('userdata/kodi.log')).toBe(true);
  });

  it('treats parentheses and pipes as plain text', () => {
    expect(compileExclusions(['userdata/addon_data/foo (1)/*'])('userdata/addon_data/foo (1)/s.xml')).toBe(true);
    const m = compileExclusions(['userdata(a|b)/x.xml']);
    expect(m('userdata/a/x.xml')).toBe(false);
    expect(m('userdata(a|b)/x.xml')).toBe(true);
  });

  it('has no negation', () => {
    const m = compileExclusions(['!keep.xml']);
    expect(m('userdata/other.xml')).toBe(false);
    expect(m('!keep.xml')).toBe(true);
  });

  it('lets ? match any single character, / included', () => {
    const m = compileExclusions(['userdata?x.xml']);
    expect(m('userdata/x.xml')).toBe(true);
    expect(m('userdata//x.xml')).toBe(false);
  });

  it('supports negated classes and a literal ] first in a class', () => {
    const m = compileExclusions(['userdata/Database/[!M]*', 'x[]]y']);
    expect(m('userdata/Database/Textures13.db')).toBe(true);
    expect(m('userdata/Database/MyVideos131.db')).toBe(false);
    expect(m('x]y')).toBe(true);
  });

  it('reads an unclosed [ literally', () => {
    expect(compileExclusions(['userdata/[abc'])('userdata/[abc')).toBe(true);
    expect(compileExclusions(['userdata/[abc'])('userdata/a')).toBe(false);
  });

  it('matches nothing without patterns', () => {
    expect(compileExclusions([])('anything')).toBe(false);
  });
});

describe('compileGlobs', () => {
  const m = compileGlobs(['userdata/addon_data/*debrid*/settings.xml']);

  it('keeps * within one path segment', () => {
    expect(m('userdata/addon_data/script.module.realdebrid/settings.xml')).toBe(true);
    expect(m('userdata/addon_data/plugin/realdebrid/settings.xml')).toBe(false);
  });

  it('is case-insensitive by default', () => {
    expect(m('userdata/addon_data/plugin.video.RealDebrid/settings.xml')).toBe(true);
  });
});
