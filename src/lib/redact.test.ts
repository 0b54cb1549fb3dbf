import { describe, it, expect } from 'vitest';
import { compileProfile, loadRedactionProfile, parseRedactionProfile, redactText } from './redact.js';
import { ConfigError } from './errors.js';

const SETTINGS = [
  '<settings>',
  '    <setting id="rd.username" default="false" value="someone" />',
  '    <setting id="rd.password" value="hunter2" />',
  '    <setting id="rd.auth" value="abc" />',
  '    <setting id="theme" value="dark" />',
  '</settings>',
].join('\n');

const SOURCES = [
  '<sources>',
  '    <path pathversion="1">D:\\Movies\\</path>',
  '    <path pathversion="1">\\\\nas\\share\\TV\\</path>',
  '    <path pathversion="1">smb://user:pw@nas/music/</path>',
  '    <path pathversion="1">special://profile/playlists/</path>',
  '</sources>',
].join('\n');

describe('redaction with the bundled public profile', () => {
  it('loads the preset from disk', async () => {
    const profile = await loadRedactionProfile();
    expect(profile.exclude).toContain('userdata/favourites.xml');
    expect(profile.targets.map((t) => t.name)).toEqual(['addon-credentials', 'source-paths']);
  });

  it('blanks credential values in add-on settings', async () => {
    const compiled = compileProfile(await loadRedactionProfile());
    const target = compiled.targetFor('userdata/addon_data/plugin.video.realdebrid/settings.xml');
    expect(target?.name).toBe('addon-credentials');

    const res = redactText(SETTINGS, target?.rules ?? []);
    expect(res.replacements).toBe(3);
    expect(res.text).toBe(
      [
        '<settings>',
        '    <setting id="rd.username" default="false" value="" />',
        '    <setting id="rd.password" value="" />',
        '    <setting id="rd.auth" value="" />',
        '    <setting id="theme" value="dark" />',
        '</settings>',
      ].join('\n')
    );
    // a second pass finds nothing left to blank
    expect(redactText(res.text, target?.rules ?? []).replacements).toBe(0);
  });

  it('empties local, UNC and credentialed source paths', async () => {
    const compiled = compileProfile(await loadRedactionProfile());
    const target = compiled.targetFor('userdata/sources.xml');
    expect(target?.name).toBe('source-paths');

    const res = redactText(SOURCES, target?.rules ?? []);
    expect(res.replacements).toBe(3);
    expect(res.text).toBe(
      [
        '<sources>',
        '    <path pathversion="1"></path>',
        '    <path pathversion="1"></path>',
        '    <path pathversion="1"></path>',
        '    <path pathversion="1">special://profile/playlists/</path>',
        '</sources>',
      ].join('\n')
    );
  });

  it('leaves other add-ons and files alone', async () => {
    const compiled = compileProfile(await loadRedactionProfile());
    expect(compiled.targetFor('userdata/addon_data/skin.estuary/settings.xml')).toBeUndefined();
    expect(compiled.targetFor('userdata/guisettings.xml')).toBeUndefined();
  });
});

describe('parseRedactionProfile', () => {
  it('fills defaults for omitted sections', () => {
    expect(parseRedactionProfile('{}', 'p.json')).toEqual({ description: '', exclude: [], targets: [] });
  });

  it('rejects invalid JSON', () => {
    expect(() => parseRedactionProfile('{', 'p.json')).toThrow(ConfigError);
  });

  it('rejects targets without files', () => {
    const raw = JSON.stringify({ targets: [{ name: 'x', files: [], rules: [] }] });
    expect(() => parseRedactionProfile(raw, 'p.json')).toThrow(/targets\.0\.files/);
  });

  it('rejects patterns that are not valid regular expressions', () => {
    const raw = JSON.stringify({ targets: [{ name: 'x', files: ['a'], rules: [{ pattern: '(', replacement: '' }] }] });
    expect(() => parseRedactionProfile(raw, 'p.json')).toThrow(ConfigError);
  });

  it('reports a missing profile file as a config error', async () => {
    await expect(loadRedactionProfile('/definitely/not/here.json')).rejects.toBeInstanceOf(ConfigError);
  });
});
