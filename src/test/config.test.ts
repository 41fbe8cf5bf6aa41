import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { CONFIG_FILE_NAME, loadConfig, resolveSettings } from '../config.js';
import { DocxErrorCode } from '../tools/docx/errors.js';
import { makeTempDir, rejectionOf, removeTempDir } from './helpers.js';

describe('config', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function writeConfig(content: unknown, name = CONFIG_FILE_NAME): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, typeof content === 'string' ? content : JSON.stringify(content), 'utf8');
    return file;
  }

  it('falls back to defaults when no config file exists', async () => {
    const settings = await resolveSettings({}, dir);

    expect(settings).toEqual({
      build: {
        baseDir: dir,
        outputPath: undefined,
        slideCount: undefined,
        title: undefined,
        subtitle: undefined,
      },
      logLevel: 'info',
      configPath: null,
    });
  });

  it('applies slides.config.json from the base directory', async () => {
    const configPath = await writeConfig({
      title: 'From config',
      slideCount: 4,
      outputFile: 'deck.docx',
      logLevel: 'warning',
    });

    const settings = await resolveSettings({}, dir);

    expect(settings.build).toMatchObject({ title: 'From config', slideCount: 4, outputPath: 'deck.docx' });
    expect(settings.logLevel).toBe('warning');
    expect(settings.configPath).toBe(configPath);
  });

  it('lets CLI flags win over the config file', async () => {
    await writeConfig({ title: 'From config', subtitle: 'Kept', slideCount: 4 });

    const settings = await resolveSettings(
      { title: 'From flag', count: 7, output: 'out/final.docx', logLevel: 'debug' },
      dir,
    );

    expect(settings.build).toMatchObject({
      title: 'From flag',
      subtitle: 'Kept',
      slideCount: 7,
      outputPath: path.join(dir, 'out', 'final.docx'),
    });
    expect(settings.logLevel).toBe('debug');
  });

  it('resolves --dir against the working directory', async () => {
    const settings = await resolveSettings({ dir: 'slides' }, dir);

    expect(settings.build.baseDir).toBe(path.join(dir, 'slides'));
  });

  it('rejects unknown keys', async () => {
    const file = await writeConfig({ title: 'x', theme: 'dark' });

    const error = await rejectionOf(loadConfig(file));

    expect(error.code).toBe(DocxErrorCode.INVALID_CONFIG);
  });

  it('rejects an output file that is not a .docx', async () => {
    const file = await writeConfig({ outputFile: 'deck.pdf' });

    const error = await rejectionOf(loadConfig(file));

    expect(error.code).toBe(DocxErrorCode.INVALID_CONFIG);
    expect(error.message).toBe(`Invalid config ${file}: outputFile: must end with .docx`);
  });

  it('rejects malformed JSON', async () => {
    const file = await writeConfig('{ "title": ');

    const error = await rejectionOf(loadConfig(file));

    expect(error.code).toBe(DocxErrorCode.INVALID_CONFIG);
  });

  it('requires a config file that was named explicitly', async () => {
    const error = await rejectionOf(resolveSettings({ config: 'nowhere.json' }, dir));

    expect(error.code).toBe(DocxErrorCode.INVALID_CONFIG);
    expect(error.context).toEqual({ configPath: path.join(dir, 'nowhere.json') });
  });

  it('returns null for a missing optional config file', async () => {
    expect(await loadConfig(path.join(dir, CONFIG_FILE_NAME))).toBeNull();
  });
});
