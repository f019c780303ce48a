import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { ConfigLoader, CONFIG_ENV_VAR } from '../loader.js';
import { validateConfig } from '../validator.js';
import { DEFAULT_CONFIG } from '../../config.js';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';

const TEST_DIR = path.join(tmpdir(), `docnav-config-test-${process.pid}`);

describe('ConfigLoader', () => {
  beforeAll(async () => {
    // テスト用ディレクトリ作成
    await fs.mkdir(path.join(TEST_DIR, 'project', 'docs', 'deep'), { recursive: true });
  });

  afterAll(async () => {
    // テスト用ディレクトリ削除
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('デフォルト設定を取得できる', () => {
      const config = ConfigLoader.getDefaultConfig();
      expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('毎回新しいオブジェクトを返す', () => {
      const config = ConfigLoader.getDefaultConfig();
      config.outline.indent = 7;
      expect(ConfigLoader.getDefaultConfig().outline.indent).toBe(2);
      expect(DEFAULT_CONFIG.outline.indent).toBe(2);
    });
  });

  describe('load', () => {
    it('存在しないファイルはデフォルト設定を返す', async () => {
      const config = await ConfigLoader.load(path.join(TEST_DIR, 'nonexistent.json'));
      expect(config).toEqual(ConfigLoader.getDefaultConfig());
    });

    it('部分的な設定をデフォルト値とマージする', async () => {
      const configPath = path.join(TEST_DIR, 'partial.json');
      await fs.writeFile(configPath, JSON.stringify({ parser: { maxHeadingLevel: 3 } }, null, 2));

      const config = await ConfigLoader.load(configPath);
      expect(config.parser).toEqual({ skipFencedCode: true, requireHeadings: false, maxHeadingLevel: 3 });
      // デフォルト値がマージされる
      expect(config.outline.indent).toBe(2);
      expect(config.storage.indexPath).toBe('.docnav/index');
    });

    it('不正なJSONはエラー', async () => {
      const configPath = path.join(TEST_DIR, 'broken.json');
      await fs.writeFile(configPath, '{ parser: ');

      await expect(ConfigLoader.load(configPath)).rejects.toThrow(SyntaxError);
    });

    it('バリデーションエラーをそのまま投げる', async () => {
      const configPath = path.join(TEST_DIR, 'invalid.json');
      await fs.writeFile(configPath, JSON.stringify({ outline: { indent: 12 } }));

      await expect(ConfigLoader.load(configPath)).rejects.toThrow('config.outline.indent must be between 0 and 8');
    });
  });

  describe('resolve', () => {
    const originalEnv = process.env[CONFIG_ENV_VAR];

    afterEach(() => {
      if (originalEnv === undefined) {
        delete process.env[CONFIG_ENV_VAR];
      } else {
        process.env[CONFIG_ENV_VAR] = originalEnv;
      }
    });

    it('親ディレクトリを遡って設定ファイルを探す', async () => {
      delete process.env[CONFIG_ENV_VAR];
      const projectDir = path.join(TEST_DIR, 'project');
      await fs.writeFile(path.join(projectDir, '.docnav.json'), JSON.stringify({ outline: { indent: 4 } }));

      const resolved = await ConfigLoader.resolve({ cwd: path.join(projectDir, 'docs', 'deep') });

      expect(resolved.configPath).toBe(path.join(projectDir, '.docnav.json'));
      expect(resolved.projectRoot).toBe(await fs.realpath(projectDir));
      expect(resolved.config.outline.indent).toBe(4);
    });

    it('traverseUp: false なら遡らない', async () => {
      delete process.env[CONFIG_ENV_VAR];
      const cwd = path.join(TEST_DIR, 'project', 'docs');

      const resolved = await ConfigLoader.resolve({ cwd, traverseUp: false });

      expect(resolved.configPath).toBeNull();
      expect(resolved.projectRoot).toBe(await fs.realpath(cwd));
      expect(resolved.config).toEqual(DEFAULT_CONFIG);
    });

    it('明示指定はcwd基準で解決する', async () => {
      await fs.writeFile(path.join(TEST_DIR, 'explicit.json'), JSON.stringify({ storage: { cacheEnabled: true } }));

      const resolved = await ConfigLoader.resolve({ cwd: TEST_DIR, configPath: 'explicit.json' });

      expect(resolved.configPath).toBe(path.join(TEST_DIR, 'explicit.json'));
      expect(resolved.config.storage.cacheEnabled).toBe(true);
    });

    it('環境変数で設定ファイルを指定できる', async () => {
      await fs.writeFile(path.join(TEST_DIR, 'from-env.json'), JSON.stringify({ outline: { indent: 0 } }));
      process.env[CONFIG_ENV_VAR] = path.join(TEST_DIR, 'from-env.json');

      const resolved = await ConfigLoader.resolve({ cwd: path.join(TEST_DIR, 'project') });

      expect(resolved.config.outline.indent).toBe(0);
    });

    it('requireConfig で設定ファイルがなければエラー', async () => {
      delete process.env[CONFIG_ENV_VAR];

      await expect(
        ConfigLoader.resolve({ cwd: path.join(TEST_DIR, 'project', 'docs'), traverseUp: false, requireConfig: true })
      ).rejects.toThrow('Configuration file not found');
    });
  });
});

describe('validateConfig', () => {
  it('空オブジェクトを受け付ける', () => {
    expect(validateConfig({})).toEqual({});
  });

  it('オブジェクト以外はエラー', () => {
    expect(() => validateConfig(null)).toThrow('Config must be an object');
    expect(() => validateConfig([])).toThrow('Config must be an object');
  });

  it('型の誤りを検出する', () => {
    expect(() => validateConfig({ version: 1 })).toThrow('config.version must be a string');
    expect(() => validateConfig({ parser: { skipFencedCode: 'yes' } })).toThrow(
      'config.parser.skipFencedCode must be a boolean'
    );
    expect(() => validateConfig({ storage: { indexPath: 3 } })).toThrow('config.storage.indexPath must be a string');
  });

  it('maxHeadingLevelの範囲を検証する', () => {
    expect(() => validateConfig({ parser: { maxHeadingLevel: 0 } })).toThrow(
      'config.parser.maxHeadingLevel must be between 1 and 6'
    );
    expect(() => validateConfig({ parser: { maxHeadingLevel: 2.5 } })).toThrow(
      'config.parser.maxHeadingLevel must be an integer'
    );
  });
});
