import { readFile, access, realpath } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { DocnavConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 設定ファイルが必須かどうか（デフォルト: false）。trueの場合、見つからなければエラー */
  requireConfig?: boolean;
}

/**
 * Config解決結果
 */
export interface ResolvedConfig {
  config: DocnavConfig;
  configPath: string | null;
  projectRoot: string;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .docnav.json > docnav.json
 */
export const CONFIG_FILE_NAMES = ['.docnav.json', 'docnav.json'] as const;

/** 設定ファイルパスを指定する環境変数 */
export const CONFIG_ENV_VAR = 'DOCNAV_CONFIG';

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス（デフォルト: ./.docnav.json）
   */
  static async load(configPath: string = './.docnav.json'): Promise<DocnavConfig> {
    try {
      // ファイルの存在確認
      await access(configPath, constants.F_OK | constants.R_OK);

      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      const config = validateConfig(parsed);

      // デフォルト値とマージ
      return this.mergeWithDefaults(config);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        // ファイルが存在しない場合はデフォルト設定を返す
        return this.getDefaultConfig();
      }
      throw error;
    }
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - プロジェクトルートの決定（設定ファイルのあるディレクトリ、なければcwd）
   * - 設定の読み込み
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const { configPath: explicitPath, traverseUp = true, cwd = process.cwd(), requireConfig = false } = options;

    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);

    if (!configPath && requireConfig) {
      throw new Error(
        'Configuration file not found. Please create a configuration file.\n' +
        'Run: docnav config init'
      );
    }

    const projectRoot = configPath
      ? await this.normalizeProjectRoot(path.dirname(configPath))
      : await this.normalizeProjectRoot(cwd);

    const config = configPath ? await this.load(configPath) : this.getDefaultConfig();

    return { config, configPath, projectRoot };
  }

  /**
   * デフォルト設定を取得
   */
  static getDefaultConfig(): DocnavConfig {
    return this.mergeWithDefaults({});
  }

  /**
   * 設定ファイルを探索
   */
  private static async findConfigFile(startDir: string, traverseUp: boolean): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      for (const fileName of CONFIG_FILE_NAMES) {
        const candidate = path.join(currentDir, fileName);

        try {
          await access(candidate);
          return candidate;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   * 明示指定 > 環境変数 > 自動探索
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = process.env[CONFIG_ENV_VAR];
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * プロジェクトルートを正規化
   * - 絶対パスに変換
   * - シンボリックリンクを解決
   */
  private static async normalizeProjectRoot(root: string): Promise<string> {
    const absolutePath = path.resolve(root);

    try {
      return await realpath(absolutePath);
    } catch (_error) {
      // ディレクトリが存在しない場合は絶対パスをそのまま返す
      return absolutePath;
    }
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: Partial<DocnavConfig>): DocnavConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      parser: {
        skipFencedCode: config.parser?.skipFencedCode ?? DEFAULT_CONFIG.parser.skipFencedCode,
        requireHeadings: config.parser?.requireHeadings ?? DEFAULT_CONFIG.parser.requireHeadings,
        maxHeadingLevel: config.parser?.maxHeadingLevel ?? DEFAULT_CONFIG.parser.maxHeadingLevel,
      },
      outline: {
        indent: config.outline?.indent ?? DEFAULT_CONFIG.outline.indent,
      },
      storage: {
        cacheEnabled: config.storage?.cacheEnabled ?? DEFAULT_CONFIG.storage.cacheEnabled,
        indexPath: config.storage?.indexPath ?? DEFAULT_CONFIG.storage.indexPath,
      },
    };
  }
}
