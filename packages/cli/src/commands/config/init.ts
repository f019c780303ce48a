/**
 * config init コマンド
 * 設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigLoader, CONFIG_FILE_NAMES, type DocnavConfig } from '@docnav/types';

export interface ConfigInitOptions {
  /** 既存ファイルを上書き */
  force?: boolean;
  /** キャッシュを有効にする */
  cache?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * config init コマンドを実行
 * @returns 生成した設定ファイルのパス
 */
export async function initConfig(options: ConfigInitOptions = {}): Promise<string> {
  const cwd = options.cwd || process.cwd();
  const configPath = path.join(cwd, CONFIG_FILE_NAMES[0]);

  // 既存ファイルチェック
  try {
    await fs.access(configPath);

    if (!options.force) {
      throw new Error(
        `Configuration file already exists: ${configPath}\n` +
        'Use --force to overwrite the existing file.'
      );
    }

    console.log('⚠️  Overwriting existing configuration file...\n');
  } catch (error) {
    // ファイルが存在しない場合は正常（続行）
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw error;
    }
  }

  const defaults = ConfigLoader.getDefaultConfig();
  const config: DocnavConfig = {
    ...defaults,
    storage: { ...defaults.storage, cacheEnabled: options.cache ?? defaults.storage.cacheEnabled },
  };

  const configContent = JSON.stringify(config, null, 2) + '\n';
  await fs.writeFile(configPath, configContent, 'utf-8');

  return configPath;
}

/**
 * config init の結果メッセージ
 */
export async function runConfigInit(options: ConfigInitOptions = {}): Promise<string> {
  const configPath = await initConfig(options);
  return [
    '✅ Configuration file created successfully!',
    `📄 File: ${configPath}`,
    '',
    'Next steps:',
    `  1. Review and customize ${CONFIG_FILE_NAMES[0]}`,
    '  2. Show an outline: docnav outline README.md',
  ].join('\n');
}
