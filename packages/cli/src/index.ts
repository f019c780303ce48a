#!/usr/bin/env -S npx tsx
/**
 * docnav CLI
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { CONFIG_ENV_VAR } from '@docnav/types';
import {
  runIds,
  runJson,
  runOutline,
  runTitle,
  type JsonCommandOptions,
  type OutlineCommandOptions,
} from './commands/document.js';
import {
  runChildren,
  runNode,
  type ChildrenCommandOptions,
  type NodeCommandOptions,
} from './commands/node.js';
import { runStats, type StatsCommandOptions } from './commands/stats.js';
import { runConfigInit, type ConfigInitOptions } from './commands/config/init.js';
import { runAndPrint } from './utils/errors.js';

// package.jsonからバージョンを読み込む
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as {
  version: string;
};

/**
 * グローバル設定（preSubcommandフックで設定）
 */
let globalConfigPath: string | undefined;

const program = new Command();

program
  .name('docnav')
  .description('Markdown文書を見出しツリーとして辿るコマンドラインツール')
  .version(packageJson.version)
  .addOption(
    new Option('-c, --config <path>', '設定ファイルのパス')
      .env(CONFIG_ENV_VAR)
  )
  .hook('preSubcommand', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string }>();
    globalConfigPath = opts.config;
  });

program
  .command('title')
  .description('文書タイトルを表示')
  .argument('<file>', 'Markdownファイル')
  .option('--doc-id <id>', '文書ID')
  .action((file: string, options: { docId?: string }) => {
    void runAndPrint(() => runTitle(file, { ...options, config: globalConfigPath }));
  });

program
  .command('outline')
  .description('見出しのアウトラインを表示')
  .argument('<file>', 'Markdownファイル')
  .option('--indent <n>', 'ネスト1段あたりのインデント幅')
  .option('--doc-id <id>', '文書ID')
  .action((file: string, options: OutlineCommandOptions) => {
    void runAndPrint(() => runOutline(file, { ...options, config: globalConfigPath }));
  });

program
  .command('ids')
  .description('全セクションの識別子を文書順に表示')
  .argument('<file>', 'Markdownファイル')
  .option('--doc-id <id>', '文書ID')
  .action((file: string, options: { docId?: string }) => {
    void runAndPrint(() => runIds(file, { ...options, config: globalConfigPath }));
  });

program
  .command('node')
  .description('セクションの本文を表示')
  .argument('<file>', 'Markdownファイル')
  .argument('<identifier>', 'セクション識別子（例: 1.2）')
  .option('--with-children', '子孫セクションの本文も連結する')
  .option('--format <format>', '出力形式 (text, json, html)', 'text')
  .option('--doc-id <id>', '文書ID')
  .action((file: string, identifier: string, options: NodeCommandOptions) => {
    void runAndPrint(() => runNode(file, identifier, { ...options, config: globalConfigPath }));
  });

program
  .command('children')
  .description('直下の子セクションを表示')
  .argument('<file>', 'Markdownファイル')
  .argument('<identifier>', 'セクション識別子（例: 1）')
  .option('--format <format>', '出力形式 (text, json)', 'text')
  .option('--doc-id <id>', '文書ID')
  .action((file: string, identifier: string, options: ChildrenCommandOptions) => {
    void runAndPrint(() => runChildren(file, identifier, { ...options, config: globalConfigPath }));
  });

program
  .command('json')
  .description('インデックスをJSONで出力')
  .argument('<file>', 'Markdownファイル')
  .option('--compact', '改行なしで出力')
  .option('--doc-id <id>', '文書ID')
  .action((file: string, options: JsonCommandOptions) => {
    void runAndPrint(() => runJson(file, { ...options, config: globalConfigPath }));
  });

program
  .command('stats')
  .description('セクションごとのトークン数を表示')
  .argument('<file>', 'Markdownファイル')
  .option('--format <format>', '出力形式 (text, json)', 'text')
  .option('--doc-id <id>', '文書ID')
  .action((file: string, options: StatsCommandOptions) => {
    void runAndPrint(() => runStats(file, { ...options, config: globalConfigPath }));
  });

// config コマンド
const configCmd = program
  .command('config')
  .description('設定管理');

configCmd
  .command('init')
  .description('設定ファイルを初期化')
  .option('-f, --force', '既存ファイルを上書き')
  .option('--cache', 'インデックスのキャッシュを有効にする')
  .action((options: ConfigInitOptions) => {
    void runAndPrint(() => runConfigInit(options));
  });

// コマンドラインを解析
program.parse(process.argv);
