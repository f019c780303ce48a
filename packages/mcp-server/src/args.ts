/**
 * コマンドライン引数の解析
 */

import { Command } from 'commander';
import * as path from 'path';
import { CONFIG_ENV_VAR } from '@docnav/types';

/**
 * CLIオプション
 */
export interface CLIOptions {
  /** 対象文書の絶対パス */
  file: string;
  /** 文書ID（省略時はプロジェクトルートからの相対パス） */
  docId?: string;
  /** 設定ファイルのパス */
  config?: string;
}

/**
 * コマンドライン引数を解析
 * @param argv process.argv 形式の配列
 */
export function parseArgs(argv: string[], version: string, cwd: string = process.cwd()): CLIOptions {
  const program = new Command();

  program
    .name('docnav-mcp')
    .description('MCP Server for docnav - heading tree navigation for one document')
    .version(version)
    .argument('<file>', 'Markdown document to serve')
    .option('--doc-id <id>', 'Document identifier (defaults to the path relative to the project root)')
    .option('-c, --config <path>', `Config file path (env: ${CONFIG_ENV_VAR})`)
    .parse(argv);

  const options = program.opts<{ docId?: string; config?: string }>();
  const [file] = program.args;

  return {
    file: path.resolve(cwd, file),
    docId: options.docId,
    config: options.config,
  };
}
