/**
 * stats コマンド
 * セクションごとのトークン数を表示する
 */

import { collectSectionStats } from '@docnav/core';
import { formatAsJson, formatStatsAsText } from '../utils/output.js';
import { openDocument, parseFormat, type DocumentCommandOptions } from '../utils/project.js';

export interface StatsCommandOptions extends DocumentCommandOptions {
  format?: string;
}

export async function runStats(file: string, options: StatsCommandOptions = {}): Promise<string> {
  const format = parseFormat(options.format, ['text', 'json'], 'text');
  const { loaded, loader } = await openDocument(file, options);
  const stats = collectSectionStats(loaded.index);

  return format === 'json'
    ? formatAsJson(stats)
    : formatStatsAsText(stats, loader.settings.outline.indent);
}
