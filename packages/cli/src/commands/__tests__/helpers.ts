/**
 * コマンドテスト用の一時プロジェクト
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';

export const GUIDE = `# Guide
Welcome.

## Install
npm install docnav

### From source
Clone the repo.

## Usage
Run the CLI.
`;

export async function createProject(): Promise<string> {
  const dir = path.join(tmpdir(), `docnav-cli-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(path.join(dir, 'guide.md'), GUIDE);
  // 文書IDの計算に合わせてシンボリックリンクを解決しておく
  return await fs.realpath(dir);
}
