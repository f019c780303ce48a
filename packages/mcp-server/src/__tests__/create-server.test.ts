/**
 * MCPクライアント経由でのツール呼び出しテスト
 * InMemoryTransportでサーバとクライアントを同一プロセス内で接続する
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { createDocnavServer } from '../create-server.js';
import { CharacterCounter, RULE, createIndex, textOf } from '../tools/__tests__/helpers.js';

describe('createDocnavServer', () => {
  let client: Client;
  let close: () => Promise<void>;

  beforeEach(async () => {
    const { server } = createDocnavServer(createIndex(), { version: '0.0.0-test', counter: new CharacterCounter() });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    await server.connect(serverTransport);
    client = new Client({ name: 'docnav-test-client', version: '0.0.0' });
    await client.connect(clientTransport);

    close = async () => {
      await client.close();
      await server.close();
    };
  });

  afterEach(async () => {
    await close();
  });

  async function call(name: string, args: Record<string, unknown> = {}) {
    const result = await client.callTool({ name, arguments: args });
    return CallToolResultSchema.parse(result);
  }

  it('戻り値はサーバだけ', () => {
    const created = createDocnavServer(createIndex(), { version: '0.0.0-test' });
    expect(Object.keys(created)).toEqual(['server']);
  });

  it('5つのツールを公開する', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'get_children',
      'get_node',
      'get_node_with_children',
      'get_outline',
      'get_section_stats',
    ]);
  });

  it('get_outline', async () => {
    const result = await call('get_outline');
    expect(textOf(result).split('\n').slice(4)).toEqual([
      '[1] Manual',
      '  [1.1] Setup',
      '    [1.1.1] Linux',
      '  [1.2] FAQ',
    ]);
  });

  it('get_node', async () => {
    const result = await call('get_node', { identifier: '1.1.1' });
    expect(textOf(result).split('\n').slice(4)).toEqual([RULE, 'apt install.', RULE]);
  });

  it('get_section_stats に渡したカウンターを使う', async () => {
    const result = await call('get_section_stats', { identifier: '1.2' });
    expect(textOf(result)).toBe('[1.2] FAQ | 本文: 0 tokens | 子孫込み: 0 tokens | 子: 0');
  });

  it('存在しない識別子はエラー結果になる', async () => {
    const result = await call('get_children', { identifier: '7' });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toContain('セクション "7" が見つかりません');
  });
});
