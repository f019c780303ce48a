import type { DocnavConfig } from '../config.js';

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): Partial<DocnavConfig> {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }

  // バージョンのチェック
  if (config.version !== undefined && typeof config.version !== 'string') {
    throw new Error('config.version must be a string');
  }

  // parser設定のバリデーション
  if (config.parser !== undefined) {
    validateParserConfig(config.parser);
  }

  // outline設定のバリデーション
  if (config.outline !== undefined) {
    validateOutlineConfig(config.outline);
  }

  // storage設定のバリデーション
  if (config.storage !== undefined) {
    validateStorageConfig(config.storage);
  }

  return config as Partial<DocnavConfig>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateParserConfig(parser: unknown): void {
  if (!isRecord(parser)) {
    throw new Error('config.parser must be an object');
  }

  if (parser.skipFencedCode !== undefined && typeof parser.skipFencedCode !== 'boolean') {
    throw new Error('config.parser.skipFencedCode must be a boolean');
  }

  if (parser.requireHeadings !== undefined && typeof parser.requireHeadings !== 'boolean') {
    throw new Error('config.parser.requireHeadings must be a boolean');
  }

  if (parser.maxHeadingLevel !== undefined) {
    const level = parser.maxHeadingLevel;
    if (typeof level !== 'number' || !Number.isInteger(level)) {
      throw new Error('config.parser.maxHeadingLevel must be an integer');
    }
    if (level < 1 || level > 6) {
      throw new Error('config.parser.maxHeadingLevel must be between 1 and 6');
    }
  }
}

function validateOutlineConfig(outline: unknown): void {
  if (!isRecord(outline)) {
    throw new Error('config.outline must be an object');
  }

  if (outline.indent !== undefined) {
    const indent = outline.indent;
    if (typeof indent !== 'number' || !Number.isInteger(indent)) {
      throw new Error('config.outline.indent must be an integer');
    }
    if (indent < 0 || indent > 8) {
      throw new Error('config.outline.indent must be between 0 and 8');
    }
  }
}

function validateStorageConfig(storage: unknown): void {
  if (!isRecord(storage)) {
    throw new Error('config.storage must be an object');
  }

  if (storage.cacheEnabled !== undefined && typeof storage.cacheEnabled !== 'boolean') {
    throw new Error('config.storage.cacheEnabled must be a boolean');
  }

  if (storage.indexPath !== undefined && typeof storage.indexPath !== 'string') {
    throw new Error('config.storage.indexPath must be a string');
  }
}
