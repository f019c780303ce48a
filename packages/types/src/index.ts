/**
 * @docnav/types
 * docnavの共通型定義
 */

// Section
export type { SectionNodeJson, DocumentIndexJson, SectionView } from './section.js';

// Query results
export type { NodeResult, ChildEntry, SectionStats, OutputFormat } from './api.js';

// Config
export type { DocnavConfig, ParserConfig, OutlineConfig, StorageConfig } from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  CONFIG_ENV_VAR,
  validateConfig,
  type ResolveConfigOptions,
  type ResolvedConfig,
} from './config/index.js';

// Storage
export type { IndexStorage, StoredIndex } from './storage.js';
