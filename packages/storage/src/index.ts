/**
 * @docnav/storage
 * 文書の読み込みとインデックスのキャッシュ
 */

export { FileIndexStorage, type FileStorageOptions } from './file-storage.js';
export {
  DocumentLoader,
  loadDocumentText,
  computeSourceHash,
  type DocumentLoaderOptions,
  type LoadOptions,
  type LoadedDocument,
} from './document-loader.js';
