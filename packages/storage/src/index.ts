export { FileStorage, hashSource, type FileStorageOptions } from './file-storage.js';
