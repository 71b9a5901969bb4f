export { MMKVKeyValueStorage, type MMKVInterface } from './mmkv-adapter.js';
export { FileKeyValueStorage, type FileStorageOptions } from './file-storage.js';
