import type { StorageConfig } from '../../../config/env.js';
import { connectMongo } from '../../../db/mongoose.js';
import { DocumentBackend } from './document.backend.js';
import { FilesystemBackend } from './filesystem.backend.js';
import { RelationalBackend } from './relational.backend.js';
import type { StorageBackend } from './storage.backend.js';

/**
 * Pick the backend once, at process configuration time.
 * The document variant expects the mongoose connection to be open already;
 * use openStorageBackend to have it opened from the config.
 */
export function createStorageBackend(config: StorageConfig): StorageBackend {
  switch (config.kind) {
    case 'filesystem':
      return new FilesystemBackend({ rootDir: config.rootDir, historyEnabled: config.historyEnabled });
    case 'relational':
      return new RelationalBackend({ path: config.path, historyEnabled: config.historyEnabled });
    case 'document':
      return new DocumentBackend(config.historyEnabled);
  }
}

/** createStorageBackend, connecting to MongoDB first when the config names the document store */
export async function openStorageBackend(
  config: StorageConfig,
  connect: (url: string, dbName: string) => Promise<void> = connectMongo
): Promise<StorageBackend> {
  if (config.kind === 'document') {
    await connect(config.mongoUrl, config.dbName);
  }
  return createStorageBackend(config);
}
