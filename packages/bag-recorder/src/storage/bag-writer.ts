/**
 * Storage service contract used by the recorder.
 */

import {
  DEFAULT_MAX_CACHE_SIZE_BYTES,
  DEFAULT_STORAGE_ID,
  UNBOUNDED_BAGFILE_SIZE,
} from '../constants.js';
import type { StorageUnavailableError } from '../errors.js';

export interface StorageOptions {
  /** Output directory of the bag. */
  uri: string;
  storageId: string;
  /** Size-based rotation threshold in bytes. 0 disables it. */
  maxBagfileSize: number;
  /** Time-based rotation threshold in seconds. 0 disables it. */
  maxBagfileDuration: number;
  /** Bytes buffered in memory before a flush to disk. */
  maxCacheSize: number;
  storagePresetProfile: string;
  snapshotMode: boolean;
}

export interface BagMessage {
  topic: string;
  type?: string;
  /** Stamp the bridge attached to the message. Stored, never used for rotation. */
  timestamp: number;
  data: unknown;
}

export interface BagWriter {
  readonly isOpen: boolean;
  open(options: StorageOptions): Promise<void>;
  /** Buffers the message; flushes happen in the background. */
  write(message: BagMessage): void;
  /** Flushes everything, finalizes the bag, and releases the writer. */
  close(): Promise<void>;
  /**
   * Called once when a background flush fails. Later writes throw the same
   * error and `close()` rejects with it. Returns an unsubscribe function.
   */
  onFailure(listener: (error: StorageUnavailableError) => void): () => void;
}

export type BagWriterFactory = () => BagWriter;

/** Options for a time-rotated bag with no size limit and no snapshot mode. */
export function buildStorageOptions(uri: string, fileDurationSeconds: number): StorageOptions {
  return {
    uri,
    storageId: DEFAULT_STORAGE_ID,
    maxBagfileSize: UNBOUNDED_BAGFILE_SIZE,
    maxBagfileDuration: fileDurationSeconds,
    maxCacheSize: DEFAULT_MAX_CACHE_SIZE_BYTES,
    storagePresetProfile: '',
    snapshotMode: false,
  };
}
