/**
 * Shared constants for the bag recorder.
 *
 * Centralizes magic numbers, defaults, and configuration values used
 * across the codebase.
 */

// --- Bridge Connection ---
export const DEFAULT_BRIDGE_URL = 'ws://localhost:9090';
export const BRIDGE_REQUEST_TIMEOUT_MS = 10000;
export const BRIDGE_HEARTBEAT_INTERVAL_MS = 15000;
export const BRIDGE_HEARTBEAT_STALE_MS = 30000;
export const BRIDGE_RECONNECT_INTERVAL_MS = 5000;

// --- Circuit Breaker ---
export const CIRCUIT_BREAKER_THRESHOLD = 5;
export const CIRCUIT_BREAKER_RESET_MS = 30000;

// --- Retry ---
export const RETRY_DELAYS_MS = Object.freeze([1000, 3000, 5000] as const);
export const DEFAULT_MAX_RETRIES = 3;

// --- Recording Defaults ---
export const DEFAULT_DATA_FOLDER = './data';
export const DEFAULT_FILE_DURATION_S = 60;
export const DEFAULT_LOGGED_TOPICS = Object.freeze(['/rosout', '/system_messenger', '/labjack_ain'] as const);
export const ALL_TOPICS_WILDCARD = '*';
export const BAG_DIRECTORY_PREFIX = 'Bag_';

// --- Storage ---
export const DEFAULT_STORAGE_ID = 'jsonl';
export const DEFAULT_SERIALIZATION_FORMAT = 'json';
export const DEFAULT_MAX_CACHE_SIZE_BYTES = 10_485_760; // 10 MiB
export const UNBOUNDED_BAGFILE_SIZE = 0;
export const METADATA_FILE_NAME = 'metadata.yaml';

// --- Control ---
export const DEFAULT_CONTROL_TOPIC = '/bag_control';
export const DEFAULT_CONTROL_MESSAGE_TYPE = 'modaq_messages/msg/Bagcontrol';
export const CONTROL_QUEUE_DEPTH = 10;
export const TOPIC_POLLING_INTERVAL_MS = 1000;

// --- Environment ---
export const ENV_BRIDGE_URL = 'BAG_RECORDER_BRIDGE_URL';
export const ENV_CONFIG_PATH = 'BAG_RECORDER_CONFIG';

// --- Node ---
export const MIN_NODE_VERSION = 20;

// --- Package ---
export const PACKAGE_NAME = 'bag-recorder';
export const VERSION = '0.1.0';
