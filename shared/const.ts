export const DEFAULT_LISTEN_PORT = 7569;
// Roughly a 28.8k modem once protocol overhead is taken out
export const DEFAULT_BYTES_PER_SECOND = 3225;
export const DEFAULT_DESTINATION_PORT = 80;

export const DEFAULT_CHUNK_SIZE = 2048;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
// How long a stopped connection may take to flush what it already read
export const DEFAULT_STOP_GRACE_MS = 5_000;

export const SETTINGS_KEY_PREFIX = "slowlink";
