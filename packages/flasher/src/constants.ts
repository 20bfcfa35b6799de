export const KIB = 1024;
export const MIB = 1024 * 1024;

/** Reference cadence of the progress monitor */
export const POLL_INTERVAL_MS = 500;

/** Deltas retained per task for rate smoothing */
export const SAMPLE_DEPTH = 6;

/** Most recent deltas averaged into the displayed rate */
export const RATE_WINDOW = 3;

export const WRITE_CHUNK_SIZE = 4 * MIB;

export const READ_CHUNK_SIZE = 1 * MIB;
