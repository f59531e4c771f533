export const STATIC_ROUTE = "/static";
export const UPLOAD_FILE_PREFIX = "upload_";

// Upstream pacing. The last-call timestamp these apply to is process-wide.
export const MIN_INTERVAL_BETWEEN_CALLS_MS = 5_000;
export const MAX_INTERVAL_WAIT_MS = 3_000;
export const INTERVAL_JITTER_MS = { min: 100, max: 300 } as const;

export const MAX_RETRIES_PER_SHOT = 1;
// Primary call plus one quota retry or one fallback call, never both.
export const MAX_CALLS_PER_SHOT = 2;
export const RETRY_DELAY_CAP_MS = 6_000;
export const RETRY_JITTER_MS = { min: 200, max: 800 } as const;

// Upper bound on how long one HTTP request may keep waiting for retries.
export const PER_REQUEST_DEADLINE_MS = 35_000;

export const REFERENCE_IMAGE_MAX_SIDE = 768;
export const MAX_UPLOAD_FILES = 10;
export const MAX_UPLOAD_FILE_SIZE = 20 * 1024 * 1024; // 20MB
