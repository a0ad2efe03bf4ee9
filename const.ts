/**
 * Shared constants: environment variable names, defaults and timing.
 * @module const
 */

// =============================================================================
// ENVIRONMENT VARIABLES
// =============================================================================

export const ENV_OUT_DIR = 'SHOTLOOP_OUT_DIR'
export const ENV_INTERVAL = 'SHOTLOOP_INTERVAL'
export const ENV_DISPLAY = 'SHOTLOOP_DISPLAY'
export const ENV_REGION = 'SHOTLOOP_REGION'
export const ENV_PIDFILE = 'SHOTLOOP_PIDFILE'
export const ENV_FILENAME_PREFIX = 'SHOTLOOP_FILENAME_PREFIX'
export const ENV_CHECKPOINT_CSV = 'SHOTLOOP_CHECKPOINT_CSV'
export const ENV_SEND = 'SHOTLOOP_SEND'
export const ENV_GIT_REPO = 'SHOTLOOP_GIT_REPO'
export const ENV_GIT_REMOTE = 'SHOTLOOP_GIT_REMOTE'
export const ENV_GIT_BRANCH = 'SHOTLOOP_GIT_BRANCH'
export const ENV_GIT_PUSH_EVERY = 'SHOTLOOP_GIT_PUSH_EVERY'
export const ENV_HTTP_URL = 'SHOTLOOP_HTTP_URL'
export const ENV_LOG_LEVEL = 'LOG_LEVEL'

/** Env files looked up in the working directory, first hit wins */
export const DEFAULT_ENV_FILES = ['.env', 'shotloop.env'] as const

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_DISPLAY = 1
export const DEFAULT_INTERVAL = '5'
export const DEFAULT_FILENAME_PREFIX = 'shot_'
export const DEFAULT_PIDFILE_NAME = 'shotloop.pid'
export const DEFAULT_CHECKPOINT_NAME = 'shotloop_checkpoints.csv'

export const DEFAULT_GIT_REMOTE = 'origin'
export const DEFAULT_GIT_BRANCH = 'main'
export const DEFAULT_HTTP_METHOD = 'POST'
export const DEFAULT_HTTP_FIELD = 'file'

// =============================================================================
// TIMING
// =============================================================================

/** Upper bound on one sleep slice between captures; bounds stop latency */
export const SLEEP_SLICE_MS = 500

/** Liveness poll period while waiting for a signalled process to exit */
export const STOP_POLL_INTERVAL_MS = 100

/** Extra wait after the forceful signal */
export const FORCE_KILL_WAIT_MS = 2000

export const DEFAULT_STOP_TIMEOUT_SECONDS = 5

/** Max characters of an HTTP response body kept in logs and errors */
export const RESPONSE_BODY_TRUNCATE_LENGTH = 500

/** Hard exit if a signalled shutdown has not completed by then */
export const FORCED_SHUTDOWN_MS = 30000

/** Upper bound on one git command; a push waiting on credentials fails instead of hanging */
export const GIT_COMMAND_TIMEOUT_MS = 120000

/** Upper bound on one HTTP upload, response body included */
export const HTTP_UPLOAD_TIMEOUT_MS = 60000
