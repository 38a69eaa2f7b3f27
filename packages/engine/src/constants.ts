export const DEFAULT_GIT_TIMEOUT_MS = 300_000
export const DEFAULT_SCANNER_TIMEOUT_MS = 600_000
export const DEFAULT_PROBE_TIMEOUT_MS = 15_000
export const EXEC_MAX_BUFFER = 64 * 1024 * 1024
export const DEFAULT_TRUFFLEHOG_IMAGE = 'trufflesecurity/trufflehog:latest'
export const CONTAINER_MOUNT_PATH = '/scan'
export const PATTERN_MAX_FILE_BYTES = 5 * 1024 * 1024
export const PATTERN_MAX_LINE_LENGTH = 300
export const TIMEOUT_MARKER = '[secret-audit] timed out'
/** Pattern-scanner line prefixes that do not count as hits. */
export const CLEAN_PREFIX = '✓ '
export const NOTICE_PREFIX = '! '
