export const DEFAULT_CONCURRENCY = 1
export const CONFIG_TEMPLATE = '# Add your Git repository URLs here (one per line)\n'
export const SUMMARY_FILENAME = '00_SUMMARY.txt'
export const SUMMARY_PREVIEW_THRESHOLD = 5
export const SUMMARY_PREVIEW_LINES = 3

export const EXIT_PASS = 0
export const EXIT_FAIL = 1
