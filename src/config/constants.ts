export const MANIFEST_SCHEMA_VERSION = '2.0'
export const INTENT_SCHEMA_VERSION = '1.0'

export const DEFAULT_PROVIDER = 'threadline'
export const DEFAULT_BOT_LOGIN = 'github-actions[bot]'
export const SUMMARY_MARKER = '<!-- threadline-summary-marker -->'
export const REVIEW_MARKER = '<!-- threadline-review-marker -->'

export const PAGE_SIZE = 100
export const DEFAULT_MAX_FILES = 200
export const DEFAULT_MAX_CHECK_RUNS = 200
export const DEFAULT_MAX_INLINE_COMMENTS = 20
export const DEFAULT_TIMEOUT_SECONDS = 30

export const MANIFEST_FILE = 'manifest.json'
export const RESULTS_FILE = 'publish-results.json'
export const DEFAULT_INTENT_FILE = 'publish-batch.json'
