/**
 * Scraping Constants
 *
 * Timeouts, scroll behaviour and text limits shared by the strategies and the
 * batch runner. Option schemas take their defaults from here.
 */

export const SCRAPING_CONSTANTS = {
  // Navigation (milliseconds)
  NAVIGATION_TIMEOUT_MS: 35_000,
  NETWORK_IDLE_TIMEOUT_MS: 8_000,

  // Selector candidates are waited for this long each
  SELECTOR_TIMEOUT_MS: 5_000,

  // Lazy-load scrolling
  SCROLL_CYCLES: 6,
  SCROLL_PAUSE_MS: 800,

  OVERLAY_DISMISS_TIMEOUT_MS: 1_000,

  // Longer text blocks are truncated before storage
  MAX_TEXT_BLOCK_LENGTH: 2_000,
} as const

export const RECORD_ERRORS = {
  NAVIGATION_TIMEOUT: 'Navigation timeout',
  TOTAL_FAILURE: 'Failed to extract',
  NO_RESULT: 'No extraction result',
} as const
