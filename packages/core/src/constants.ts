/**
 * @pkv2/core — Shared Constants
 */

/** Base URL of the PluralKit v2 API (no trailing slash) */
export const DEFAULT_BASE_URL = 'https://api.pluralkit.me/v2';

/** Permits granted per rate-limit window (documented API budget) */
export const DEFAULT_RATE_LIMIT_MAX = 2;

/** Length of the rate-limit window in milliseconds */
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 1_000;

/** Request timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Maximum switches returned by a single switch-list call */
export const MAX_SWITCH_PAGE_SIZE = 100;

/** Birthday year the API uses when the year is hidden */
export const HIDDEN_BIRTH_YEAR = 4;

/** Wire strings for privacy fields */
export const PRIVACY_LEVELS = ['public', 'private'] as const;

/** Wire strings for autoproxy modes */
export const AUTOPROXY_MODES = ['off', 'front', 'latch', 'member'] as const;
