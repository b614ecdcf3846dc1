/**
 * Polling budgets for long-running provider operations.
 */

/** Delay between snapshot import status checks (15 seconds) */
export const IMAGE_IMPORT_POLL_DELAY_MS = 15_000;

/** Status checks before an import is declared timed out (~15 minutes) */
export const IMAGE_IMPORT_MAX_ATTEMPTS = 60;

/** Delay between public address lookups (2 seconds) */
export const ADDRESS_POLL_DELAY_MS = 2_000;

/** Lookups before address assignment is declared timed out (~2 minutes) */
export const ADDRESS_POLL_MAX_ATTEMPTS = 60;
