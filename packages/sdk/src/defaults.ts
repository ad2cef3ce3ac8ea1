export const DEFAULT_GAS_LIMIT = 1000n;

export const DEFAULT_POLL_INITIAL_DELAY_MS = 50;
export const DEFAULT_POLL_DELAY_STEP_MS = 200;
export const DEFAULT_POLL_MAX_DELAY_MS = 10_000;
export const DEFAULT_POLL_MAX_ATTEMPTS = 50;

export const DEFAULT_ACCOUNT_KEY_WEIGHT = 1000;

export const DEFAULT_LOG_LEVEL = "info";
