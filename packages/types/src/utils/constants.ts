export const ENGINE_VERSION = '0.3.0';

export const DEFAULT_X_TOLERANCE = 10;
export const DEFAULT_Y_TOLERANCE = 3;

/** Tuning defaults used by the CLI, wider on x than the engine's own. */
export const CLI_DEFAULT_X_TOLERANCE = 20;
export const CLI_DEFAULT_Y_TOLERANCE = 3;

export const MASK_CHAR = '#';

export const WHOLE_TOKEN_MASK = 'NUMERIC';

export const MARKER_PAD_WIDTH = 3;
