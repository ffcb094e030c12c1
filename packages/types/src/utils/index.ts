export {
  ENGINE_VERSION,
  DEFAULT_X_TOLERANCE,
  DEFAULT_Y_TOLERANCE,
  CLI_DEFAULT_X_TOLERANCE,
  CLI_DEFAULT_Y_TOLERANCE,
  MASK_CHAR,
  WHOLE_TOKEN_MASK,
  MARKER_PAD_WIDTH,
} from './constants.js';
export { formatPadded, truncateCoordinate } from './format.js';
