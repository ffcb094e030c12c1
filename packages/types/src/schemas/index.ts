export {
  TokenSchema,
  PageTokensSchema,
  TokenDocumentSchema,
} from './token.js';

export type { Token, PageTokens, TokenDocument } from './token.js';

export {
  NumericPolicySchema,
  ColumnPolicySchema,
  ClusterPolicySchema,
  RowPolicySchema,
  StreamerOptionsSchema,
} from './streamer.js';

export type {
  NumericPolicy,
  ColumnPolicy,
  ClusterPolicy,
  RowPolicy,
  StreamerOptions,
  StreamerOptionsInput,
} from './streamer.js';
