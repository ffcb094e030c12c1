import { z } from 'zod';

export const TokenSchema = z.object({
  text: z.string(),
  x0: z.number().finite(),
  top: z.number().finite(),
});
export type Token = z.infer<typeof TokenSchema>;

export const PageTokensSchema = z.array(TokenSchema);
export type PageTokens = z.infer<typeof PageTokensSchema>;

/**
 * Token documents are accepted either wrapped (`{ "pages": [...] }`) or as a
 * bare array of pages.
 */
export const TokenDocumentSchema = z.union([
  z.object({ pages: z.array(PageTokensSchema) }),
  z.array(PageTokensSchema),
]).transform(doc => (Array.isArray(doc) ? { pages: doc } : doc));
export type TokenDocument = z.output<typeof TokenDocumentSchema>;
