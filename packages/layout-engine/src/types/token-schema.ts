import type { DocumentInput } from '@glyphorder/model';

import { z } from 'zod';

import { MalformedTokenStreamError } from '../errors/extraction-error';

export const bboxSchema = z
  .object({
    x0: z.number().finite(),
    y0: z.number().finite(),
    x1: z.number().finite(),
    y1: z.number().finite(),
  })
  .refine((b) => b.x1 >= b.x0 && b.y1 >= b.y0, {
    message: 'bbox must satisfy x1 >= x0 and y1 >= y0',
  });

export const tokenSchema = z.object({
  text: z.string().describe('Token text as decoded by the parser'),
  bbox: bboxSchema,
  fontSize: z.number().finite().positive(),
  baselineY: z.number().finite(),
  pageNo: z.number().int().positive(),
  confidence: z.number().min(0).max(1).optional(),
});

export const lineSegmentSchema = z.object({
  x0: z.number().finite(),
  y0: z.number().finite(),
  x1: z.number().finite(),
  y1: z.number().finite(),
});

export const pageInputSchema = z
  .object({
    pageNo: z.number().int().positive(),
    width: z.number().finite().positive(),
    height: z.number().finite().positive(),
    rotation: z.number().finite().optional(),
    tokens: z.array(tokenSchema),
    lines: z.array(lineSegmentSchema).optional(),
    imagePath: z.string().optional(),
  })
  .superRefine((page, ctx) => {
    page.tokens.forEach((token, index) => {
      if (token.pageNo !== page.pageNo) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tokens', index, 'pageNo'],
          message: `Token page ${token.pageNo} does not match page ${page.pageNo}`,
        });
      }
    });
  });

export const documentInputSchema = z
  .object({
    documentId: z.string().min(1),
    pages: z.array(pageInputSchema),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<number>();
    doc.pages.forEach((page, index) => {
      if (seen.has(page.pageNo)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['pages', index, 'pageNo'],
          message: `Duplicate page number ${page.pageNo}`,
        });
      }
      seen.add(page.pageNo);
    });
  });

/**
 * Validate raw upstream parser output.
 *
 * Returned pages are sorted by page number. Tokens keep their input order.
 *
 * @throws MalformedTokenStreamError when the input does not match the schema
 */
export function validateDocumentInput(input: unknown): DocumentInput {
  const result = documentInputSchema.safeParse(input);
  if (!result.success) {
    throw new MalformedTokenStreamError(
      'Upstream parser output failed validation',
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }
  return {
    documentId: result.data.documentId,
    pages: [...result.data.pages].sort((a, b) => a.pageNo - b.pageNo),
  };
}
