import { z } from 'zod';

// Document information dictionary as reported by pdf-parse
export const PDF_INFO_SCHEMA = z
  .object({
    Title: z.string().optional(),
  })
  .passthrough();

export type PdfInfo = z.infer<typeof PDF_INFO_SCHEMA>;
