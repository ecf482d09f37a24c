import { z } from 'zod';

export const BRAVE_WEB_RESULT_SCHEMA = z.object({
  title: z.string().default(''),
  url: z.string().default(''),
  description: z.string().default(''),
});

export const BRAVE_RESPONSE_SCHEMA = z.object({
  web: z
    .object({
      results: z.array(BRAVE_WEB_RESULT_SCHEMA).default([]),
    })
    .default({ results: [] }),
});

export type BraveWebResult = z.infer<typeof BRAVE_WEB_RESULT_SCHEMA>;
export type BraveResponse = z.infer<typeof BRAVE_RESPONSE_SCHEMA>;
