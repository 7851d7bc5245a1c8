import { z } from 'zod';

import { parseWith } from './validation';

export const marketConfigSchema = z
  .object({
    market: z
      .object({
        subnet_tag: z.string().min(1),
        api_url: z.string().url().optional(),
        gsb_url: z.string().optional(),
        app_key: z.string().optional(),
      })
      .strict(),
    payment: z
      .object({
        budget: z.number().positive(),
        driver: z.string().min(1),
        network: z.string().min(1),
      })
      .strict(),
  })
  .strict();

export type MarketConfig = z.infer<typeof marketConfigSchema>;

/** Configuration handed to the compute collaborator (market daemon and payment). */
export const loadMarketConfig = (input: unknown): MarketConfig =>
  parseWith('market config', marketConfigSchema, input);
