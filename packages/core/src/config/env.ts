import { createEnv } from '@t3-oss/env-core'
import { z } from 'zod'

export const env = createEnv({
  server: {
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    NODE_ENV: z.string().default('development'),

    // Base directory of keyed caches (relative keys resolve against it)
    FEEDLINE_CACHE_DIR: z.string().default('.feedline-cache'),

    // Read chunk size of file sources
    FEEDLINE_READER_BUFFER_BYTES: z.coerce.number().int().positive().default(262144),
  },

  /**
   * Prefix that client-side variables must have. Enforced by @t3-oss/env-core.
   */
  clientPrefix: 'PUBLIC_',

  client: {},

  runtimeEnv: process.env,

  emptyStringAsUndefined: true,
})

export type FeedlineEnv = typeof env
