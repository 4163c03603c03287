import { z } from 'zod';
import { DEFAULT_PREVIEW_CHARS } from '../config/constants';

// Environment variables read at startup (after .env loading)
export const ENV_SCHEMA = z.object({
  DOCSLICE_DATA_DIR: z.string().min(1).optional(),
  DOCSLICE_PREVIEW_CHARS: z.coerce.number().int().positive().default(DEFAULT_PREVIEW_CHARS),
});

// Inferred types
export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
