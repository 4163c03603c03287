import { z } from 'zod';
import { ENV_SCHEMA, type EnvConfig } from '../schemas/env-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';
import { formatZodIssues } from './cli-parser';

export function parseEnvironment(env: unknown = process.env): EnvConfig {
  try {
    return ENV_SCHEMA.parse(env);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid environment variables: ${formatZodIssues(e)}`);
    }
    const err = handleUnknownError(e, 'Environment validation');
    throw new ValidationError(`Environment validation failed: ${err.message}`);
  }
}
