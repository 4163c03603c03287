import { z } from 'zod';
import { CLI_OPTIONS_SCHEMA, type CliOptions } from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

export function formatZodIssues(zodError: z.ZodError): string {
  return zodError.issues
    .map((issue) => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join(', ');
}

export function parseCliOptions(raw: unknown): CliOptions {
  try {
    return CLI_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid CLI options: ${formatZodIssues(e)}`);
    }
    const err = handleUnknownError(e, 'CLI option parsing');
    throw new ValidationError(`CLI option parsing failed: ${err.message}`);
  }
}
