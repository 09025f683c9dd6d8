import type { ZodError } from 'zod';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface InvalidConfigurationError {
  kind: 'invalid_configuration';
  message: string;
  issues: string[];
}

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function invalidConfiguration(
  message: string,
  issues: string[] = []
): { ok: false; error: InvalidConfigurationError } {
  return err({ kind: 'invalid_configuration', message, issues });
}

/**
 * Flatten zod issues into `path: message` lines.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}
