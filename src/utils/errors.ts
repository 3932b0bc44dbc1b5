import type { ZodError } from 'zod';

export class ContentError extends Error {
  constructor(readonly file: string, detail: string) {
    super(`Invalid content file ${file}: ${detail}`);
    this.name = 'ContentError';
  }
}

export class ConfigError extends Error {
  constructor(detail: string) {
    super(`Invalid configuration: ${detail}`);
    this.name = 'ConfigError';
  }
}

// First issue only; the rest are usually knock-on failures.
export const describeIssue = (error: ZodError): string => {
  const [issue] = error.issues;
  if (!issue) return error.message;
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
};
