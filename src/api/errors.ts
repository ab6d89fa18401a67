import { z } from 'zod';

export class FoxessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Non-2xx HTTP status, network failure or timeout. `statusCode` is absent when no response arrived. */
export class TransportError extends FoxessError {
  constructor(
    public readonly path: string,
    public readonly statusCode: number | undefined,
    detail?: string,
  ) {
    super(statusCode !== undefined
      ? `Request to ${path} failed with HTTP ${statusCode}`
      : `Request to ${path} failed: ${detail ?? 'network error'}`);
  }
}

function describeIssue(issue: z.ZodIssue | undefined): string {
  if (!issue) {
    return '';
  }
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `: ${where}: ${issue.message}`;
}

export class DecodeError extends FoxessError {
  constructor(
    public readonly path: string,
    public readonly issues: z.ZodIssue[],
  ) {
    super(`Unexpected response shape from ${path}${describeIssue(issues[0])}`);
  }
}

export class ServerError extends FoxessError {
  constructor(
    public readonly path: string,
    public readonly code: number,
  ) {
    super(`Server error ${code}`);
  }
}

export class MissingResultError extends FoxessError {
  constructor(public readonly path: string) {
    super(`Missing result in response from ${path}`);
  }
}

export class DeviceNotFoundInResponseError extends FoxessError {
  constructor(public readonly deviceSerial: string) {
    super(`No data found for device ${deviceSerial}`);
  }
}

export class NotAuthenticatedError extends FoxessError {
  constructor() {
    super('Not authenticated, call authenticate() first');
  }
}
