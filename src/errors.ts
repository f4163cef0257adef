export class ProjsyncError extends Error {
  public readonly code: number;

  constructor(message: string, code: number) {
    super(message);
    this.code = code;
  }
}

export class UnsupportedOperationError extends Error {
  public readonly operation: string;

  constructor(operation: string, tool: string) {
    super(`${tool} does not support ${operation}`);
    this.operation = operation;
  }
}

export const ExitCodes = {
  Success: 0,
  Failure: 1,
  Usage: 2,
  Validation: 3,
  Filesystem: 5
} as const;
