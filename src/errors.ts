export class RebuildError extends Error {
  public readonly code: number;

  constructor(message: string, code: number) {
    super(message);
    this.code = code;
  }
}

export const ExitCodes = {
  Success: 0,
  Failure: 1,
  Usage: 64,
  Diverged: 65,
  DirtyTarget: 66,
  FetchFailed: 69,
  SyncFailed: 74,
  Locked: 75,
  PrivilegeDenied: 77,
  Configuration: 78
} as const;
