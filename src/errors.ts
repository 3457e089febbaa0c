export type LadderErrorCode =
  | 'PositionOutOfRange'
  | 'BranchNotFound'
  | 'UnbalancedBranch'
  | 'InvalidInsertionPoint'
  | 'NoRungAtCoordinate'
  | 'InvalidElementKind'
  | 'InvalidRungText';

// Codes an interactive caller may treat as a no-op instead of a failure.
const RECOVERABLE_CODES: ReadonlySet<LadderErrorCode> = new Set<LadderErrorCode>([
  'InvalidInsertionPoint',
  'NoRungAtCoordinate'
]);

export class LadderError extends Error {
  public readonly recoverable: boolean;

  constructor(
    public readonly code: LadderErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LadderError';
    this.recoverable = RECOVERABLE_CODES.has(code);
  }
}

export function isLadderError(error: unknown, code?: LadderErrorCode): error is LadderError {
  return error instanceof LadderError && (code === undefined || error.code === code);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
