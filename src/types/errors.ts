export type BackupErrorKind =
  | 'SourceUnreadable'
  | 'WriteFailure'
  | 'DuplicateIdentifier'
  | 'NotFound'
  | 'BrokenChain'
  | 'ArchiveMissing'
  | 'DestinationNotEmpty'
  | 'IntegrityMismatch'
  | 'ExtractionFailure'
  | 'OperationAborted'
  | 'InvalidArgument';

export interface BackupErrorContext {
  snapshotId?: string;
  path?: string;
  cause?: unknown;
}

export class BackupError extends Error {
  readonly kind: BackupErrorKind;
  readonly snapshotId: string | null;
  readonly path: string | null;

  constructor(kind: BackupErrorKind, message: string, context: BackupErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = 'BackupError';
    this.kind = kind;
    this.snapshotId = context.snapshotId ?? null;
    this.path = context.path ?? null;
  }
}

export interface ExtractionFailureContext {
  snapshotId: string;
  /** Zero-based index of the failed layer within the chain. */
  chainPosition: number;
  chainLength: number;
  /** Last layer that was fully applied, or null if the root failed. */
  lastAppliedSnapshotId: string | null;
  path?: string;
  cause?: unknown;
}

/** A restore layer failed partway. Earlier layers stay applied. */
export class ExtractionFailureError extends BackupError {
  readonly chainPosition: number;
  readonly chainLength: number;
  readonly lastAppliedSnapshotId: string | null;

  constructor(message: string, context: ExtractionFailureContext) {
    super('ExtractionFailure', message, context);
    this.name = 'ExtractionFailureError';
    this.chainPosition = context.chainPosition;
    this.chainLength = context.chainLength;
    this.lastAppliedSnapshotId = context.lastAppliedSnapshotId;
  }
}

export function isBackupError(error: unknown, kind?: BackupErrorKind): error is BackupError {
  return error instanceof BackupError && (kind === undefined || error.kind === kind);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
