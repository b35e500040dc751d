import type { ChatItemId, InteractionArchiveDetails } from '../ir/types';
import type { ArchiveFrameError, BackupError, RestoreErrorKind } from './errors';

export type ArchiveMultiFrameResult =
  | { type: 'success' }
  | { type: 'partialSuccess'; errors: ArchiveFrameError[] }
  | { type: 'completeFailure'; error: BackupError };

export type RestoreFrameResult =
  | { type: 'success' }
  | { type: 'partialRestore'; id: ChatItemId; errors: RestoreErrorKind[]; restoredInteractionId: string }
  | { type: 'failure'; id: ChatItemId; errors: RestoreErrorKind[] };

/** Outcome of one interaction archiver variant for one interaction. */
export type ArchiveInteractionResult =
  | { type: 'success'; details: InteractionArchiveDetails }
  | { type: 'isPastRevision' }
  | { type: 'notYetImplemented' }
  | { type: 'messageFailure'; errors: ArchiveFrameError[] }
  | { type: 'partialFailure'; details: InteractionArchiveDetails; errors: ArchiveFrameError[] }
  | { type: 'completeFailure'; error: BackupError };

export interface RestoredInteraction {
  interactionUniqueId: string;
}

/** Outcome of one interaction archiver variant for one chat item. */
export type RestoreInteractionResult =
  | { type: 'success'; details: RestoredInteraction }
  | { type: 'partialRestore'; details: RestoredInteraction; errors: RestoreErrorKind[] }
  | { type: 'messageFailure'; errors: RestoreErrorKind[] };

export function foldArchiveResults(
  completeFailure: BackupError | undefined,
  partialErrors: ArchiveFrameError[],
): ArchiveMultiFrameResult {
  if (completeFailure) {
    return { type: 'completeFailure', error: completeFailure };
  }
  if (partialErrors.length === 0) {
    return { type: 'success' };
  }
  return { type: 'partialSuccess', errors: partialErrors };
}

export function archiveResultErrors(result: ArchiveMultiFrameResult): ArchiveFrameError[] {
  return result.type === 'partialSuccess' ? result.errors : [];
}
