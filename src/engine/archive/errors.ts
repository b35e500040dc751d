import type { ChatId, ChatItemId, Interaction, RecipientId, ThreadUniqueId } from '../ir/types';

export class BackupError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'BackupError';
  }
}

export class StorageError extends BackupError {
  constructor(message: string, cause?: unknown) {
    super(message, 'STORAGE_ERROR', cause);
    this.name = 'StorageError';
  }
}

export class FrameFormatError extends BackupError {
  constructor(message: string, cause?: unknown) {
    super(message, 'FRAME_FORMAT_ERROR', cause);
    this.name = 'FrameFormatError';
  }
}

export class ConfigError extends BackupError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export function toBackupError(error: unknown, fallbackMessage = 'unexpected backup failure'): BackupError {
  if (error instanceof BackupError) return error;
  if (error instanceof Error) return new BackupError(error.message, 'UNKNOWN', error);
  return new BackupError(fallbackMessage, 'UNKNOWN', error);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// Archive side

export type ArchiveReference =
  | { type: 'thread'; threadUniqueId: ThreadUniqueId }
  | { type: 'recipient'; address: string };

export type ArchiveObjectId =
  | { type: 'chatItem'; id: ChatItemId }
  | { type: 'thread'; threadUniqueId: ThreadUniqueId }
  | { type: 'recipient'; address: string };

export type ArchiveErrorKind =
  | { type: 'referencedIdMissing'; reference: ArchiveReference }
  | { type: 'emptyMessage' }
  | { type: 'unsupportedInteraction'; kind: Interaction['kind'] }
  | { type: 'frameBuildFailed'; message: string }
  | { type: 'frameSerializationFailed'; message: string }
  | { type: 'streamClosed' };

export interface ArchiveFrameError {
  objectId: ArchiveObjectId;
  error: ArchiveErrorKind;
}

export function chatItemObjectId(interaction: Pick<Interaction, 'timestamp'>): ArchiveObjectId {
  return { type: 'chatItem', id: interaction.timestamp };
}

export function archiveError(objectId: ArchiveObjectId, error: ArchiveErrorKind): ArchiveFrameError {
  return { objectId, error };
}

export function describeArchiveError(frameError: ArchiveFrameError): string {
  return `${describeObjectId(frameError.objectId)}: ${describeArchiveKind(frameError.error)}`;
}

function describeObjectId(objectId: ArchiveObjectId): string {
  switch (objectId.type) {
    case 'chatItem':
      return `chat-item:${objectId.id}`;
    case 'thread':
      return `thread:${objectId.threadUniqueId}`;
    case 'recipient':
      return `recipient:${objectId.address}`;
  }
}

export function describeArchiveKind(kind: ArchiveErrorKind): string {
  switch (kind.type) {
    case 'referencedIdMissing':
      return kind.reference.type === 'thread'
        ? `referenced thread missing (${kind.reference.threadUniqueId})`
        : `referenced recipient missing (${kind.reference.address})`;
    case 'emptyMessage':
      return 'message has no content';
    case 'unsupportedInteraction':
      return `no archiver for interaction kind ${kind.kind}`;
    case 'frameBuildFailed':
      return `frame build failed: ${kind.message}`;
    case 'frameSerializationFailed':
      return `frame serialization failed: ${kind.message}`;
    case 'streamClosed':
      return 'output stream closed';
  }
}

// Restore side

export type RestoreIdentifier =
  | { type: 'chat'; chatId: ChatId }
  | { type: 'recipient'; recipientId: RecipientId };

export type RestoreErrorKind =
  | { type: 'identifierNotFound'; identifier: RestoreIdentifier }
  | { type: 'referencedDatabaseObjectNotFound'; object: { type: 'thread'; threadUniqueId: ThreadUniqueId } }
  | { type: 'databaseInsertionFailed'; message: string }
  | { type: 'databaseReadFailed'; message: string }
  | { type: 'invalidChatItem'; message: string }
  | { type: 'unsupportedChatItem' };

export function describeRestoreError(kind: RestoreErrorKind): string {
  switch (kind.type) {
    case 'identifierNotFound':
      return kind.identifier.type === 'chat'
        ? `unknown chat id ${kind.identifier.chatId}`
        : `unknown recipient id ${kind.identifier.recipientId}`;
    case 'referencedDatabaseObjectNotFound':
      return `thread ${kind.object.threadUniqueId} not found`;
    case 'databaseInsertionFailed':
      return `insert failed: ${kind.message}`;
    case 'databaseReadFailed':
      return `read failed: ${kind.message}`;
    case 'invalidChatItem':
      return `invalid chat item: ${kind.message}`;
    case 'unsupportedChatItem':
      return 'no archiver for chat item';
  }
}
