import type { z } from 'zod';
import type {
  AttachmentSchema,
  BackupFrameSchema,
  BackupInfoSchema,
  BackupReactionSchema,
  CallInteractionSchema,
  ChatItemPayloadSchema,
  ChatItemRevisionSchema,
  ChatItemSchema,
  ChatRecordSchema,
  ChatUpdateSchema,
  DeliveryStatusSchema,
  DirectionalDetailsSchema,
  EditStateSchema,
  FilePointerSchema,
  IncomingMessageSchema,
  InfoMessageSchema,
  InfoMessageTypeSchema,
  InteractionSchema,
  ManifestSchema,
  MessageContentsSchema,
  OutgoingMessageSchema,
  ReactionSchema,
  RecipientRecordSchema,
  ThreadSchema,
} from './schema';

export type ThreadUniqueId = string;
export type ChatId = number;
export type RecipientId = number;
/** Messages are addressed by their sent timestamp inside a backup. */
export type ChatItemId = number;

export type Attachment = z.infer<typeof AttachmentSchema>;
export type MessageContents = z.infer<typeof MessageContentsSchema>;
export type EditState = z.infer<typeof EditStateSchema>;
export type IncomingMessage = z.infer<typeof IncomingMessageSchema>;
export type OutgoingMessage = z.infer<typeof OutgoingMessageSchema>;
export type DeliveryStatus = z.infer<typeof DeliveryStatusSchema>;
export type InfoMessage = z.infer<typeof InfoMessageSchema>;
export type InfoMessageType = z.infer<typeof InfoMessageTypeSchema>;
export type CallInteraction = z.infer<typeof CallInteractionSchema>;
export type Interaction = z.infer<typeof InteractionSchema>;
export type Message = IncomingMessage | OutgoingMessage;
export type Thread = z.infer<typeof ThreadSchema>;
export type Reaction = z.infer<typeof ReactionSchema>;

export type BackupReaction = z.infer<typeof BackupReactionSchema>;
export type FilePointer = z.infer<typeof FilePointerSchema>;
export type ChatUpdate = z.infer<typeof ChatUpdateSchema>;
export type ChatItemPayload = z.infer<typeof ChatItemPayloadSchema>;
export type DirectionalDetails = z.infer<typeof DirectionalDetailsSchema>;
export type ChatItemRevision = z.infer<typeof ChatItemRevisionSchema>;
export type ChatItem = z.infer<typeof ChatItemSchema>;
export type BackupInfo = z.infer<typeof BackupInfoSchema>;
export type RecipientRecord = z.infer<typeof RecipientRecordSchema>;
export type ChatRecord = z.infer<typeof ChatRecordSchema>;
export type BackupFrame = z.infer<typeof BackupFrameSchema>;
export type BackupFrameType = BackupFrame['type'];
export type Manifest = z.infer<typeof ManifestSchema>;

export function isMessage(interaction: Interaction): interaction is Message {
  return interaction.kind === 'incoming' || interaction.kind === 'outgoing';
}

/**
 * Normalized description of one archived message, produced by an
 * interaction archiver and turned into exactly one chat item frame.
 */
export interface InteractionArchiveDetails {
  author: RecipientId;
  directional: DirectionalDetails;
  expireStartDate?: number;
  expiresInMs?: number;
  isSealedSender: boolean;
  isSms: boolean;
  payload: ChatItemPayload;
  revisions: ArchivedRevision[];
}

/** An earlier version of an edited message. */
export interface ArchivedRevision extends Omit<InteractionArchiveDetails, 'revisions'> {
  dateSent: number;
}

export type DateProvider = () => Date;

export interface ProgressEvent {
  stage: string;
  progress: number;
  message?: string;
}

export interface FrameCounts {
  backupInfo: number;
  recipient: number;
  chat: number;
  chatItem: number;
}

export interface InspectResult {
  valid: boolean;
  hints: string[];
  manifest?: Manifest;
  frames: FrameCounts;
  errors: string[];
}
