import { z } from 'zod';

// Local store records

export const AttachmentSchema = z.object({
  id: z.string().min(1),
  contentType: z.string(),
  fileName: z.string().optional(),
  size: z.number().int().nonnegative(),
  caption: z.string().optional(),
});

export const ContactShareSchema = z.object({
  name: z.string(),
  phoneNumbers: z.array(z.string()).default([]),
});

export const StickerInfoSchema = z.object({
  packId: z.string().min(1),
  stickerId: z.number().int().nonnegative(),
  emoji: z.string().optional(),
  attachment: AttachmentSchema,
});

export const MessageContentsSchema = z.object({
  body: z.string().optional(),
  attachments: z.array(AttachmentSchema).default([]),
  contactShare: ContactShareSchema.optional(),
  sticker: StickerInfoSchema.optional(),
  isVoiceMessage: z.boolean().default(false),
  isViewOnce: z.boolean().default(false),
  paymentNote: z.string().optional(),
  wasRemotelyDeleted: z.boolean().default(false),
});

export const EditStateSchema = z.enum(['none', 'latestRevision', 'pastRevision']);

const InteractionBaseSchema = z.object({
  uniqueId: z.string().min(1),
  threadUniqueId: z.string().min(1),
  timestamp: z.number().int().nonnegative(),
});

const MessageBaseSchema = InteractionBaseSchema.extend({
  contents: MessageContentsSchema,
  expireStartedAt: z.number().int().nonnegative().default(0),
  expiresInSeconds: z.number().int().nonnegative().default(0),
  editState: EditStateSchema.default('none'),
  latestRevisionId: z.string().optional(),
});

export const IncomingMessageSchema = MessageBaseSchema.extend({
  kind: z.literal('incoming'),
  authorAddress: z.string().min(1),
  receivedAt: z.number().int().nonnegative(),
  wasRead: z.boolean().default(false),
  wasReceivedByUD: z.boolean().default(false),
});

export const DeliveryStatusSchema = z.enum(['pending', 'sent', 'delivered', 'read', 'failed']);

export const OutgoingMessageSchema = MessageBaseSchema.extend({
  kind: z.literal('outgoing'),
  recipientStates: z.record(z.string(), DeliveryStatusSchema).default({}),
});

export const InfoMessageTypeSchema = z.enum([
  'expirationTimerChange',
  'groupUpdate',
  'profileChange',
  'identityChange',
  'sessionSwitchover',
  'paymentsActivated',
]);

export const InfoMessageSchema = InteractionBaseSchema.extend({
  kind: z.literal('info'),
  infoType: InfoMessageTypeSchema,
  authorAddress: z.string().optional(),
  expiresInSeconds: z.number().int().nonnegative().optional(),
  description: z.string().optional(),
  previousName: z.string().optional(),
  newName: z.string().optional(),
});

export const CallInteractionSchema = InteractionBaseSchema.extend({
  kind: z.literal('call'),
  callType: z.enum(['audio', 'video']),
  isOutgoing: z.boolean(),
  durationMs: z.number().int().nonnegative().default(0),
});

export const InteractionSchema = z.discriminatedUnion('kind', [
  IncomingMessageSchema,
  OutgoingMessageSchema,
  InfoMessageSchema,
  CallInteractionSchema,
]);

export const ThreadSchema = z.object({
  uniqueId: z.string().min(1),
  title: z.string().optional(),
  participantAddresses: z.array(z.string().min(1)),
  createdAt: z.number().int().nonnegative(),
});

export const ReactionSchema = z.object({
  messageUniqueId: z.string().min(1),
  reactorAddress: z.string().min(1),
  emoji: z.string().min(1),
  sentAt: z.number().int().nonnegative(),
  sortOrder: z.number().int().nonnegative(),
});

// Backup records

const RecipientIdSchema = z.number().int().positive();

export const BackupReactionSchema = z.object({
  authorId: RecipientIdSchema,
  emoji: z.string().min(1),
  sentTimestamp: z.number().int().nonnegative(),
  sortOrder: z.number().int().nonnegative(),
});

export const FilePointerSchema = z.object({
  contentType: z.string(),
  fileName: z.string().optional(),
  size: z.number().int().nonnegative(),
  caption: z.string().optional(),
  localId: z.string().optional(),
});

export const StandardMessageSchema = z.object({
  text: z.object({ body: z.string() }).optional(),
  attachments: z.array(FilePointerSchema),
  reactions: z.array(BackupReactionSchema),
});

export const ContactMessageSchema = z.object({
  contact: z.object({ name: z.string(), phoneNumbers: z.array(z.string()) }),
  reactions: z.array(BackupReactionSchema),
});

export const VoiceMessageSchema = z.object({
  audio: FilePointerSchema,
  reactions: z.array(BackupReactionSchema),
});

export const StickerMessageSchema = z.object({
  sticker: z.object({
    packId: z.string().min(1),
    stickerId: z.number().int().nonnegative(),
    emoji: z.string().optional(),
    data: FilePointerSchema,
  }),
  reactions: z.array(BackupReactionSchema),
});

export const ChatUpdateSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('expirationTimerChange'), expiresInMs: z.number().int().nonnegative() }),
  z.object({ type: z.literal('groupChange'), description: z.string() }),
  z.object({ type: z.literal('profileChange'), previousName: z.string(), newName: z.string() }),
  z.object({ type: z.literal('simpleUpdate'), updateType: z.enum(['identityUpdate', 'sessionSwitchover']) }),
]);

export const ChatItemPayloadSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('standard'), message: StandardMessageSchema }),
  z.object({ type: z.literal('contact'), message: ContactMessageSchema }),
  z.object({ type: z.literal('voice'), message: VoiceMessageSchema }),
  z.object({ type: z.literal('sticker'), message: StickerMessageSchema }),
  z.object({ type: z.literal('remoteDeleted') }),
  z.object({ type: z.literal('chatUpdate'), update: ChatUpdateSchema }),
]);

export const SendStatusSchema = z.object({
  recipientId: RecipientIdSchema,
  status: DeliveryStatusSchema,
});

export const DirectionalDetailsSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('incoming'), dateReceived: z.number().int().nonnegative(), read: z.boolean() }),
  z.object({ type: z.literal('outgoing'), sendStatus: z.array(SendStatusSchema) }),
  z.object({ type: z.literal('directionless') }),
]);

export const ChatItemRevisionSchema = z.object({
  chatId: z.number().int().positive(),
  authorId: RecipientIdSchema,
  dateSent: z.number().int().nonnegative(),
  sealedSender: z.boolean(),
  sms: z.boolean(),
  expireStartDate: z.number().int().nonnegative().optional(),
  expiresInMs: z.number().int().nonnegative().optional(),
  directional: DirectionalDetailsSchema,
  item: ChatItemPayloadSchema,
});

export const ChatItemSchema = ChatItemRevisionSchema.extend({
  revisions: z.array(ChatItemRevisionSchema),
});

export const BackupInfoSchema = z.object({
  version: z.number().int().positive(),
  backupTimeMs: z.number().int().nonnegative(),
});

export const RecipientRecordSchema = z.object({
  id: RecipientIdSchema,
  destination: z.discriminatedUnion('type', [
    z.object({ type: z.literal('self') }),
    z.object({ type: z.literal('contact'), address: z.string().min(1) }),
  ]),
});

export const ChatRecordSchema = z.object({
  id: z.number().int().positive(),
  title: z.string().optional(),
  recipientIds: z.array(RecipientIdSchema),
  createdAt: z.number().int().nonnegative(),
});

export const BackupFrameSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('backupInfo'), backupInfo: BackupInfoSchema }),
  z.object({ type: z.literal('recipient'), recipient: RecipientRecordSchema }),
  z.object({ type: z.literal('chat'), chat: ChatRecordSchema }),
  z.object({ type: z.literal('chatItem'), chatItem: ChatItemSchema }),
]);

export const ManifestSchema = z.object({
  schemaVersion: z.number().int().positive(),
  backupVersion: z.number().int().positive(),
  createdAt: z.string(),
  frameCount: z.number().int().nonnegative(),
  framesSha256: z.string(),
  warnings: z.array(z.string()).default([]),
});
