import { z } from 'zod';

export const envelopeSchema = z.object({
  type: z.string().min(1),
  sessionCode: z.string(),
  senderId: z.string().nullable(),
  payload: z.unknown(),
  sentAt: z.number().int().nonnegative(),
});

export const focusModeSchema = z.enum(['off', 'lightweight', 'full']);

export const qualitySchema = z.enum(['low', 'medium', 'high']);

export const complianceSchema = z.enum(['confirmed', 'pending', 'unknown']);

export const joinPayloadSchema = z.object({
  displayName: z.string().trim().min(1).max(64),
  password: z.string().min(1).max(256),
});

export const joinAcceptedPayloadSchema = z.object({
  participantId: z.string().min(1),
});

export const joinRejectedPayloadSchema = z.object({
  reason: z.enum(['InvalidCredentials', 'SessionNotActive', 'SessionFull', 'InvalidJoin']),
});

export const rosterEntrySchema = z.object({
  id: z.string(),
  displayName: z.string(),
  remoteAddress: z.string(),
  joinedAt: z.number(),
  focusMode: focusModeSchema,
  violationCount: z.number().int().nonnegative(),
});

export const rosterUpdatePayloadSchema = z.object({
  participants: z.array(rosterEntrySchema),
});

export const focusModePayloadSchema = z.object({
  mode: focusModeSchema,
});

export const violationRawPayloadSchema = z.object({
  // Unrecognised kinds are kept and bucketed as "unknown" downstream.
  kind: z.string().max(64),
  detail: z.string().max(512).default(''),
});

export const violationReportPayloadSchema = z.object({
  participantId: z.string(),
  kind: z.string(),
  occurrenceCount: z.number().int().positive(),
  windowStart: z.number(),
  windowEnd: z.number(),
  representativeDetail: z.string(),
});

export const frameDataPayloadSchema = z.object({
  sequenceNumber: z.number().int().positive(),
  quality: qualitySchema,
  monitorIndex: z.number().int().nonnegative(),
  capturedAt: z.number(),
  payload: z.string(), // base64
});

export const frameAckPayloadSchema = z.object({
  sequenceNumber: z.number().int().nonnegative(),
});

export const emptyPayloadSchema = z.object({});

export const consoleAttachPayloadSchema = z.object({
  monitors: z.number().int().nonnegative().default(0),
  deviceName: z.string().max(64).optional(),
});

export const consoleAttachedPayloadSchema = z.object({
  sessionCode: z.string(),
});

export const captureFramePayloadSchema = z.object({
  monitorIndex: z.number().int().nonnegative(),
  data: z.string().min(10), // base64
  mime: z.string().default('image/jpeg'),
});

export const captureConfigurePayloadSchema = z.object({
  monitorIndex: z.number().int().nonnegative(),
  quality: qualitySchema,
  frameIntervalMs: z.number().int().positive(),
  scale: z.number().positive().max(1),
  jpegQuality: z.number().int().min(1).max(100),
});

export const complianceUpdatePayloadSchema = z.object({
  participantId: z.string(),
  mode: focusModeSchema,
  compliance: complianceSchema,
});

export const captureUnavailablePayloadSchema = z.object({
  reason: z.string(),
});

const message = <T extends string, P extends z.ZodTypeAny>(type: T, payload: P) =>
  z.object({ type: z.literal(type), payload });

/**
 * Closed set of message kinds. Decoding anything outside it fails.
 */
export const messageSchema = z.discriminatedUnion('type', [
  message('Join', joinPayloadSchema),
  message('JoinAccepted', joinAcceptedPayloadSchema),
  message('JoinRejected', joinRejectedPayloadSchema),
  message('RosterUpdate', rosterUpdatePayloadSchema),
  message('SetFocusMode', focusModePayloadSchema),
  message('FocusModeAck', focusModePayloadSchema),
  message('ViolationRaw', violationRawPayloadSchema),
  message('ViolationReport', violationReportPayloadSchema),
  message('FrameData', frameDataPayloadSchema),
  message('FrameAck', frameAckPayloadSchema),
  message('Heartbeat', emptyPayloadSchema),
  message('SessionEnded', emptyPayloadSchema),
  message('ConsoleAttach', consoleAttachPayloadSchema),
  message('ConsoleAttached', consoleAttachedPayloadSchema),
  message('CaptureFrame', captureFramePayloadSchema),
  message('CaptureConfigure', captureConfigurePayloadSchema),
  message('ComplianceUpdate', complianceUpdatePayloadSchema),
  message('CaptureUnavailable', captureUnavailablePayloadSchema),
]);

export type Message = z.infer<typeof messageSchema>;

/** Message as a sender builds it; payload defaults may be omitted. */
export type OutboundMessage = z.input<typeof messageSchema>;

export type MessageType = Message['type'];

export type MessageOf<T extends MessageType> = Extract<Message, { type: T }>;

export type PayloadOf<T extends MessageType> = MessageOf<T>['payload'];

export const MESSAGE_TYPES: readonly MessageType[] = messageSchema.options.map(
  (option) => option.shape.type.value,
);

export function isMessageType(type: string): type is MessageType {
  return MESSAGE_TYPES.some((known) => known === type);
}
