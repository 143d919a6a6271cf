import { z } from 'zod';

/**
 * Messages Twilio ConversationRelay sends over the WebSocket. Fields this
 * service does not read are passed through untouched.
 */
export const relayMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('setup'),
    sessionId: z.string().optional(),
    callSid: z.string().optional(),
    from: z.string().default(''),
    to: z.string().default('')
  }).passthrough(),
  z.object({
    type: z.literal('prompt'),
    voicePrompt: z.string().default(''),
    lang: z.string().optional(),
    last: z.boolean().optional()
  }).passthrough(),
  z.object({
    type: z.literal('dtmf'),
    digit: z.string().default('')
  }).passthrough(),
  z.object({
    type: z.literal('interrupt'),
    utteranceUntilInterrupt: z.string().optional(),
    durationUntilInterruptMs: z.number().optional()
  }).passthrough(),
  z.object({
    type: z.literal('error'),
    description: z.string().optional()
  }).passthrough()
]);

export type RelayMessage = z.infer<typeof relayMessageSchema>;
export type RelayMessageOf<T extends RelayMessage['type']> = Extract<RelayMessage, { type: T }>;

export type RelayResponse =
  | { type: 'text'; token: string; last: boolean }
  | { type: 'end'; handoffData?: string };

export const HANDOFF_REASON_CODE = 'live-agent-handoff';

export const handoffDataSchema = z.object({
  reasonCode: z.string(),
  reason: z.string().optional(),
  transferTo: z.string().optional()
});

export type HandoffData = z.infer<typeof handoffDataSchema>;
