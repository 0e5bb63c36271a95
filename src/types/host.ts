/**
 * The host plugin API — what a chat-bot framework offers hush.
 *
 * hush never talks to a chat network itself. The host hands it
 * messages and commands, and gives it a way to reply.
 */

import type { ConfigReader } from './config.js';

/** Reply to whoever sent the current message */
export type SendText = (text: string) => Promise<void>;

export interface MessageContext {
  /** Sender identifier, as the host knows it. Empty when unknown. */
  userId: string;
  /** Plain text of the message, null for non-text messages */
  text: string | null;
  sendText: SendText;
}

export interface CommandContext extends MessageContext {
  text: string;
  /** Named capture groups of the command pattern */
  groups: Record<string, string | undefined>;
}

export interface CommandResult {
  ok: boolean;
  /** Short description for host logs */
  summary: string;
  /** Stop the command message from reaching other handlers */
  intercept: boolean;
}

export interface CommandDefinition {
  name: string;
  description: string;
  /** Tried against the raw message text, in registration order */
  pattern: RegExp;
  handler(context: CommandContext): Promise<CommandResult>;
}

/**
 * Interceptor return contract:
 *   [ok, continueProcessing, reason, reserved, reserved]
 * continueProcessing = false drops the message.
 */
export type InterceptResult = readonly [
  ok: boolean,
  continueProcessing: boolean,
  reason: string | null,
  reserved1: null,
  reserved2: null,
];

export interface InterceptorDefinition {
  name: string;
  description: string;
  handler(message: MessageContext): Promise<InterceptResult>;
}

export interface PluginHost {
  registerCommand(definition: CommandDefinition): void;
  registerInterceptor(definition: InterceptorDefinition): void;
  readonly config: ConfigReader;
}
