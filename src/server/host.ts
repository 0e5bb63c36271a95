/**
 * HTTP bridge host — a PluginHost for bot frameworks that would
 * rather call hush over HTTP than load it in-process.
 *
 * The framework posts each incoming message once. Commands are tried
 * first (so `/ignore del spam` still works when "spam" is blocked),
 * then every interceptor in registration order; the first stop wins.
 * Replies sent by handlers are collected and returned with the verdict.
 */

import type {
  CommandDefinition,
  ConfigReader,
  InterceptorDefinition,
  PluginHost,
} from '../types/index.js';

export interface IncomingMessage {
  userId: string;
  text: string | null;
}

export type DispatchResult =
  | {
      kind: 'command';
      command: string;
      ok: boolean;
      summary: string;
      continue: boolean;
      replies: string[];
    }
  | {
      kind: 'message';
      ok: boolean;
      continue: boolean;
      reason: string | null;
      replies: string[];
    };

export interface HttpHost extends PluginHost {
  /** Registered command names, in match order */
  readonly commands: string[];
  dispatch(message: IncomingMessage): Promise<DispatchResult>;
}

export function createHttpHost(config: ConfigReader): HttpHost {
  const commands: CommandDefinition[] = [];
  const interceptors: InterceptorDefinition[] = [];

  async function runCommand(
    command: CommandDefinition,
    message: IncomingMessage & { text: string },
    groups: Record<string, string | undefined>
  ): Promise<DispatchResult> {
    const replies: string[] = [];
    const sendText = async (text: string) => {
      replies.push(text);
    };

    try {
      const result = await command.handler({ ...message, groups, sendText });
      return {
        kind: 'command',
        command: command.name,
        ok: result.ok,
        summary: result.summary,
        continue: !result.intercept,
        replies,
      };
    } catch (error) {
      console.error(`[hush] command ${command.name} failed:`, error);
      return {
        kind: 'command',
        command: command.name,
        ok: false,
        summary: 'error',
        continue: true,
        replies,
      };
    }
  }

  async function runInterceptors(message: IncomingMessage): Promise<DispatchResult> {
    const replies: string[] = [];
    const sendText = async (text: string) => {
      replies.push(text);
    };

    for (const interceptor of interceptors) {
      try {
        const [ok, continueProcessing, reason] = await interceptor.handler({ ...message, sendText });
        if (!continueProcessing) {
          return { kind: 'message', ok, continue: false, reason, replies };
        }
      } catch (error) {
        console.error(`[hush] interceptor ${interceptor.name} failed:`, error);
        return { kind: 'message', ok: false, continue: true, reason: null, replies };
      }
    }

    return { kind: 'message', ok: true, continue: true, reason: null, replies };
  }

  return {
    config,

    registerCommand(definition: CommandDefinition): void {
      commands.push(definition);
    },

    registerInterceptor(definition: InterceptorDefinition): void {
      interceptors.push(definition);
    },

    get commands(): string[] {
      return commands.map((command) => command.name);
    },

    async dispatch(message: IncomingMessage): Promise<DispatchResult> {
      const { text } = message;

      if (text) {
        for (const command of commands) {
          const match = command.pattern.exec(text);
          if (match) {
            return runCommand(command, { ...message, text }, { ...match.groups });
          }
        }
      }

      return runInterceptors(message);
    },
  };
}
