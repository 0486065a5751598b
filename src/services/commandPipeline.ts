// src/services/commandPipeline.ts
import type { ActionExecutor } from './actionExecutor.js';
import type { IntentParser } from '../parsers/intentParser.js';
import type { CommandReply, ExecutionResult } from '../types/intent.js';
import type { Logger } from '../types/logger.js';
import { recordOutcome, resolvePendingTurn } from './confirmationFlow.js';
import { generateResponse } from '../utils/responseGenerator.js';

export interface CommandInput {
  sessionId: string;
  message: string;
  parser: IntentParser;
  executor: ActionExecutor;
  log: Logger;
  timeZone: string;
  pendingTtlSeconds: number;
  now?: Date;
}

export type CommandOutcome =
  | { status: 'reply'; action: string; reply: CommandReply }
  | { status: 'invalid_selection'; max: number; message: string };

export function outcomeLabel(result: ExecutionResult): 'success' | 'failure' | 'needs_confirmation' {
  if (result.needs_confirmation) return 'needs_confirmation';
  return result.success ? 'success' : 'failure';
}

/**
 * One conversational turn: pending selection, else parse, execute and reply.
 * Parser errors propagate; calendar failures are already folded into the result,
 * so a reply is always `success: true` and `result.success` carries the outcome.
 */
export async function handleCommand(input: CommandInput): Promise<CommandOutcome> {
  const { sessionId, message, parser, executor, log, timeZone } = input;
  const now = input.now ?? new Date();
  const formatOptions = { now, timeZone };

  const pendingTurn = await resolvePendingTurn(sessionId, message, executor, now);

  if (pendingTurn.kind === 'invalid') {
    log.info({ max: pendingTurn.max }, 'Selection out of range');
    return {
      status: 'invalid_selection',
      max: pendingTurn.max,
      message: `Invalid selection. Please choose a number between 1 and ${pendingTurn.max}.`,
    };
  }

  if (pendingTurn.kind === 'executed') {
    const { action, intent, result } = pendingTurn;
    log.info({ action, success: result.success }, 'Confirmed selection executed');

    return {
      status: 'reply',
      action,
      reply: {
        success: true,
        message: generateResponse(action, intent, result, formatOptions),
        result,
      },
    };
  }

  const intent = await parser.parse(message, { now, timeZone });
  log.debug({ intent }, 'Intent parsed');

  const result = await executor.execute(intent);
  const reply = generateResponse(intent.action, intent, result, formatOptions);

  recordOutcome(sessionId, intent.action, intent, result, {
    ttlSeconds: input.pendingTtlSeconds,
    now,
  });

  log.info(
    {
      action: intent.action,
      confidence: intent.confidence,
      outcome: outcomeLabel(result),
      matchCount: result.multiple_matches?.length ?? 0,
    },
    'Command executed'
  );

  return {
    status: 'reply',
    action: intent.action,
    reply: { success: true, message: reply, result },
  };
}
