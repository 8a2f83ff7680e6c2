// ═══════════════════════════════════════════════════════════════════════════════
// FOLLOW-UP INTERPRETER — Open-Ended Turns Read Against the Current Shop List
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { loadConfig } from '../../../config/index.js';
import { appError, err, ok, type AsyncAppResult } from '../../../types/result.js';
import { completeChat, extractJson, type ChatCompleter } from '../../llm/client.js';

export type InterpreterErrorCode = 'INTERPRETER_UNAVAILABLE' | 'INTERPRETER_FAILED' | 'INTERPRETER_MALFORMED';

export interface InterpretationRequest {
  readonly text: string;
  readonly shops: readonly string[];
  readonly history: readonly { readonly role: string; readonly content: string }[];
}

export interface Interpretation {
  /** The collaborator's own signal that the user wants a fresh search */
  readonly newSearch: boolean;
  readonly shops: readonly string[];
  readonly response: string;
}

export interface FollowUpInterpreter {
  interpret(request: InterpretationRequest): AsyncAppResult<Interpretation, InterpreterErrorCode>;
}

const InterpretationSchema = z.object({
  new_search: z.boolean().catch(false),
  shops: z.array(z.string()).catch([]),
  response: z.string().catch(''),
});

const INTERPRETER_SYSTEM_PROMPT = `You help a user narrow down restaurants that were already recommended.
Given the current shop list, the recent conversation and the user's new message, decide:
- new_search: true only if the user asks for a different area or kind of food that needs a brand-new search
- shops: names from the current list that answer the message (exact names from the list)
- response: one or two sentences replying to the user

Return JSON only, no markdown:
{"new_search":false,"shops":["..."],"response":"..."}`;

export class LLMFollowUpInterpreter implements FollowUpInterpreter {
  private readonly complete: ChatCompleter;
  private readonly timeoutMs: number;

  constructor(options: { complete?: ChatCompleter; timeoutMs?: number } = {}) {
    this.complete = options.complete ?? completeChat;
    this.timeoutMs = options.timeoutMs ?? loadConfig().llm.followUpTimeoutMs;
  }

  async interpret(request: InterpretationRequest): AsyncAppResult<Interpretation, InterpreterErrorCode> {
    const history = request.history.map(message => `${message.role}: ${message.content}`).join('\n');

    const completion = await this.complete({
      purpose: 'follow-up-interpretation',
      maxTokens: 400,
      timeoutMs: this.timeoutMs,
      messages: [
        { role: 'system', content: INTERPRETER_SYSTEM_PROMPT },
        {
          role: 'user',
          content: [
            `Current shops: ${request.shops.join(', ') || '(none)'}`,
            `Conversation:\n${history || '(none)'}`,
            `New message: ${request.text}`,
          ].join('\n\n'),
        },
      ],
    });

    if (!completion.ok) {
      const code: InterpreterErrorCode =
        completion.error.code === 'LLM_UNAVAILABLE' ? 'INTERPRETER_UNAVAILABLE' : 'INTERPRETER_FAILED';
      return err(appError(code, completion.error.message, { cause: completion.error.cause }));
    }

    const parsed = InterpretationSchema.safeParse(extractJson(completion.value));
    if (!parsed.success) {
      return err(appError('INTERPRETER_MALFORMED', 'Interpreter response is not an object'));
    }

    return ok({ newSearch: parsed.data.new_search, shops: parsed.data.shops, response: parsed.data.response });
  }
}
