// src/parsers/intentParser.ts
import { OpenAI } from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { IntentSchema } from './intentSchema.js';
import { buildIntentPrompt, type PromptContext } from '../prompts/intentPrompt.js';
import type { ParsedIntent } from '../types/intent.js';

export type AIProvider = 'openai' | 'anthropic';

export type ParseContext = PromptContext;

/**
 * Turns one natural-language command into a structured intent
 */
export interface IntentParser {
  parse(text: string, context: ParseContext): Promise<ParsedIntent>;
}

/**
 * The model replied with something other than a valid intent object
 */
export class IntentParseError extends Error {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.name = 'IntentParseError';
    this.raw = raw;
  }
}

/**
 * Validate a raw model reply. Only a bare JSON object is accepted.
 *
 * @throws IntentParseError
 */
export function parseIntentJson(raw: string): ParsedIntent {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new IntentParseError(
      `Model reply is not JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
      raw
    );
  }

  const validated = IntentSchema.safeParse(decoded);
  if (!validated.success) {
    const issues = validated.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new IntentParseError(`Model reply failed validation: ${issues}`, raw);
  }

  return validated.data;
}

const DEFAULT_MODELS: Record<AIProvider, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-20241022',
};

const TEMPERATURE = 0.1;
const MAX_TOKENS = 500;

export interface AiIntentParserOptions {
  provider: AIProvider;
  apiKey: string;
  model?: string | undefined;
  timeoutMs: number;
}

/**
 * LLM-backed parser. One request per command, no retries; the SDK timeout
 * bounds how long a turn waits on the model.
 */
export class AiIntentParser implements IntentParser {
  private readonly provider: AIProvider;
  private readonly model: string;
  private readonly openai?: OpenAI;
  private readonly anthropic?: Anthropic;

  constructor(options: AiIntentParserOptions) {
    this.provider = options.provider;
    this.model = options.model || DEFAULT_MODELS[options.provider];

    const clientOptions = { apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 };
    if (options.provider === 'openai') {
      this.openai = new OpenAI(clientOptions);
    } else {
      this.anthropic = new Anthropic(clientOptions);
    }
  }

  async parse(text: string, context: ParseContext): Promise<ParsedIntent> {
    const systemPrompt = buildIntentPrompt(context);
    const raw =
      this.provider === 'openai'
        ? await this.completeWithOpenAI(systemPrompt, text)
        : await this.completeWithAnthropic(systemPrompt, text);

    return parseIntentJson(raw.trim());
  }

  private async completeWithOpenAI(systemPrompt: string, text: string): Promise<string> {
    if (!this.openai) {
      throw new Error('OpenAI client not initialised');
    }

    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: text },
      ],
      temperature: TEMPERATURE,
      max_tokens: MAX_TOKENS,
      response_format: { type: 'json_object' },
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new IntentParseError('Empty response from OpenAI', '');
    }
    return content;
  }

  private async completeWithAnthropic(systemPrompt: string, text: string): Promise<string> {
    if (!this.anthropic) {
      throw new Error('Anthropic client not initialised');
    }

    const response = await this.anthropic.messages.create({
      model: this.model,
      max_tokens: MAX_TOKENS,
      temperature: TEMPERATURE,
      system: systemPrompt,
      messages: [{ role: 'user', content: text }],
    });

    const content = response.content[0];
    if (!content || content.type !== 'text') {
      throw new IntentParseError('Unexpected response type from Anthropic', '');
    }
    return content.text;
  }
}

export interface IntentParserConfig {
  AI_PROVIDER: AIProvider;
  AI_API_KEY?: string | undefined;
  AI_MODEL?: string | undefined;
  AI_TIMEOUT_MS: number;
}

/**
 * Build the configured parser. A provider-specific key
 * (OPENAI_API_KEY / ANTHROPIC_API_KEY) wins over AI_API_KEY.
 *
 * @throws Error when no key is configured for the provider
 */
export function createIntentParser(
  config: IntentParserConfig,
  env: NodeJS.ProcessEnv = process.env
): IntentParser {
  const provider = config.AI_PROVIDER;
  const specificKey = provider === 'openai' ? env.OPENAI_API_KEY : env.ANTHROPIC_API_KEY;
  const apiKey = specificKey || config.AI_API_KEY;

  if (!apiKey) {
    const keyName = provider === 'openai' ? 'OPENAI_API_KEY' : 'ANTHROPIC_API_KEY';
    throw new Error(`${keyName} or AI_API_KEY environment variable is required`);
  }

  return new AiIntentParser({
    provider,
    apiKey,
    model: config.AI_MODEL,
    timeoutMs: config.AI_TIMEOUT_MS,
  });
}
