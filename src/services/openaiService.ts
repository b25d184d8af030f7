import OpenAI from 'openai';
import { AIConfig } from '../types/aiConfig';
import { DialogueModel } from '../types/collaborators';
import { DialogueTurn } from '../types/conversation';
import { ConfigLoader, createConfigLoaderFromEnv } from '../utils/configLoader';
import { DialogueModelError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { cleanModelReply } from '../utils/responseCleaner';

const DEFAULT_SYSTEM_PROMPT =
  'You are {chatbotName}, a practical farming assistant for smallholder maize and coffee farmers. Keep answers short and actionable.';

export interface OpenAIConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

/**
 * Dialogue model backed by the OpenAI chat completions API. No retries: a
 * failed or timed-out request surfaces as `DialogueModelError`.
 */
export class OpenAIService implements DialogueModel {
  private openai: OpenAI;
  private config: OpenAIConfig;
  private systemPrompt: string;

  constructor(config: AIConfig, chatbotName: string = 'Shamba') {
    this.config = {
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      model: config.model || 'gpt-4o',
      temperature: config.temperature ?? 0.7,
      maxTokens: config.maxTokens || 1024,
      timeoutMs: config.timeoutMs || 30000
    };
    this.systemPrompt = (config.prompts?.system || DEFAULT_SYSTEM_PROMPT).replace(/\{chatbotName\}/g, chatbotName);

    this.openai = new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseURL,
      timeout: this.config.timeoutMs,
      maxRetries: 0
    });
  }

  async respond(turns: DialogueTurn[]): Promise<string> {
    const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [
      { role: 'system', content: this.systemPrompt },
      ...turns.map((turn): OpenAI.Chat.Completions.ChatCompletionMessageParam =>
        turn.role === 'user'
          ? { role: 'user', content: turn.content }
          : { role: 'assistant', content: turn.content }
      )
    ];

    let content: string | null | undefined;
    try {
      const response = await this.openai.chat.completions.create({
        model: this.config.model,
        messages,
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      logger.logError('Dialogue model request failed', describeError(error));
      throw new DialogueModelError('Failed to generate response from OpenAI', error);
    }

    const reply = cleanModelReply(content ?? '');
    if (!reply) {
      throw new DialogueModelError('OpenAI returned an empty completion');
    }

    logger.logAIResponse(`AI response generated: ${reply.substring(0, 100)}${reply.length > 100 ? '...' : ''}`, {
      model: this.config.model,
      turns: turns.length
    });
    return reply;
  }
}

export function createOpenAIServiceFromConfig(
  chatbotName?: string,
  configLoader: ConfigLoader = createConfigLoaderFromEnv()
): OpenAIService {
  return new OpenAIService(configLoader.loadConfig(), chatbotName);
}
