/**
 * Assistant Gateway
 *
 * Answers course questions by retrieval-augmented generation:
 * embed the query, search the content index, generate from the retrieved
 * passages and the user's profile, then log the turn.
 *
 * Provider failures surface as ServiceUnavailableError tagged with the step
 * that failed. Chat logging is best-effort.
 */

import type { AppConfig } from '@/config';
import {
  InvalidArgumentError,
  NotFoundError,
  ServiceUnavailableError,
  type ProviderStep,
} from '@/errors/appErrors';
import {
  buildAnswerPrompt,
  buildPersonalizePrompt,
  buildTranslatePrompt,
} from '@/services/assistant/prompts';
import type {
  EmbeddingProvider,
  GenerationProvider,
  VectorIndex,
} from '@/services/assistant/types';
import type { SchemaStore } from '@/services/store.service';
import { logger } from '@/utils/logger';

export interface AskInput {
  userId: string | null;
  question: string;
  selectedText?: string | null;
  language: string;
}

export interface AskResult {
  answer: string;
  sources: string[];
}

export interface AssistantGateway {
  ask(input: AskInput): Promise<AskResult>;
  personalize(input: { userId: string; content: string }): Promise<string>;
  translate(input: { content: string; targetLanguage?: string }): Promise<string>;
}

export interface AssistantGatewayDeps {
  store: Pick<SchemaStore, 'getProfile' | 'appendChatMessage'>;
  embeddings: EmbeddingProvider;
  index: VectorIndex;
  generator: GenerationProvider;
  config: AppConfig['assistant'];
}

const STEP_MESSAGES: Record<ProviderStep, string> = {
  embedding: 'Embedding service is unavailable',
  search: 'Content search is unavailable',
  generation: 'Answer generation is unavailable',
};

const assistantLogger = logger.child({ component: 'assistant' });

export function createAssistantGateway(deps: AssistantGatewayDeps): AssistantGateway {
  const { store, embeddings, index, generator, config } = deps;

  async function step<T>(name: ProviderStep, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      assistantLogger.error('Provider call failed', {
        step: name,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new ServiceUnavailableError(name, STEP_MESSAGES[name], { cause: error });
    }
  }

  function assertLanguage(language: string): void {
    if (config.supportedLanguages.length > 0 && !config.supportedLanguages.includes(language)) {
      throw new InvalidArgumentError(
        `Unsupported language "${language}". Supported: ${config.supportedLanguages.join(', ')}`
      );
    }
  }

  return {
    async ask({ userId, question, selectedText, language }) {
      assertLanguage(language);

      const query = selectedText
        ? `Based on this text: '${selectedText}'\n\nQuestion: ${question}`
        : question;
      const vector = await step('embedding', () =>
        embeddings.embed(query, { taskType: 'RETRIEVAL_QUERY' })
      );
      const snippets = await step('search', () => index.search(vector, config.searchLimit));
      const context = snippets.map((snippet) => snippet.text);

      const profile = userId ? await store.getProfile(userId) : null;

      const answer = await step('generation', () =>
        generator.generate(
          buildAnswerPrompt({
            subject: config.subject,
            question,
            context,
            profile,
            selectedText,
            language,
          })
        )
      );

      try {
        await store.appendChatMessage({
          userId,
          message: question,
          response: answer,
          contextUsed: context.length > 0 ? context.join('\n\n') : null,
          language,
        });
      } catch (error) {
        assistantLogger.error('chat_log_failed', {
          userId,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      const sources = [
        ...new Set(
          snippets
            .map((snippet) => snippet.source)
            .filter((source): source is string => source !== null)
        ),
      ];

      return { answer, sources };
    },

    async personalize({ userId, content }) {
      const profile = await store.getProfile(userId);
      if (!profile) {
        throw new NotFoundError('User profile not found');
      }
      return step('generation', () => generator.generate(buildPersonalizePrompt(content, profile)));
    },

    async translate({ content, targetLanguage = 'ur' }) {
      assertLanguage(targetLanguage);
      return step('generation', () =>
        generator.generate(buildTranslatePrompt(content, targetLanguage))
      );
    },
  };
}
