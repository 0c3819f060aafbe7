import { getOpenAIClient } from "../../clients/openai.js";
import { config } from "../../config/index.js";
import { ANSWER_SYSTEM_PROMPT, buildAnswerUserPrompt } from "../../prompts/index.js";
import type { AnswerGenerator, GeneratedAnswer } from "./types.js";

export class GenerationResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GenerationResponseError";
  }
}

export type AnswerCompletionRequest = {
  model: string;
  temperature: number;
  max_tokens: number;
  messages: Array<{ role: "system"; content: string } | { role: "user"; content: string }>;
};

export type AnswerCompletionResponse = {
  model: string;
  choices: Array<{ message: { content: string | null } }>;
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
};

export interface OpenAIAnswerGeneratorDependencies {
  createCompletion?: (request: AnswerCompletionRequest) => Promise<AnswerCompletionResponse>;
  model?: string;
}

const ANSWER_TEMPERATURE = 0.2;
const ANSWER_MAX_TOKENS = 800;

const createCompletionWithOpenAI = async (request: AnswerCompletionRequest): Promise<AnswerCompletionResponse> => {
  const { client } = await getOpenAIClient();
  return client.chat.completions.create({ ...request, stream: false });
};

export const createOpenAIAnswerGenerator = (dependencies?: OpenAIAnswerGeneratorDependencies): AnswerGenerator => {
  const createCompletion = dependencies?.createCompletion ?? createCompletionWithOpenAI;
  const model = dependencies?.model ?? config.OPENAI_MODEL;

  return {
    async generate(input): Promise<GeneratedAnswer> {
      const completion = await createCompletion({
        model,
        temperature: ANSWER_TEMPERATURE,
        max_tokens: ANSWER_MAX_TOKENS,
        messages: [
          { role: "system", content: ANSWER_SYSTEM_PROMPT },
          { role: "user", content: buildAnswerUserPrompt(input) }
        ]
      });

      const text = completion.choices[0]?.message.content?.trim();
      if (!text) {
        throw new GenerationResponseError("Model returned an empty answer.");
      }

      return {
        text,
        model: completion.model || model,
        usage: {
          promptTokens: completion.usage?.prompt_tokens ?? 0,
          completionTokens: completion.usage?.completion_tokens ?? 0,
          totalTokens: completion.usage?.total_tokens ?? 0
        }
      };
    }
  };
};
