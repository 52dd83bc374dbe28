/**
 * Hosted chat model wrapper: prompt templates for both answering modes and
 * a single completion call per question.
 */
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { PromptTemplate } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { AnswerMode } from '../../shared/types.js';
import type { AppConfig } from './config.js';

// ── Prompts ──────────────────────────────────────────────────────────

export const NOT_IN_TRANSCRIPT = 'This information is not available in the video transcript.';

const FULL_TRANSCRIPT_PROMPT = `You are a helpful YouTube Video Assistant. Answer the user's question based on the video transcript below.

IMPORTANT INSTRUCTIONS:
- Use ONLY the information from the video transcript provided
- Provide detailed, well-structured answers
- If the answer cannot be found in the transcript, clearly state: "${NOT_IN_TRANSCRIPT}"
- Be conversational and helpful
- Quote relevant parts when helpful

VIDEO TRANSCRIPT:
{context}

USER QUESTION: {question}

DETAILED ANSWER:`;

const RETRIEVAL_PROMPT = `You are a helpful YouTube Video Assistant. Your job is to answer questions based on the video transcript provided.

IMPORTANT INSTRUCTIONS:
- Use ONLY the information from the context (video transcript) below
- Provide detailed, well-structured answers
- If the answer cannot be found in the transcript, clearly state: "${NOT_IN_TRANSCRIPT}"
- Quote relevant parts when helpful
- Be conversational and helpful

Context from video transcript:
{context}

Question: {question}

Detailed Answer:`;

const PROMPTS: Record<AnswerMode, PromptTemplate> = {
  full: PromptTemplate.fromTemplate(FULL_TRANSCRIPT_PROMPT),
  rag: PromptTemplate.fromTemplate(RETRIEVAL_PROMPT),
};

export const ANSWER_HINT = 'Try rephrasing your question or check your API key.';

// ── Model ────────────────────────────────────────────────────────────

export function createChatModel(
  config: Pick<AppConfig, 'googleApiKey' | 'chatModel' | 'temperature'>,
): BaseChatModel {
  return new ChatGoogleGenerativeAI({
    apiKey: config.googleApiKey,
    model: config.chatModel,
    temperature: config.temperature,
    maxRetries: 0,
  });
}

/** Render the prompt for a mode without calling the model */
export async function renderPrompt(
  mode: AnswerMode,
  input: { context: string; question: string },
): Promise<string> {
  return PROMPTS[mode].format(input);
}

/**
 * Generate an answer from the supplied context.
 * The model's reply text is returned unmodified; errors propagate to the caller.
 */
export async function generateAnswer(
  model: BaseChatModel,
  mode: AnswerMode,
  input: { context: string; question: string },
): Promise<string> {
  const chain = PROMPTS[mode].pipe(model).pipe(new StringOutputParser());
  return chain.invoke(input);
}
