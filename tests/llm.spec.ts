import { describe, it, expect } from 'vitest';
import { generateAnswer, renderPrompt, NOT_IN_TRANSCRIPT } from '../src/lib/llm.js';
import { RecordingChatModel } from './helpers/fakes.js';

describe('renderPrompt', () => {
  it('puts retrieved context and the question at the end of the retrieval prompt', async () => {
    const prompt = await renderPrompt('rag', { context: 'chunk one\n\nchunk two', question: 'What is proofing?' });
    expect(prompt.startsWith('You are a helpful YouTube Video Assistant.')).toBe(true);
    expect(prompt.endsWith(
      'Context from video transcript:\nchunk one\n\nchunk two\n\nQuestion: What is proofing?\n\nDetailed Answer:',
    )).toBe(true);
  });

  it('puts the whole transcript in the full-transcript prompt', async () => {
    const prompt = await renderPrompt('full', { context: 'the entire transcript', question: 'Who is speaking?' });
    expect(prompt.endsWith(
      'VIDEO TRANSCRIPT:\nthe entire transcript\n\nUSER QUESTION: Who is speaking?\n\nDETAILED ANSWER:',
    )).toBe(true);
  });

  it('tells the model to say when the answer is missing, in both modes', async () => {
    for (const mode of ['rag', 'full'] as const) {
      const prompt = await renderPrompt(mode, { context: 'c', question: 'q' });
      expect(prompt).toContain(`clearly state: "${NOT_IN_TRANSCRIPT}"`);
      expect(prompt).toContain('Use ONLY the information');
    }
  });

  it('inserts braces in the context literally', async () => {
    const prompt = await renderPrompt('rag', { context: 'a {placeholder} here', question: 'q' });
    expect(prompt).toContain('Context from video transcript:\na {placeholder} here\n');
  });
});

describe('generateAnswer', () => {
  it('sends the rendered prompt once and returns the reply unmodified', async () => {
    const model = new RecordingChatModel('The starter needs feeding daily. Quote: "feed the starter daily"');
    const input = { context: 'feed the starter daily', question: 'How often do I feed it?' };

    const answer = await generateAnswer(model, 'rag', input);

    expect(answer).toBe('The starter needs feeding daily. Quote: "feed the starter daily"');
    expect(model.prompts).toEqual([await renderPrompt('rag', input)]);
  });

  it('propagates model failures', async () => {
    const model = new RecordingChatModel(new Error('API key not valid'));
    await expect(generateAnswer(model, 'full', { context: 'c', question: 'q' })).rejects.toThrow('API key not valid');
    expect(model.prompts).toHaveLength(1);
  });
});
