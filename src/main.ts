#!/usr/bin/env node
/**
 * Main entry point: interactive terminal loop over one TranscriptSession.
 *
 * Usage: npm start
 */
import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { loadConfig, describeStartupError, type AppConfig } from './lib/config.js';
import { createSession, type TranscriptSession, type StatusLevel } from './lib/session.js';
import { previewTranscript } from './lib/transcript.js';
import type { SessionError } from '../shared/types.js';

const HELP = `Commands:
  :load <url|id>   fetch and process a video transcript
  :preview         show the first 2000 characters of the transcript
  :clear           forget the current video
  :help            show this help
  :quit            exit
Anything else is a question about the loaded video.`;

function setStatus(text: string, level: StatusLevel) {
  console.log(`[${level}] ${text}`);
}

function printError(error: SessionError) {
  console.log(`❌ ${error.message}`);
  if (error.hint) console.log(`💡 ${error.hint}`);
}

async function handleLoad(session: TranscriptSession, input: string) {
  if (!input) {
    console.log('Usage: :load <url|id>');
    return;
  }
  const outcome = await session.load(input);
  if (!outcome.ok) {
    printError(outcome.error);
    return;
  }

  const summary = outcome.value;
  if (session.mode === 'rag') {
    console.log(`✅ Transcript successfully processed! Split into ${summary.chunkCount} chunks.`);
  } else {
    console.log('✅ Transcript successfully fetched!');
  }
  console.log(`📝 Transcript length: ${summary.transcriptLength} characters`);
  console.log(`\n📄 Transcript preview:\n${summary.preview}`);
  if (summary.longTranscript && session.mode === 'full') {
    console.log('⚠️ This transcript is quite long. For very long videos, responses might be slower or hit token limits.');
  }
}

async function handleQuestion(session: TranscriptSession, question: string) {
  const outcome = await session.ask(question);
  if (!outcome.ok) {
    printError(outcome.error);
    return;
  }
  console.log('\n🤖 AI Response:\n');
  console.log(outcome.value.answer);
  console.log(`\n(${outcome.value.sources.length} chunks, ${outcome.value.latency.totalMs}ms)`);
}

async function run(config: AppConfig) {
  const session = createSession(config);
  session.on('status', ({ message, level }) => {
    // Failures are printed from the returned outcome
    if (level !== 'error') setStatus(message, level);
  });

  console.log('🎥 Video Transcript Chat Assistant');
  console.log(`Mode: ${config.answerMode} · model: ${config.chatModel}`);
  console.log(HELP);

  const rl = createInterface({ input: stdin, output: stdout });
  try {
    while (true) {
      let line: string;
      try {
        line = (await rl.question('\n> ')).trim();
      } catch {
        break; // stdin closed
      }
      if (!line) continue;

      const [command, ...rest] = line.split(/\s+/);
      const arg = rest.join(' ');
      switch (command) {
        case ':quit':
        case ':exit':
          return;
        case ':help':
          console.log(HELP);
          break;
        case ':load':
          await handleLoad(session, arg);
          break;
        case ':clear':
          await session.clear();
          break;
        case ':preview': {
          const transcript = session.transcript;
          console.log(transcript ? previewTranscript(transcript.text) : 'No transcript loaded.');
          break;
        }
        default:
          await handleQuestion(session, line);
      }
    }
  } finally {
    rl.close();
  }
}

try {
  await run(loadConfig());
} catch (err) {
  console.error(describeStartupError(err));
  process.exitCode = 1;
}
