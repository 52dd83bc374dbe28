/**
 * One-shot question about one video: load, ask once, print the answer.
 *
 * Usage: npx tsx scripts/ask-video.ts <url|id> "<question>"
 */
import 'dotenv/config';
import { loadConfig, describeStartupError } from '../src/lib/config.js';
import { createSession, type TranscriptSession } from '../src/lib/session.js';
import type { SessionError } from '../shared/types.js';

function exitWith(error: SessionError): never {
  process.stderr.write(`${error.message}\n`);
  if (error.hint) process.stderr.write(`${error.hint}\n`);
  process.exit(1);
}

const [input, ...questionParts] = process.argv.slice(2);
const question = questionParts.join(' ');

if (!input || !question) {
  process.stderr.write('Usage: npx tsx scripts/ask-video.ts <url|id> "<question>"\n');
  process.exit(2);
}

let session: TranscriptSession;
try {
  session = createSession(loadConfig());
} catch (err) {
  process.stderr.write(`${describeStartupError(err)}\n`);
  process.exit(1);
}

const loaded = await session.load(input);
if (!loaded.ok) exitWith(loaded.error);
process.stderr.write(`Loaded ${loaded.value.label}: ${loaded.value.transcriptLength} chars, ${loaded.value.chunkCount} chunks\n`);

const answered = await session.ask(question);
if (!answered.ok) exitWith(answered.error);

process.stdout.write(answered.value.answer + '\n');
