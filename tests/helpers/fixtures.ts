import { snippets } from './fakes.js';

export const VOCABULARY = ['river', 'bakery', 'volcano', 'satellite'];

export const TOPIC_LINES = [
  'The river flooded the valley last spring and the river banks eroded quickly.',
  'Our bakery opened at dawn and the bakery sold rye loaves to every neighbour.',
  'A volcano near the town erupted twice and the volcano ash covered the roads.',
  'The satellite launch was delayed because the satellite antenna failed tests.',
];

export const TOPIC_TEXT = TOPIC_LINES.join(' ');

export const topicSnippets = () => snippets(...TOPIC_LINES);

/** Small chunks so the four topics land in several chunks */
export const SMALL_CHUNKS = { chunkSize: 120, chunkOverlap: 20 };
