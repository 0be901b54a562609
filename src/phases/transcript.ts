import type { Message } from '../types.js';

export function formatMessageLine(message: Message): string {
  return `${message.speaker}: ${message.content}`;
}

export function formatTranscript(messages: readonly Message[], emptyText = '(nothing yet)'): string {
  if (messages.length === 0) return emptyText;
  return messages.map(formatMessageLine).join('\n');
}

/** Clue and discussion messages: what players reason over before voting. */
export function publicTalk(messages: readonly Message[]): Message[] {
  return messages.filter(m => m.phase === 'clue' || m.phase === 'discussion');
}
