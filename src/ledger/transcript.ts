/**
 * Transcript helpers. Transcripts are stored as "Speaker: text" lines.
 */

export interface Utterance {
  speaker: string;
  text: string;
}

const SNIPPET_MAX_LENGTH = 160;

const FILLER_WORDS = new Set([
  'um', 'uh', 'er', 'ah', 'like', 'basically', 'actually',
]);

export function parseTranscript(transcript: string): Utterance[] {
  const utterances: Utterance[] = [];
  for (const line of transcript.split('\n')) {
    const idx = line.indexOf(':');
    if (idx <= 0) continue;
    const text = line.slice(idx + 1).trim();
    if (!text) continue;
    utterances.push({ speaker: line.slice(0, idx).trim().toLowerCase(), text });
  }
  return utterances;
}

export function customerUtterances(transcript: string): string[] {
  return parseTranscript(transcript)
    .filter((u) => u.speaker === 'customer')
    .map((u) => u.text);
}

/**
 * The agent's first reply to a customer turn: the line most useful as a
 * "say this next" example. Falls back to the first agent line, then to the
 * first line of any speaker.
 */
export function extractSnippet(transcript: string): string {
  const utterances = parseTranscript(transcript);
  let chosen: Utterance | undefined;

  for (let i = 1; i < utterances.length; i++) {
    if (utterances[i].speaker === 'agent' && utterances[i - 1].speaker === 'customer') {
      chosen = utterances[i];
      break;
    }
  }
  chosen ??= utterances.find((u) => u.speaker === 'agent') ?? utterances[0];
  if (!chosen) return '';

  return truncate(chosen.text, SNIPPET_MAX_LENGTH);
}

/** Share of non-filler words spoken by the agent, 0 when there are none */
export function agentTalkRatio(transcript: string): number {
  let agentWords = 0;
  let totalWords = 0;

  for (const u of parseTranscript(transcript)) {
    const words = (u.text.toLowerCase().match(/\b\w+\b/g) ?? []).filter((w) => !FILLER_WORDS.has(w));
    totalWords += words.length;
    if (u.speaker === 'agent') agentWords += words.length;
  }

  return totalWords > 0 ? agentWords / totalWords : 0;
}

export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, max - 3)}...`;
}
