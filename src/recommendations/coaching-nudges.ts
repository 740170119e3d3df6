/**
 * Coaching nudges for an agent, picked from a fixed catalogue.
 *
 * Selection is deterministic: the call's customer sentiment and agent talk
 * ratio choose the leading nudges, and the rest are filled in catalogue
 * order starting at an offset derived from the call id.
 */

import { CoachingNudge } from './types';
import { CallRecord } from '../ledger/types';
import { agentTalkRatio, truncate } from '../ledger/transcript';
import { hashCallId } from '../streaming/sentiment-sampler';

export const NUDGE_COUNT = 3;
export const SUGGESTION_MAX_LENGTH = 100;

export const COACHING_CATALOGUE: readonly CoachingNudge[] = [
  { title: 'Active Listening', suggestion: 'Ask more follow-up questions to better understand customer needs.' },
  { title: 'Empathy Building', suggestion: 'Acknowledge customer frustrations before offering solutions.' },
  { title: 'Solution Focus', suggestion: 'Provide clear next steps and timeline for resolution.' },
  { title: 'Rapport Building', suggestion: "Use customer's name and reference previous interactions." },
  { title: 'Clarity Improvement', suggestion: 'Explain technical terms in simple customer language.' },
  { title: 'Problem Resolution', suggestion: 'Confirm understanding before proceeding with solutions.' },
  { title: 'Customer Satisfaction', suggestion: 'Check customer satisfaction before ending the call.' },
  { title: 'Professional Tone', suggestion: 'Maintain consistent professional tone throughout the conversation.' },
  { title: 'Call Control', suggestion: 'Guide the conversation while allowing customer to express concerns.' },
  { title: 'Follow-up', suggestion: 'Set clear expectations for follow-up actions and timeline.' },
];

const NEGATIVE_SENTIMENT = -0.2;
const POSITIVE_SENTIMENT = 0.2;
const HIGH_TALK_RATIO = 0.6;
const LOW_TALK_RATIO = 0.4;

function leadingTitles(sentiment: number | undefined, talkRatio: number): string[] {
  const titles: string[] = [];

  if (sentiment !== undefined && sentiment < NEGATIVE_SENTIMENT) {
    titles.push('Empathy Building', 'Problem Resolution');
  } else if (sentiment !== undefined && sentiment >= POSITIVE_SENTIMENT) {
    titles.push('Customer Satisfaction', 'Follow-up');
  }

  if (talkRatio > HIGH_TALK_RATIO) titles.push('Active Listening');
  else if (talkRatio > 0 && talkRatio < LOW_TALK_RATIO) titles.push('Call Control');

  return titles;
}

export function coachingNudges(
  call: Pick<CallRecord, 'callId' | 'transcript' | 'customerSentimentScore' | 'agentTalkRatio'>,
  catalogue: readonly CoachingNudge[] = COACHING_CATALOGUE,
): CoachingNudge[] {
  const talkRatio = call.agentTalkRatio ?? agentTalkRatio(call.transcript);
  const chosen: CoachingNudge[] = [];
  const seen = new Set<string>();

  const take = (nudge: CoachingNudge | undefined): void => {
    if (!nudge || seen.has(nudge.title) || chosen.length >= NUDGE_COUNT) return;
    seen.add(nudge.title);
    chosen.push({ title: nudge.title, suggestion: truncate(nudge.suggestion, SUGGESTION_MAX_LENGTH) });
  };

  for (const title of leadingTitles(call.customerSentimentScore, talkRatio)) {
    take(catalogue.find((n) => n.title === title));
  }

  const offset = catalogue.length > 0 ? hashCallId(call.callId) % catalogue.length : 0;
  for (let i = 0; i < catalogue.length && chosen.length < NUDGE_COUNT; i++) {
    take(catalogue[(offset + i) % catalogue.length]);
  }

  return chosen;
}
