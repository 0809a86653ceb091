import { getOrCreateCounter } from './registry';

export const questionsSubmittedTotal = getOrCreateCounter(
  'qa_questions_submitted_total',
  'Questions submitted by stored status',
  ['status']
);

export const moderationDecisionsTotal = getOrCreateCounter(
  'qa_moderation_decisions_total',
  'Instructor moderation decisions',
  ['decision']
);

export const voteTogglesTotal = getOrCreateCounter(
  'qa_vote_toggles_total',
  'Vote toggles by result',
  ['result']
);

export const meetingTransitionsTotal = getOrCreateCounter(
  'qa_meeting_transitions_total',
  'Meeting lifecycle transitions',
  ['transition']
);
