export type VoteToggleResult =
  | { outcome: 'toggled'; questionId: number; upvotes: number; voted: boolean }
  | { outcome: 'not_found' }
  | { outcome: 'not_visible' }
  | { outcome: 'meeting_ended' }
  /** A concurrent toggle by the same student won the race; nothing was written. */
  | { outcome: 'contended' };

export interface VoteRepositoryPort {
  toggleVote(questionId: number, studentId: string): Promise<VoteToggleResult>;
  listVotedQuestionIds(meetingId: number, studentId: string): Promise<number[]>;
  /** Rewrites every question's upvotes from its vote rows; returns the number of rows corrected. */
  reconcileMeeting(meetingId: number): Promise<number>;
}
