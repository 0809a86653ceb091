export interface ProfanityClassifierPort {
  containsProfanity(text: string): boolean;
  /** Replaces every matched word with `*` repeated to its length. */
  censor(text: string): string;
}
