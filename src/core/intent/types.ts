export type Intent =
  | 'book_consultation'
  | 'practice_areas'
  | 'area_detail'
  | 'attorneys'
  | 'contact_info'
  | 'help'
  | 'small_talk';

export interface ClassificationRequest {
  message: string;
  /** Prior turns. Accepted for API compatibility; classification is single-turn. */
  context?: string[] | null;
}

export interface ClassificationResult {
  reply: string;
  intent: Intent;
  suggestions: string[];
}
