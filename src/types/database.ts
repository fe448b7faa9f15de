/**
 * Database row types: mirror the Supabase `feedback` table.
 * Column names use snake_case to match PostgreSQL conventions.
 */

export interface FeedbackRow {
  id: string;
  text: string;
  submitted_at: string;
  citizen_ref: string | null;
  category: string;
  urgency: string;
  is_spam: boolean;
  confidence: number;
  classification_source: string;
  citizen_message: string;
  action_plan: string[];
  guidance_source: string;
  priority_score: number;
  status: string;
  created_at: string;
  updated_at: string;
}

export type NewFeedbackRow = Omit<FeedbackRow, 'id' | 'created_at' | 'updated_at'>;
