/**
 * Supabase implementation of IFeedbackRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IFeedbackRepository } from './IFeedbackRepository.js';
import type { FeedbackRow, NewFeedbackRow } from '../types/database.js';

export class SupabaseFeedbackRepository implements IFeedbackRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: NewFeedbackRow): Promise<FeedbackRow> {
    const { data, error } = await this.db
      .from('feedback')
      .insert(row)
      .select()
      .single<FeedbackRow>();

    if (error) throw new Error(`Failed to insert feedback: ${error.message}`);
    if (!data) throw new Error('Failed to insert feedback: no row returned');
    return data;
  }

  async findById(id: string): Promise<FeedbackRow | null> {
    const { data, error } = await this.db
      .from('feedback')
      .select('*')
      .eq('id', id)
      .maybeSingle<FeedbackRow>();

    if (error) throw new Error(`Failed to find feedback: ${error.message}`);
    return data;
  }

  async updateStatus(id: string, status: string): Promise<FeedbackRow | null> {
    const { data, error } = await this.db
      .from('feedback')
      .update({ status, updated_at: new Date().toISOString() })
      .eq('id', id)
      .select()
      .maybeSingle<FeedbackRow>();

    if (error) throw new Error(`Failed to update feedback status: ${error.message}`);
    return data;
  }

  async countByCitizen(citizenRef: string): Promise<number> {
    const { count, error } = await this.db
      .from('feedback')
      .select('id', { count: 'exact', head: true })
      .eq('citizen_ref', citizenRef);

    if (error) throw new Error(`Failed to count feedback: ${error.message}`);
    return count ?? 0;
  }

  async findSubmittedBetween(start: string, end: string): Promise<FeedbackRow[]> {
    const { data, error } = await this.db
      .from('feedback')
      .select('*')
      .gte('submitted_at', start)
      .lte('submitted_at', end)
      .order('submitted_at', { ascending: true })
      .returns<FeedbackRow[]>();

    if (error) throw new Error(`Failed to list feedback: ${error.message}`);
    return data ?? [];
  }
}
