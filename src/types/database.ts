/**
 * Database row types. These mirror actual Supabase table schemas.
 * Column names use snake_case to match PostgreSQL conventions.
 * Timestamps travel as ISO-8601 strings.
 */

export interface MessageRow {
  chat_id: number;
  message_id: number;
  user_id: number;
  user_name: string;
  text: string;
  sent_at: string;
  reactions: Record<string, number>;
  is_question: boolean;
  is_answer: boolean;
  answers_message_id: number | null;
  created_at: string;
}

export type NewMessageRow = Omit<
  MessageRow,
  'is_question' | 'is_answer' | 'answers_message_id' | 'created_at'
>;

export interface MessageAnnotationRow {
  message_id: number;
  is_question: boolean;
  is_answer: boolean;
  answers_message_id: number | null;
}

export interface ChatRow {
  chat_id: number;
  name: string;
  enabled: boolean;
  last_report_sent: string | null;
  created_at: string;
}

export interface ReportRow {
  id: string;
  chat_id: number;
  report_date: string;
  questions_count: number;
  answered_count: number;
  unanswered_count: number;
  avg_response_time_minutes: number | null;
  body: string;
  sent_at: string | null;
  created_at: string;
}

export type NewReportRow = Omit<ReportRow, 'id' | 'sent_at' | 'created_at'>;
