import { FeedbackRecord } from '../types/feedback.types';

export const EXPORT_COLUMNS = [
  'id',
  'user_name',
  'email',
  'category',
  'rating',
  'message',
  'sentiment',
  'summary',
  'ai_response',
  'recommendations',
  'created_at',
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

export type ExportRow = Record<ExportColumn, string | number | null>;

export function toExportRow(record: FeedbackRecord): ExportRow {
  return {
    id: record.id,
    user_name: record.userName,
    email: record.email ?? null,
    category: record.category,
    rating: record.rating,
    message: record.message,
    sentiment: record.sentiment,
    summary: record.summary,
    ai_response: record.aiResponse,
    recommendations: record.recommendations ?? null,
    created_at: record.createdAt.toISOString(),
  };
}

function csvCell(value: string | number | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function exportCsv(records: FeedbackRecord[]): string {
  const lines = [EXPORT_COLUMNS.join(',')];
  for (const record of records) {
    const row = toExportRow(record);
    lines.push(EXPORT_COLUMNS.map((column) => csvCell(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export function exportJson(records: FeedbackRecord[]): string {
  return JSON.stringify(records.map(toExportRow), null, 2);
}
