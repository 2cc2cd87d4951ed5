import type { ProcessRecord } from '@/lib/fifo/types';

export const PROCESS_COLORS = [
  '#6366f1', '#06b6d4', '#10b981', '#f59e0b', '#ef4444', '#a855f7',
];

export function processColor(record: ProcessRecord): string {
  return PROCESS_COLORS[(record.sequenceNumber - 1) % PROCESS_COLORS.length];
}
