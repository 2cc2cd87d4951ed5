'use client';

import { motion, AnimatePresence } from 'framer-motion';
import { Clock } from 'lucide-react';
import type { LogEvent, LogLevel } from '@/lib/logging/logger';

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '#71717a',
  info: '#06b6d4',
  warn: '#f59e0b',
  error: '#ef4444',
};

interface EventLogPanelProps {
  events: LogEvent[];
}

export default function EventLogPanel({ events }: EventLogPanelProps) {
  return (
    <div className="p-4 rounded-xl bg-[#111118] border border-[#1e1e2e]">
      <h3 className="text-xs uppercase tracking-wider text-[#71717a] font-semibold mb-4 flex items-center gap-2">
        <Clock size={14} className="text-[#06b6d4]" />
        Event Log
      </h3>

      {events.length === 0 ? (
        <p className="text-xs text-[#71717a] italic py-4 text-center">
          No events yet. Add a process.
        </p>
      ) : (
        <div className="max-h-[240px] overflow-y-auto space-y-1">
          <AnimatePresence>
            {[...events].reverse().slice(0, 30).map(evt => (
              <motion.div
                key={evt.id}
                initial={{ opacity: 0, y: -4 }}
                animate={{ opacity: 1, y: 0 }}
                className="flex items-center gap-2 px-3 py-1.5 rounded-lg bg-[#0f0f17] border border-[#1e1e2e]/50"
              >
                <span className="text-[10px] font-mono text-[#71717a] w-16 shrink-0">
                  {evt.createdAt.slice(11, 19)}
                </span>
                <span
                  className="text-[10px] font-mono font-bold uppercase w-10 shrink-0"
                  style={{ color: LEVEL_COLORS[evt.level] }}
                >
                  {evt.level}
                </span>
                <span className="text-[10px] font-mono text-[#e4e4e7] truncate">{evt.message}</span>
              </motion.div>
            ))}
          </AnimatePresence>
        </div>
      )}
    </div>
  );
}
