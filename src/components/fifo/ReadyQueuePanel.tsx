'use client';

import { motion, AnimatePresence } from 'framer-motion';
import { ArrowRight, Layers } from 'lucide-react';
import type { ProcessRecord } from '@/lib/fifo/types';
import { processColor } from './colors';

interface ReadyQueuePanelProps {
  queue: readonly ProcessRecord[];
}

export default function ReadyQueuePanel({ queue }: ReadyQueuePanelProps) {
  return (
    <div className="p-4 rounded-xl bg-[#111118] border border-[#1e1e2e]">
      <div className="flex items-center justify-between mb-3">
        <h3 className="text-sm font-semibold text-[#a1a1aa] flex items-center gap-2">
          <Layers size={14} className="text-[#f59e0b]" />
          Ready Queue (FIFO)
        </h3>
        <span className="text-[10px] font-mono text-[#71717a]">
          head <ArrowRight size={10} className="inline" /> tail
        </span>
      </div>

      {queue.length === 0 ? (
        <p className="text-xs text-[#71717a] italic py-6 text-center">Empty</p>
      ) : (
        <ol aria-label="Ready queue" className="flex items-center gap-2 overflow-x-auto py-2 min-h-[72px]">
          <AnimatePresence initial={false}>
            {queue.map((proc, idx) => {
              const color = processColor(proc);
              return (
                <motion.li
                  key={proc.id}
                  layout
                  initial={{ opacity: 0, x: 16 }}
                  animate={{ opacity: 1, x: 0 }}
                  exit={{ opacity: 0, x: -24 }}
                  className="flex flex-col items-center shrink-0"
                >
                  <div
                    className="w-14 h-12 rounded-lg flex items-center justify-center font-mono text-sm font-bold"
                    style={{
                      backgroundColor: `${color}20`,
                      color,
                      border: `1px solid ${color}40`,
                    }}
                  >
                    {proc.id}
                  </div>
                  <span className="mt-1 text-[9px] font-mono text-[#71717a]">
                    {idx === 0 ? 'next' : `#${idx + 1}`}
                  </span>
                </motion.li>
              );
            })}
          </AnimatePresence>
        </ol>
      )}
    </div>
  );
}
