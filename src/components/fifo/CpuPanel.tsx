'use client';

import { motion, AnimatePresence } from 'framer-motion';
import { Cpu } from 'lucide-react';
import type { ProcessRecord } from '@/lib/fifo/types';
import { processColor } from './colors';

interface CpuPanelProps {
  onCpu: ProcessRecord | null;
  isRunning: boolean;
  /** Real duration of one execution interval, used for the progress bar. */
  executionMs: number;
}

export default function CpuPanel({ onCpu, isRunning, executionMs }: CpuPanelProps) {
  const color = onCpu ? processColor(onCpu) : '#2a2a3e';

  return (
    <div className="p-4 rounded-xl bg-[#111118] border border-[#1e1e2e]">
      <h3 className="text-sm font-semibold text-[#a1a1aa] mb-3 flex items-center gap-2">
        <Cpu size={14} className="text-[#10b981]" />
        CPU
      </h3>

      <div
        data-testid="cpu-slot"
        className="relative h-20 rounded-lg flex items-center justify-center overflow-hidden border transition-colors duration-300"
        style={{
          backgroundColor: onCpu ? `${color}18` : '#0f0f17',
          borderColor: onCpu ? `${color}60` : '#1e1e2e',
        }}
      >
        <AnimatePresence mode="wait">
          {onCpu ? (
            <motion.span
              key={onCpu.id}
              initial={{ opacity: 0, scale: 0.8 }}
              animate={{ opacity: 1, scale: 1 }}
              exit={{ opacity: 0, scale: 0.8 }}
              className="text-xl font-bold font-mono"
              style={{ color }}
            >
              {onCpu.id}
            </motion.span>
          ) : (
            <motion.span
              key="idle"
              initial={{ opacity: 0 }}
              animate={{ opacity: 1 }}
              exit={{ opacity: 0 }}
              className="text-xs font-mono text-[#71717a]"
            >
              {isRunning ? 'switching…' : 'idle'}
            </motion.span>
          )}
        </AnimatePresence>

        {onCpu && (
          <motion.div
            key={`${onCpu.id}-progress`}
            className="absolute bottom-0 left-0 h-1"
            style={{ backgroundColor: color }}
            initial={{ width: '0%' }}
            animate={{ width: '100%' }}
            transition={{ duration: executionMs / 1000, ease: 'linear' }}
          />
        )}
      </div>
    </div>
  );
}
