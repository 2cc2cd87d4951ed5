'use client';

import { useState, useCallback } from 'react';
import { motion } from 'framer-motion';
import { Activity, CheckCircle2, Cpu, Hash, Info, Layers } from 'lucide-react';
import Navbar from '@/components/layout/Navbar';
import { Footer } from '@/components/layout/Footer';
import ModuleControls from '@/components/ui/ModuleControls';
import ModuleHeader from '@/components/ui/ModuleHeader';
import MetricsPanel from '@/components/ui/MetricsPanel';
import CpuPanel from '@/components/fifo/CpuPanel';
import ReadyQueuePanel from '@/components/fifo/ReadyQueuePanel';
import EventLogPanel from '@/components/fifo/EventLogPanel';
import QueuePresetSelector, { type QueuePreset } from '@/components/fifo/QueuePresetSelector';
import { useFifoScheduler } from '@/hooks/useFifoScheduler';
import type { SchedulerConfigInput } from '@/lib/fifo/config';
import { getModule } from '@/lib/domains';

// ──────────────────────────── Constants ────────────────────────────

const SCHEDULER_CONFIG: SchedulerConfigInput = {
  executionMs: 2000,
  pauseMs: 500,
};

const QUEUE_PRESETS: QueuePreset[] = [
  { id: 'three', label: '3 Processes', description: 'A short queue', count: 3 },
  { id: 'five', label: '5 Processes', description: 'A medium queue', count: 5 },
  { id: 'eight', label: '8 Processes', description: 'A long line waiting for the CPU', count: 8 },
];

const STATE_COLORS = {
  Idle: '#71717a',
  Running: '#f59e0b',
  Busy: '#10b981',
} as const;

const moduleEntry = getModule('3.2');

// ──────────────────────────── Component ────────────────────────────

export default function FifoSchedulingModule() {
  const {
    queue, onCpu, isRunning, completed, enqueuedTotal, log, speed,
    enqueue, start, cancel, reset, setSpeed,
  } = useFifoScheduler({ config: SCHEDULER_CONFIG });
  const [showMetrics, setShowMetrics] = useState(true);
  const [activePreset, setActivePreset] = useState<string | null>(null);

  const controllerState: keyof typeof STATE_COLORS = !isRunning ? 'Idle' : onCpu ? 'Busy' : 'Running';
  const executionMs = (SCHEDULER_CONFIG.executionMs ?? 2000) / speed;

  const loadPreset = useCallback((preset: QueuePreset) => {
    reset();
    for (let i = 0; i < preset.count; i++) enqueue();
    setActivePreset(preset.id);
  }, [reset, enqueue]);

  const handleReset = useCallback(() => {
    reset();
    setActivePreset(null);
  }, [reset]);

  // ──────────────────────────── Render ────────────────────────────

  return (
    <div className="min-h-screen bg-[#0a0a0f] text-white">
      <Navbar />

      <main className="pt-14">
        <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-6">
          {/* ── Header ── */}
          {moduleEntry && (
            <div className="mb-6">
              <ModuleHeader mod={moduleEntry.module} domain={moduleEntry.domain}>
                Processes join the <span className="text-[#f59e0b] font-mono">tail</span> of the ready
                queue and the CPU always takes the <span className="text-[#10b981] font-mono">head</span>.
                Each one runs for a fixed burst, then the dispatcher pauses briefly before picking the next.
              </ModuleHeader>
            </div>
          )}

          {/* ── Controls Bar ── */}
          <div className="mb-6">
            <ModuleControls
              isRunning={isRunning}
              onStart={start}
              onCancel={cancel}
              onEnqueue={enqueue}
              onReset={handleReset}
              speed={speed}
              onSpeedChange={setSpeed}
              showMetrics={showMetrics}
              onToggleMetrics={() => setShowMetrics(!showMetrics)}
            />
          </div>

          {/* ── Scenarios ── */}
          <div className="mb-6">
            <QueuePresetSelector
              presets={QUEUE_PRESETS}
              activePresetId={activePreset}
              onSelect={loadPreset}
              disabled={isRunning}
            />
          </div>

          {/* ── Metrics Bar ── */}
          <div className="mb-6">
            <MetricsPanel
              visible={showMetrics}
              metrics={[
                { label: 'State', value: controllerState, color: STATE_COLORS[controllerState], icon: <Activity size={12} /> },
                { label: 'Queue Length', value: queue.length, color: '#f59e0b', icon: <Layers size={12} /> },
                { label: 'On CPU', value: onCpu?.id ?? '--', color: '#10b981', icon: <Cpu size={12} /> },
                { label: 'Enqueued', value: enqueuedTotal, color: '#6366f1', icon: <Hash size={12} /> },
                { label: 'Completed', value: completed.length, color: '#06b6d4', icon: <CheckCircle2 size={12} /> },
              ]}
            />
          </div>

          {/* ── Visualization ── */}
          <div className="grid grid-cols-1 lg:grid-cols-3 gap-6">
            <div className="lg:col-span-2 space-y-6">
              <div className="grid grid-cols-1 sm:grid-cols-3 gap-6">
                <CpuPanel onCpu={onCpu} isRunning={isRunning} executionMs={executionMs} />
                <div className="sm:col-span-2">
                  <ReadyQueuePanel queue={queue} />
                </div>
              </div>

              {/* ── Completed ── */}
              <div className="p-4 rounded-xl bg-[#111118] border border-[#1e1e2e]">
                <h3 className="text-sm font-semibold text-[#a1a1aa] mb-3 flex items-center gap-2">
                  <CheckCircle2 size={14} className="text-[#06b6d4]" />
                  Completed (in order)
                </h3>
                {completed.length === 0 ? (
                  <p className="text-xs text-[#71717a] italic py-2 text-center">Nothing has run yet</p>
                ) : (
                  <div className="flex flex-wrap gap-1.5">
                    {completed.map((proc, idx) => (
                      <motion.span
                        key={`${proc.id}-${idx}`}
                        initial={{ opacity: 0, y: 4 }}
                        animate={{ opacity: 1, y: 0 }}
                        className="px-2 py-1 rounded-md bg-[#0f0f17] border border-[#1e1e2e] text-xs font-mono text-[#a1a1aa]"
                      >
                        {proc.id}
                      </motion.span>
                    ))}
                  </div>
                )}
              </div>
            </div>

            <div className="space-y-6">
              <EventLogPanel events={log} />

              {/* ── How it works ── */}
              <div className="p-4 rounded-xl bg-[#111118] border border-[#1e1e2e]">
                <h3 className="text-sm font-semibold text-[#a1a1aa] mb-3 flex items-center gap-2">
                  <Info size={14} className="text-[#6366f1]" />
                  How it works
                </h3>
                <ul className="space-y-2 text-xs text-[#a1a1aa]">
                  <li><span className="font-mono text-[#f59e0b]">enqueue</span> appends to the tail in O(1).</li>
                  <li><span className="font-mono text-[#10b981]">dequeue</span> removes the head in O(1).</li>
                  <li>A run never blocks the page: each burst and pause is a timer callback.</li>
                  <li>Adding processes is locked while a run is in progress.</li>
                </ul>
              </div>
            </div>
          </div>
        </div>
      </main>

      <Footer />
    </div>
  );
}
