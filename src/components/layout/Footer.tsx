'use client';

import { BookOpen, Layers, Cpu } from 'lucide-react';

const concepts = [
  { icon: Layers, label: 'Enqueue at tail', color: '#f59e0b' },
  { icon: Cpu, label: 'Dequeue at head', color: '#10b981' },
];

export function Footer() {
  return (
    <footer className="mt-20 border-t border-[#1e1e2e]">
      <div className="max-w-6xl mx-auto px-4 sm:px-6 py-10">
        <div className="flex flex-col items-center gap-6">
          <div className="flex items-center gap-3">
            <div className="w-10 h-10 rounded-xl flex items-center justify-center bg-gradient-to-br from-[#6366f1] to-[#06b6d4]">
              <BookOpen className="w-5 h-5 text-white" />
            </div>
            <div>
              <p className="text-sm font-semibold text-white">FIFO Scheduler Lab</p>
              <p className="text-xs" style={{ color: '#64748b' }}>First in, first out</p>
            </div>
          </div>

          <div className="flex flex-wrap items-center justify-center gap-2.5">
            {concepts.map((concept) => (
              <span
                key={concept.label}
                className="flex items-center gap-2 px-3.5 py-2 rounded-xl border"
                style={{
                  backgroundColor: `${concept.color}10`,
                  borderColor: `${concept.color}25`,
                }}
              >
                <concept.icon className="w-4 h-4" style={{ color: concept.color }} />
                <span className="text-sm font-medium" style={{ color: '#94a3b8' }}>
                  {concept.label}
                </span>
              </span>
            ))}
          </div>

          <p className="text-xs text-center" style={{ color: '#374151' }}>
            An interactive walkthrough of a single ready queue
          </p>
        </div>
      </div>
    </footer>
  );
}
