'use client';

import { Beaker } from 'lucide-react';
import { PROCESS_COLORS } from './colors';

export interface QueuePreset {
  id: string;
  label: string;
  /** Processes enqueued, in order, after a reset. */
  count: number;
  description?: string;
}

interface QueuePresetSelectorProps {
  presets: readonly QueuePreset[];
  activePresetId: string | null;
  onSelect: (preset: QueuePreset) => void;
  disabled?: boolean;
}

export default function QueuePresetSelector({
  presets,
  activePresetId,
  onSelect,
  disabled = false,
}: QueuePresetSelectorProps) {
  return (
    <div className="flex items-center gap-2">
      <div className="flex items-center gap-1.5 text-xs text-[#71717a] mr-1 uppercase tracking-wider font-medium">
        <Beaker size={14} />
        <span>Load Queue</span>
      </div>
      <div className="flex gap-1.5 flex-wrap">
        {presets.map((preset) => {
          const active = activePresetId === preset.id;
          return (
            <button
              key={preset.id}
              onClick={() => onSelect(preset)}
              disabled={disabled}
              aria-pressed={active}
              title={preset.description}
              className={`flex items-center gap-2 px-3 py-1.5 rounded-lg text-xs font-medium transition-all duration-200 disabled:opacity-40 disabled:pointer-events-none ${
                active
                  ? 'bg-[#6366f1]/15 text-[#6366f1] border border-[#6366f1]/30'
                  : 'bg-[#1e1e2e] text-[#a1a1aa] border border-transparent hover:bg-[#2a2a3e] hover:text-white'
              }`}
            >
              {preset.label}
              {/* one dot per process, in arrival colours */}
              <span className="flex gap-0.5" aria-hidden="true">
                {Array.from({ length: preset.count }, (_, i) => (
                  <span
                    key={i}
                    className="w-1.5 h-1.5 rounded-full"
                    style={{ backgroundColor: PROCESS_COLORS[i % PROCESS_COLORS.length] }}
                  />
                ))}
              </span>
            </button>
          );
        })}
      </div>
    </div>
  );
}
