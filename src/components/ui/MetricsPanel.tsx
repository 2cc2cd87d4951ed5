"use client";

import { motion, AnimatePresence } from "framer-motion";

export interface Metric {
  label: string;
  value: string | number;
  color?: string;
  icon?: React.ReactNode;
}

interface MetricsPanelProps {
  metrics: Metric[];
  visible: boolean;
}

export default function MetricsPanel({ metrics, visible }: MetricsPanelProps) {
  return (
    <AnimatePresence>
      {visible && (
        <motion.div
          initial={{ opacity: 0, height: 0 }}
          animate={{ opacity: 1, height: "auto" }}
          exit={{ opacity: 0, height: 0 }}
          transition={{ duration: 0.2 }}
          className="overflow-hidden"
        >
          <div className="grid grid-cols-2 sm:grid-cols-3 lg:grid-cols-5 gap-3">
            {metrics.map((metric) => (
              <div key={metric.label} className="p-3 rounded-xl bg-[#111118] border border-[#1e1e2e]">
                <div
                  className="flex items-center gap-1.5 text-[10px] uppercase tracking-wider font-medium mb-1"
                  style={{ color: metric.color || "#71717a" }}
                >
                  {metric.icon}
                  {metric.label}
                </div>
                <div className="text-xl font-bold font-mono text-white">{metric.value}</div>
              </div>
            ))}
          </div>
        </motion.div>
      )}
    </AnimatePresence>
  );
}
