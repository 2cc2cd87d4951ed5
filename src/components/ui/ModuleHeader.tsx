"use client";

import { motion } from "framer-motion";
import { ArrowRight } from "lucide-react";
import type { Domain, Module } from "@/lib/domains";

interface ModuleHeaderProps {
  mod: Module;
  domain: Domain;
  children?: React.ReactNode;
}

export default function ModuleHeader({ mod, domain, children }: ModuleHeaderProps) {
  const related = mod.related ?? [];

  return (
    <motion.div
      initial={{ opacity: 0, y: 20 }}
      animate={{ opacity: 1, y: 0 }}
      transition={{ duration: 0.5, ease: "easeOut" }}
      className="space-y-3"
    >
      <div className="flex items-center gap-3 flex-wrap">
        <span
          className="px-2.5 py-0.5 rounded-md text-xs font-mono font-semibold"
          style={{
            backgroundColor: `${domain.color}15`,
            color: domain.color,
            border: `1px solid ${domain.color}30`,
          }}
        >
          {mod.number}
        </span>
        <span className="text-xs text-[#71717a]">{domain.title}</span>
      </div>

      <h1 className="text-2xl font-bold tracking-tight text-white">{mod.title}</h1>
      <div className="text-sm text-[#a1a1aa] max-w-2xl">{children ?? mod.description}</div>

      {related.length > 0 && (
        <div className="flex items-center gap-2 pt-1 text-xs text-[#71717a]">
          <span className="text-[#71717a]/60">Related:</span>
          {related.map((r) => (
            <span key={r} className="text-[#06b6d4] flex items-center gap-1">
              {r} <ArrowRight size={10} />
            </span>
          ))}
        </div>
      )}
    </motion.div>
  );
}
