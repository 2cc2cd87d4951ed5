"use client";

import Link from "next/link";
import { useRef } from "react";
import { motion, useInView } from "framer-motion";
import { Monitor, ArrowRight, ChevronRight, BookOpen, type LucideIcon } from "lucide-react";
import Navbar from "@/components/layout/Navbar";
import { Footer } from "@/components/layout/Footer";
import { domains, availableModules } from "@/lib/domains";

const iconMap: Record<string, LucideIcon> = {
  Monitor,
};

const totalModules = domains.reduce((sum, d) => sum + d.modules.length, 0);

export default function HomePage() {
  const domainsRef = useRef<HTMLDivElement>(null);
  const firstModule = availableModules[0];

  const scrollToDomains = () => {
    domainsRef.current?.scrollIntoView({ behavior: "smooth" });
  };

  return (
    <div className="min-h-screen bg-background">
      <Navbar />

      {/* ── Hero ── */}
      <section className="relative pt-14 overflow-hidden">
        <div className="absolute inset-0 bg-grid opacity-60" />
        <div className="absolute inset-0 bg-[radial-gradient(ellipse_at_center,rgba(99,102,241,0.08)_0%,transparent_70%)]" />
        <div className="absolute bottom-0 left-0 right-0 h-40 bg-gradient-to-t from-background to-transparent" />

        <div className="relative max-w-5xl mx-auto px-4 sm:px-6 lg:px-8 pt-24 pb-20 sm:pt-32 sm:pb-28">
          <motion.div
            initial={{ opacity: 0, y: 20 }}
            animate={{ opacity: 1, y: 0 }}
            transition={{ duration: 0.6, ease: [0.25, 0.4, 0.25, 1] }}
            className="flex flex-col items-center text-center"
          >
            <h1 className="text-4xl sm:text-5xl lg:text-6xl font-bold tracking-tight leading-[1.1] max-w-4xl">
              <span className="text-foreground">First In, </span>
              <span className="bg-gradient-to-r from-primary to-secondary bg-clip-text text-transparent">
                First Out
              </span>
            </h1>

            <p className="mt-6 text-lg sm:text-xl text-muted-foreground max-w-2xl leading-relaxed">
              Queue up processes, press start, and watch a single CPU work
              through them in the exact order they arrived.
            </p>

            <div className="mt-10 flex flex-col sm:flex-row items-center gap-3">
              {firstModule && (
                <Link
                  href={firstModule.href}
                  className="group flex items-center gap-2 px-6 py-3 rounded-xl bg-primary text-white text-sm font-medium transition-all duration-200 hover:bg-primary-hover hover:shadow-lg hover:shadow-primary/20 active:scale-[0.98]"
                >
                  Open the Simulator
                  <ArrowRight
                    size={16}
                    className="transition-transform duration-200 group-hover:translate-x-0.5"
                  />
                </Link>
              )}
              <button
                onClick={scrollToDomains}
                className="group flex items-center gap-2 px-6 py-3 rounded-xl border border-border text-muted-foreground text-sm font-medium transition-all duration-200 hover:border-border-hover hover:text-foreground hover:bg-card/50"
              >
                Browse Modules
              </button>
            </div>

            <motion.div
              initial={{ opacity: 0, y: 10 }}
              animate={{ opacity: 1, y: 0 }}
              transition={{ duration: 0.5, delay: 0.3, ease: [0.25, 0.4, 0.25, 1] }}
              className="mt-16 flex items-center gap-6 sm:gap-8 text-sm text-muted"
            >
              <div className="flex items-center gap-2">
                <div className="w-1 h-1 rounded-full bg-secondary" />
                <span className="font-mono">{totalModules} {totalModules === 1 ? "Module" : "Modules"}</span>
              </div>
              <div className="w-px h-3 bg-border" />
              <div className="flex items-center gap-2">
                <div className="w-1 h-1 rounded-full bg-success" />
                <span className="font-mono">{availableModules.length} Live Now</span>
              </div>
            </motion.div>
          </motion.div>
        </div>
      </section>

      {/* ── Domain Cards ── */}
      <section ref={domainsRef} className="relative py-20 sm:py-28">
        <div className="max-w-6xl mx-auto px-4 sm:px-6 lg:px-8">
          <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
            {domains.map((domain, index) => (
              <DomainCard key={domain.id} domain={domain} index={index} />
            ))}
          </div>
        </div>
      </section>

      <Footer />
    </div>
  );
}

/* ── Domain Card Component ── */

function DomainCard({
  domain,
  index,
}: {
  domain: (typeof domains)[number];
  index: number;
}) {
  const ref = useRef<HTMLDivElement>(null);
  const isInView = useInView(ref, { once: true, margin: "-60px" });

  const Icon = iconMap[domain.icon];
  const liveModules = domain.modules.filter((m) => m.status === "available");

  return (
    <motion.div
      ref={ref}
      initial={{ opacity: 0, y: 24 }}
      animate={isInView ? { opacity: 1, y: 0 } : { opacity: 0, y: 24 }}
      transition={{
        duration: 0.45,
        delay: (index % 2) * 0.1,
        ease: [0.25, 0.4, 0.25, 1],
      }}
    >
      <div className="group relative rounded-xl border border-border bg-card transition-all duration-300 hover:border-border-hover hover:bg-card-hover overflow-hidden">
        <div
          className="absolute top-0 left-0 right-0 h-px"
          style={{
            background: `linear-gradient(90deg, ${domain.color}40, ${domain.color}, ${domain.color}40)`,
          }}
        />

        <div className="relative p-5 sm:p-6">
          <div className="flex items-start justify-between mb-4">
            <div className="flex items-center gap-3">
              <div
                className="flex items-center justify-center w-9 h-9 rounded-lg"
                style={{ backgroundColor: `${domain.color}15` }}
              >
                {Icon && <Icon size={18} style={{ color: domain.color }} strokeWidth={1.75} />}
              </div>
              <div>
                <h3 className="text-[15px] font-semibold text-foreground leading-snug">
                  {domain.title}
                </h3>
                <p className="text-xs text-muted mt-0.5">{domain.subtitle}</p>
              </div>
            </div>

            <div className="flex items-center gap-1.5 text-xs text-muted shrink-0 mt-1">
              <BookOpen size={12} />
              <span className="font-mono">
                {liveModules.length}/{domain.modules.length}
              </span>
            </div>
          </div>

          <div className="space-y-1">
            {liveModules.map((mod) => (
              <Link
                key={mod.id}
                href={mod.href}
                className="group/link flex items-center gap-2 px-2.5 py-1.5 -mx-1 rounded-lg transition-colors duration-150 hover:bg-[#ffffff06]"
              >
                <div className="w-1 h-1 rounded-full shrink-0" style={{ backgroundColor: domain.color }} />
                <span className="text-sm text-muted-foreground group-hover/link:text-foreground transition-colors duration-150 truncate">
                  {mod.number} &middot; {mod.title}
                </span>
                <ChevronRight
                  size={12}
                  className="ml-auto shrink-0 text-muted/0 group-hover/link:text-muted transition-all duration-150"
                />
              </Link>
            ))}
          </div>
        </div>
      </div>
    </motion.div>
  );
}
