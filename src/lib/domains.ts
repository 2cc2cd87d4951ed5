export interface Module {
  id: string;
  number: string;
  title: string;
  description: string;
  status: "available" | "coming-soon";
  href: string;
  related?: string[];
}

export interface Domain {
  id: number;
  title: string;
  subtitle: string;
  icon: string;
  color: string;
  gradient: string;
  modules: Module[];
}

export const domains: Domain[] = [
  {
    id: 3,
    title: "Operating Systems",
    subtitle: "The software that manages hardware",
    icon: "Monitor",
    color: "#06b6d4",
    gradient: "from-cyan-500 to-teal-600",
    modules: [
      {
        id: "3.2",
        number: "3.2",
        title: "FIFO CPU Scheduling",
        description: "Enqueue processes into a ready queue and watch the CPU dispatch them first-in, first-out",
        status: "available",
        href: "/modules/3-2-fifo-scheduling",
        related: ["Ready queue", "Context switch"],
      },
    ],
  },
];

export function getModule(moduleId: string): { domain: Domain; module: Module } | undefined {
  for (const domain of domains) {
    const mod = domain.modules.find((m) => m.id === moduleId);
    if (mod) return { domain, module: mod };
  }
  return undefined;
}

export const availableModules = domains.flatMap((d) =>
  d.modules.filter((m) => m.status === "available").map((m) => ({ ...m, domain: d }))
);
