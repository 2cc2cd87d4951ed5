import type { Config } from "tailwindcss";

const config: Config = {
  content: ["./src/**/*.{ts,tsx}"],
  theme: {
    extend: {
      colors: {
        background: "#0a0a0f",
        foreground: "#e4e4e7",
        card: { DEFAULT: "#111118", hover: "#16161f" },
        border: { DEFAULT: "#1e1e2e", hover: "#2a2a3e" },
        muted: { DEFAULT: "#71717a", foreground: "#a1a1aa" },
        primary: { DEFAULT: "#6366f1", hover: "#818cf8" },
        secondary: "#06b6d4",
        success: "#10b981",
      },
    },
  },
  plugins: [],
};

export default config;
