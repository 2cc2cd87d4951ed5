import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "FIFO Scheduler Lab",
  description: "Interactive visualization of first-in, first-out CPU scheduling",
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en" className="dark">
      <body className="antialiased">{children}</body>
    </html>
  );
}
