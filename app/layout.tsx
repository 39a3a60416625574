import type { Metadata } from "next";
import type { ReactNode } from "react";
import "./globals.css";

export const metadata: Metadata = {
  title: "Flood Monitoring Data",
  description: "Charts and CSV exports of flood-monitoring station readings",
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body className="min-h-screen bg-default-50 text-foreground">{children}</body>
    </html>
  );
}
