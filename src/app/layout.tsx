import type { Metadata } from "next";
import type { ReactNode } from "react";
import "./globals.css";

export const metadata: Metadata = {
  title: "Photo Gallery",
  description: "PIN-protected photo browser",
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body className="min-h-screen bg-gradient-to-br from-slate-200 via-sky-100 to-amber-50 antialiased">
        {children}
      </body>
    </html>
  );
}
