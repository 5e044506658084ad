import type { Metadata } from "next";
import type { ReactNode } from "react";
import "./globals.css";

export const metadata: Metadata = {
  title: {
    default: "Talk Studio · English speaking scripts",
    template: "%s · Talk Studio",
  },
  description:
    "Turn a topic, a picture or a text file into five English speaking scripts with Korean translations and voiced dialogue audio.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: ReactNode;
}>) {
  return (
    <html lang="ko">
      <body className="antialiased bg-slate-950 text-slate-50 font-sans">
        {children}
      </body>
    </html>
  );
}
