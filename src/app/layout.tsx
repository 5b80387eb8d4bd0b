import type { Metadata } from "next";
import type { ReactNode } from "react";

export const metadata: Metadata = {
  title: "Islamic Fatwa Assistant",
  description: "Answers to Islamic questions according to the selected school of Fiqh",
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body style={{ margin: 0, background: "#fafafa", color: "#2c3e50" }}>{children}</body>
    </html>
  );
}
