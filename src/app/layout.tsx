import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "CAP LTER Arthropods Dashboard",
  description: "Composition, seasonal and spatial views of CAP LTER arthropod survey counts",
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body className="antialiased">{children}</body>
    </html>
  );
}
