import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "CropTalk: AI Farming Assistant",
  description: "Farming advice grounded in your crops and current field conditions.",
};

export default function RootLayout({
  children,
}: {
  children: React.ReactNode;
}) {
  return (
    <html lang="en" className="dark">
      <body className="antialiased">{children}</body>
    </html>
  );
}
