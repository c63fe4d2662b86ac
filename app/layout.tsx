import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "CSV Chat Analyst",
  description: "Upload a CSV file, get a statistical summary and chat about the data",
};

export default function RootLayout({
  children,
}: {
  children: React.ReactNode;
}) {
  return (
    <html lang="en">
      <body className="antialiased">{children}</body>
    </html>
  );
}
