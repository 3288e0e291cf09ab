import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Card Studio - Contact Cards",
  description: "Design the contact card you share over NFC and QR",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="antialiased">
        {children}
      </body>
    </html>
  );
}
