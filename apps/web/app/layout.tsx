import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Shirtsmith",
  description: "Turn a chat message into a lettered t-shirt design and send it to print-on-demand."
};

export default function RootLayout({
  children
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en-GB">
      <body>{children}</body>
    </html>
  );
}
