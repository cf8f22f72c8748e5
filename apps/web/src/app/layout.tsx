import type { Metadata, Viewport } from "next";

import "maplibre-gl/dist/maplibre-gl.css";
import "./globals.css";

import { NavLinks } from "../components/NavLinks";

export const metadata: Metadata = {
  title: "PathSense | Accessible navigation",
  description:
    "Obstacle readings relayed in real time and spoken aloud, with camera guidance, an emergency panel and wheelchair-aware routes."
};

export const viewport: Viewport = {
  themeColor: "#1e1f24"
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body>
        <NavLinks />
        {children}
      </body>
    </html>
  );
}
