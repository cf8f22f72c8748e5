"use client";

import Link from "next/link";
import { usePathname } from "next/navigation";

import { PAGES, resolvePage } from "../routes";

export function NavLinks() {
  const page = resolvePage(usePathname());

  return (
    <nav className="top-nav" aria-label="Main">
      <span className="eyebrow">PathSense</span>
      {PAGES.map((link) => (
        <Link
          key={link.id}
          href={link.path}
          className="nav-link"
          aria-current={link.id === page ? "page" : undefined}
        >
          {link.label}
        </Link>
      ))}
    </nav>
  );
}
