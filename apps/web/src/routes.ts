export type PageId = "console" | "mobile" | "maps";

export type PageLink = {
  id: PageId;
  path: string;
  label: string;
};

export const PAGES: readonly PageLink[] = [
  { id: "console", path: "/", label: "Console" },
  { id: "mobile", path: "/mobile", label: "Camera navigator" },
  { id: "maps", path: "/maps", label: "Wheelchair maps" }
];

/** Unknown paths show the console. */
export function resolvePage(pathname: string): PageId {
  const normalized = pathname.replace(/\/+$/, "") || "/";
  return PAGES.find((page) => page.path === normalized)?.id ?? "console";
}
