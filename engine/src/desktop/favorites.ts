/**
 * flakedesk Engine — GNOME Favorites List
 *
 * `gsettings get org.gnome.shell favorite-apps` prints a GVariant string
 * array: `['a.desktop', 'b.desktop']`, or `@as []` when empty.
 * Desktop file ids never contain quotes, so no escaping is handled.
 */

export const FAVORITES_SCHEMA = "org.gnome.shell";
export const FAVORITES_KEY = "favorite-apps";

export function parseFavorites(raw: string): string[] {
  const text = raw.trim().replace(/^@as\s*/, "");
  if (!text.startsWith("[") || !text.endsWith("]")) {
    throw new Error(`Unrecognised favorites list: ${raw.trim()}`);
  }
  const items: string[] = [];
  const pattern = /'([^']*)'|"([^"]*)"/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    items.push(match[1] ?? match[2]);
  }
  return items;
}

export function formatFavorites(items: string[]): string {
  return `[${items.map((item) => `'${item}'`).join(", ")}]`;
}

/** Append `id` unless it is already present */
export function addFavorite(items: string[], id: string): string[] {
  return items.includes(id) ? items : [...items, id];
}

export function removeFavorite(items: string[], id: string): string[] {
  return items.filter((item) => item !== id);
}
