/**
 * flakedesk Engine — Desktop Entry
 *
 * freedesktop.org `.desktop` file for the application menu. The copy on
 * ~/Desktop carries one extra GNOME key.
 */

import { AppProfile, InstallPaths } from "../types";

/** `a;b;` list form used by Categories and Keywords */
function entryList(values: string[]): string {
  return values.map((v) => `${v};`).join("");
}

export interface DesktopEntryOptions {
  /** Render the ~/Desktop copy */
  desktopCopy?: boolean;
}

export function renderDesktopEntry(
  profile: AppProfile,
  paths: InstallPaths,
  options: DesktopEntryOptions = {},
): string {
  const entry = profile.desktop_entry;
  return [
    "[Desktop Entry]",
    "Version=1.0",
    "Type=Application",
    `Name=${profile.name}`,
    `Comment=${entry.comment}`,
    `GenericName=${entry.generic_name}`,
    `Exec=${paths.launcher}`,
    `Icon=${paths.icon}`,
    "StartupNotify=true",
    ...(options.desktopCopy ? ["X-GNOME-Autostart-enabled=true"] : []),
    "NoDisplay=false",
    "MimeType=",
    `Categories=${entryList(entry.categories)}`,
    `Keywords=${entryList(entry.keywords)}`,
    `StartupWMClass=${profile.window_class}`,
    "Terminal=false",
    "SingleMainWindow=true",
    "Actions=new-window;",
    "",
    "[Desktop Action new-window]",
    "Name=New Window",
    `Exec=${paths.launcher}`,
    "",
  ].join("\n");
}
