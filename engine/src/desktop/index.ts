export { renderLauncherScript, sandboxRemediation } from "./launcher-script";
export { renderDesktopEntry, DesktopEntryOptions } from "./desktop-entry";
export {
  FAVORITES_SCHEMA,
  FAVORITES_KEY,
  parseFavorites,
  formatFavorites,
  addFavorite,
  removeFavorite,
} from "./favorites";
export { placeholderIcon } from "./icon";
export {
  DASH_REFRESH_SCRIPTS,
  markTrusted,
  refreshDesktopDatabase,
  restartFileManager,
  enableExecutableLaunch,
  readFavorites,
  writeFavorites,
  refreshDash,
} from "./shell-integration";
