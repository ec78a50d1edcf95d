/**
 * flakedesk Engine — Build Progress Classification
 *
 * Turns raw `nix build` / `nix run` console lines into short status
 * messages for the spinner. Lines that carry no recognisable phase leave
 * the previous status in place.
 */

export class BuildStatusTracker {
  private downloads = 0;
  private builds = 0;
  private current = "";

  /**
   * Feed one output line.
   *
   * @returns the new status when it changed, otherwise null
   */
  update(line: string): string | null {
    const status = this.classify(line);
    if (!status || status === this.current) return null;
    this.current = status;
    return status;
  }

  get status(): string {
    return this.current;
  }

  private classify(line: string): string | null {
    if (/copying path.*from.*cache/.test(line)) {
      this.downloads++;
      return `Downloading dependencies (${this.downloads} packages)...`;
    }
    if (/building.*drv/.test(line)) {
      this.builds++;
      return `Compiling packages (${this.builds} components)...`;
    }
    if (/unpacking.*source/.test(line)) return "Unpacking source code...";
    if (/configuring/.test(line)) return "Configuring build...";
    if (/building/.test(line)) return "Building components...";
    if (/installing/.test(line)) return "Installing packages...";
    if (/post-installation/.test(line)) return "Post-installation setup...";
    return null;
  }
}
