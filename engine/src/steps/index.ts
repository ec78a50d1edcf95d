/**
 * flakedesk Engine — Install Step Sequence
 */

import { AppProfile } from "../types";
import { ApplicationStep } from "./application";
import { BaseStep } from "./base-step";
import { CompanionStep } from "./companion";
import { DesktopEntryStep } from "./desktop-entry";
import { DockPinStep } from "./dock-pin";
import { DockerStep } from "./docker";
import { IconStep } from "./icon";
import { LauncherStep } from "./launcher";
import { NixStep } from "./nix";
import { NodejsStep } from "./nodejs";
import { SystemPackagesStep } from "./system-packages";

export { BaseStep, type StepReport } from "./base-step";
export { runStep, runSteps, type StepsResult } from "./runner";
export { SYSTEM_PACKAGES } from "./system-packages";
export { DOCKER_PACKAGES, DOCKER_LIST, DOCKER_KEYRING, renderDockerSource } from "./docker";
export { NODESOURCE_LIST } from "./nodejs";
export { verifyLaunch } from "./application";
export { isCompanionRegistered } from "./companion";

/**
 * The fixed installation order. The application must be built before the
 * companion, which registers itself in the application's config. Node.js,
 * and with it npx, comes before both.
 */
export function createInstallSteps(profile: AppProfile): BaseStep[] {
  return [
    new SystemPackagesStep(),
    new NodejsStep(),
    new DockerStep(),
    new NixStep(),
    new ApplicationStep(profile.name),
    new CompanionStep(profile.companion, { npxFromEarlierStep: true }),
    new IconStep(),
    new LauncherStep(),
    new DesktopEntryStep(),
    new DockPinStep(),
  ];
}
