/**
 * flakedesk Engine — Docker Step
 *
 * Docker CE from Docker's own apt repository, replacing any distribution
 * packages, with the invoking user added to the docker group.
 */

import * as path from "path";
import { EngineContext } from "../context";
import { StepFailure } from "../errors";
import { aptInstall, aptRemove, aptUpdate } from "../linux/apt";
import { sudoOrFail, writeFileWithFallback } from "../linux/privileged";
import { ErrorCategory, StepId, StepProbe } from "../types";
import { commandExists, describeFailure } from "../utils/command";
import { BaseStep } from "./base-step";
import { runPipeline } from "./shell";

export const DOCKER_LEGACY_PACKAGES = ["docker", "docker-engine", "docker.io", "containerd", "runc"];
export const DOCKER_PREREQUISITES = ["ca-certificates", "gnupg", "lsb-release"];
export const DOCKER_PACKAGES = [
  "docker-ce",
  "docker-ce-cli",
  "containerd.io",
  "docker-buildx-plugin",
  "docker-compose-plugin",
];

export const DOCKER_GPG_URL = "https://download.docker.com/linux/ubuntu/gpg";
export const DOCKER_REPO_URL = "https://download.docker.com/linux/ubuntu";
export const DOCKER_LIST = "docker.list";
export const DOCKER_KEYRING = "docker.gpg";

/**
 * One-line apt source for Docker's repository.
 */
export function renderDockerSource(arch: string, codename: string, keyring: string): string {
  return `deb [arch=${arch} signed-by=${keyring}] ${DOCKER_REPO_URL} ${codename} stable\n`;
}

export class DockerStep extends BaseStep {
  readonly id = "docker";
  readonly title = "Docker";
  readonly category = "PACKAGE_ERROR";

  async probe(ctx: EngineContext): Promise<StepProbe> {
    return (await commandExists(ctx.runner, "docker", ctx.env))
      ? { satisfied: true, detail: "docker found" }
      : { satisfied: false, detail: "docker missing" };
  }

  async perform(ctx: EngineContext) {
    const legacy = await aptRemove(ctx, DOCKER_LEGACY_PACKAGES);
    ctx.logger.debug({ exitCode: legacy.exitCode }, "Removed legacy Docker packages");

    await aptUpdate(ctx, this.id);
    await aptInstall(ctx, DOCKER_PREREQUISITES, this.id);

    const keyring = path.join(ctx.paths.apt_keyrings_dir, DOCKER_KEYRING);
    const failure: { category: ErrorCategory; step: StepId } = { category: "PACKAGE_ERROR", step: this.id };
    await sudoOrFail(ctx, ["mkdir", "-p", "-m", "0755", ctx.paths.apt_keyrings_dir], failure);
    await runPipeline(
      ctx,
      this.id,
      `curl -fsSL ${DOCKER_GPG_URL} | sudo gpg --dearmor --yes -o ${keyring}`,
      { category: "PACKAGE_ERROR", message: "Adding Docker's signing key failed" },
    );

    const arch = await this.query(ctx, "dpkg", ["--print-architecture"]);
    const codename = await this.query(ctx, "lsb_release", ["-cs"]);
    await writeFileWithFallback(
      ctx,
      path.join(ctx.paths.apt_sources_dir, DOCKER_LIST),
      renderDockerSource(arch, codename, keyring),
      0o644,
      this.id,
    );

    await aptUpdate(ctx, this.id);
    await aptInstall(ctx, DOCKER_PACKAGES, this.id);
    await sudoOrFail(ctx, ["usermod", "-aG", "docker", ctx.user], {
      ...failure,
      message: `Adding ${ctx.user} to the docker group failed`,
    });

    return { message: "Installed Docker. Log out and back in to use it without sudo." };
  }

  private async query(ctx: EngineContext, command: string, args: string[]): Promise<string> {
    const result = await ctx.runner.run(command, args, { env: ctx.env });
    const value = result.stdout.trim();
    if (result.exitCode !== 0 || !value) {
      throw new StepFailure("PACKAGE_ERROR", describeFailure(command, args, result), {
        step: this.id,
      });
    }
    return value;
  }
}
