export { extractPrivilegedPath } from "./extract";
export {
  findBinary,
  locateBuiltSandbox,
  locateSandboxBinary,
  type FindOptions,
  type SandboxLocation,
} from "./locate";
export {
  PATCHED_MODE,
  DEFAULT_MODE,
  permissionBits,
  isSetuid,
  isPatched,
  patchSandboxBinary,
  findSetuidSandboxes,
  resetSandboxPermissions,
} from "./permissions";
