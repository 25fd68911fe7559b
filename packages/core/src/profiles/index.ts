/**
 * Profiles Module
 *
 * Profile configuration, kubeconfig handling and profile activation.
 */

export {
  ApiServerUnreachableError,
  type ApiServerProbe,
  probeApiServer,
  waitForApiServer,
  type WaitForApiServerOptions,
} from './api-server.js';
export { type CommandExecutor, type CommandResult, DirectExecutor } from './command-executor.js';
export {
  defaultKubeconfigPath,
  KubeconfigError,
  KubeconfigManager,
  type KubeconfigManagerOptions,
  parseServer,
  type RawKubeconfig,
  trimToContext,
  type UpdateKubeconfigOptions,
} from './kubeconfig-manager.js';
export {
  findProfileConfigFile,
  getFallbackProfileConfigPath,
  getProfile,
  loadProfileConfig,
  parseProfileConfig,
  ProfileConfigError,
  ProfileConfigNotFoundError,
  ProfileNotFoundError,
} from './profile-config.js';
export {
  type ActivatedProfile,
  type ActivateProfileOptions,
  getDefaultProfileName,
  getProfileStateDir,
  KUBERNETES_FORWARDING,
  type LoadProfileManagerOptions,
  MissingTunnelConfigError,
  ProfileManager,
  type ProfileManagerOptions,
} from './profile-manager.js';
export * from './types.js';
