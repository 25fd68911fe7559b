/**
 * Default values shared by config, tunnels and profiles
 */

export const TUNNELS = {
  LOCK_TIMEOUT_MS: 5000,
  PORT_RANGE_MIN: 10000,
  PORT_RANGE_MAX: 20000,
} as const;

export const ACTIVATION = {
  /** Grace period when the tunnel was just (re)started */
  RESTART_GRACE_MS: 30000,
  /** Grace period when an existing tunnel was reused */
  REUSE_GRACE_MS: 2000,
  MAX_ATTEMPTS: 10,
} as const;

export const SSH = {
  DEFAULT_BINARY: 'ssh',
} as const;

export const PROFILES = {
  FILENAME: 'kubetun-profiles.yaml',
  /** Per-project state directory, created next to the profile configuration file */
  STATE_DIRNAME: '.kubetun',
  ENV_VAR: 'KUBETUN_PROFILE',
  DEFAULT_PROFILE: 'default',
} as const;
