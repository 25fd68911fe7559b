/**
 * kubetun Configuration Types
 *
 * User configuration lives in ~/.kubetun/config.yaml. Every section is optional;
 * missing values fall back to `getDefaultConfig()`.
 */

import { z } from 'zod';

/**
 * Tunnel state settings
 */
export const TunnelSettingsSchema = z
  .object({
    /** Directory holding state.json and .lock (default: ~/.kubetun/tunnels) */
    state_dir: z.string().min(1),
    /** How long to wait for the state lock (default: 5000) */
    lock_timeout_ms: z.number().int().positive(),
    /** Range local ports are drawn from (default: 10000-20000) */
    port_range: z
      .object({
        min: z.number().int().min(1).max(65535),
        max: z.number().int().min(1).max(65535),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

/**
 * Profile activation settings
 */
export const ActivationSettingsSchema = z
  .object({
    /** Wait for the API server after starting a tunnel (default: 30000) */
    restart_grace_ms: z.number().int().nonnegative(),
    /** Wait for the API server through a reused tunnel (default: 2000) */
    reuse_grace_ms: z.number().int().nonnegative(),
    /** Upper bound on probe attempts (default: 10) */
    max_attempts: z.number().int().positive(),
  })
  .partial()
  .strict();

/**
 * SSH client settings
 */
export const SshSettingsSchema = z
  .object({
    /** SSH executable (default: ssh) */
    binary: z.string().min(1),
  })
  .partial()
  .strict();

export const KubetunConfigSchema = z
  .object({
    tunnels: TunnelSettingsSchema,
    activation: ActivationSettingsSchema,
    ssh: SshSettingsSchema,
  })
  .partial()
  .strict();

export type TunnelSettings = z.infer<typeof TunnelSettingsSchema>;
export type ActivationSettings = z.infer<typeof ActivationSettingsSchema>;
export type SshSettings = z.infer<typeof SshSettingsSchema>;
export type KubetunConfig = z.infer<typeof KubetunConfigSchema>;

/**
 * Fully resolved tunnel settings
 */
export interface ResolvedTunnelSettings {
  stateDir: string;
  lockTimeoutMs: number;
  portRange: { min: number; max: number };
  sshBinary: string;
}

/**
 * Fully resolved activation settings
 */
export interface ResolvedActivationSettings {
  restartGraceMs: number;
  reuseGraceMs: number;
  maxAttempts: number;
}

/**
 * Scalar values accepted by `config set`
 */
export type ConfigScalar = string | number | boolean;
