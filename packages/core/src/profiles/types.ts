/**
 * Profile Configuration Types
 *
 * Schema of `kubetun-profiles.yaml`: a map from profile name to how the
 * kubeconfig is obtained and, optionally, how the API server is tunnelled.
 *
 * @example
 * prod:
 *   kubeconfig:
 *     type: ssh
 *     user: admin
 *     host: bastion.example.test
 *     path: /etc/rancher/k3s/k3s.yaml
 *   tunnel:
 *     type: ssh
 *     user: admin
 *     host: bastion.example.test
 */

import { z } from 'zod';

/**
 * Use a kubeconfig file on this machine ($KUBECONFIG or ~/.kube/config unless `path` is set)
 */
export const LocalKubeconfigSchema = z
  .object({
    type: z.literal('local'),
    path: z.string().min(1).optional(),
    context: z.string().min(1).optional(),
  })
  .strict();

/**
 * Fetch the kubeconfig from a remote host over SSH
 */
export const SshKubeconfigSchema = z
  .object({
    type: z.literal('ssh'),
    user: z.string().min(1),
    host: z.string().min(1),
    path: z.string().min(1),
    identity_file: z.string().min(1).optional(),
    context: z.string().min(1).optional(),
  })
  .strict();

export const KubeconfigSourceSchema = z.discriminatedUnion('type', [
  LocalKubeconfigSchema,
  SshKubeconfigSchema,
]);

/**
 * SSH jump host through which the API server is reached
 */
export const SshTunnelConfigSchema = z
  .object({
    type: z.literal('ssh').default('ssh'),
    user: z.string().min(1),
    host: z.string().min(1),
    identity_file: z.string().min(1).optional(),
  })
  .strict();

export const ProfileSchema = z
  .object({
    kubeconfig: KubeconfigSourceSchema.default({ type: 'local' }),
    tunnel: SshTunnelConfigSchema.optional(),
  })
  .strict();

export const ProfilesFileSchema = z.record(z.string().min(1), ProfileSchema);

export type LocalKubeconfig = z.infer<typeof LocalKubeconfigSchema>;
export type SshKubeconfig = z.infer<typeof SshKubeconfigSchema>;
export type KubeconfigSource = z.infer<typeof KubeconfigSourceSchema>;
export type SshTunnelConfig = z.infer<typeof SshTunnelConfigSchema>;
export type Profile = z.infer<typeof ProfileSchema>;

/**
 * A loaded profiles file
 */
export interface ProfileConfig {
  /** Absolute path of the file the profiles were read from */
  file: string;
  profiles: Record<string, Profile>;
}
