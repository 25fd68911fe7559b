/**
 * Profile configuration discovery and loading
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import yaml from 'js-yaml';
import { PROFILES } from '../config/constants.js';
import { isErrnoException } from '../utils/errors.js';
import { type Profile, type ProfileConfig, ProfilesFileSchema } from './types.js';

/**
 * Error thrown when no profiles file exists in any searched location
 */
export class ProfileConfigNotFoundError extends Error {
  constructor(
    public readonly cwd: string,
    public readonly fallbackPath: string
  ) {
    super(
      `Configuration file '${PROFILES.FILENAME}' not found in '${cwd}', any of its parent ` +
        `directories, your home directory or '${path.dirname(fallbackPath)}'`
    );
    this.name = 'ProfileConfigNotFoundError';
  }
}

/**
 * Error thrown when a profiles file cannot be parsed or fails validation
 */
export class ProfileConfigError extends Error {
  constructor(
    public readonly file: string,
    reason: string,
    /** Dotted path of the offending value, when validation failed on one */
    public readonly location?: string
  ) {
    super(`Invalid profile configuration in ${file}${location ? ` at '${location}'` : ''}: ${reason}`);
    this.name = 'ProfileConfigError';
  }
}

/**
 * Error thrown when a profile name is not defined in the profiles file
 */
export class ProfileNotFoundError extends Error {
  constructor(
    public readonly profile: string,
    public readonly file: string,
    public readonly available: string[]
  ) {
    const known = available.length > 0 ? available.join(', ') : 'none';
    super(`Profile '${profile}' not found in ${file} (available: ${known})`);
    this.name = 'ProfileNotFoundError';
  }
}

/**
 * Last-resort location: ~/.config/kubetun/kubetun-profiles.yaml
 */
export function getFallbackProfileConfigPath(): string {
  return path.join(os.homedir(), '.config', 'kubetun', PROFILES.FILENAME);
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isFile();
  } catch (error) {
    if (isErrnoException(error, 'ENOENT') || isErrnoException(error, 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

/**
 * Find `kubetun-profiles.yaml` in `cwd` or any parent directory, then in the
 * home directory, then in ~/.config/kubetun.
 *
 * @returns Absolute path of the first match
 * @throws ProfileConfigNotFoundError
 */
export async function findProfileConfigFile(cwd: string = process.cwd()): Promise<string> {
  const start = path.resolve(cwd);
  const candidates: string[] = [];

  let directory = start;
  while (true) {
    candidates.push(path.join(directory, PROFILES.FILENAME));
    const parent = path.dirname(directory);
    if (parent === directory) break;
    directory = parent;
  }
  candidates.push(path.join(os.homedir(), PROFILES.FILENAME));
  candidates.push(getFallbackProfileConfigPath());

  for (const candidate of candidates) {
    if (await isFile(candidate)) {
      return candidate;
    }
  }
  throw new ProfileConfigNotFoundError(start, getFallbackProfileConfigPath());
}

/**
 * Parse and validate profiles from YAML text
 *
 * An empty document yields no profiles.
 */
export function parseProfileConfig(content: string, file: string): ProfileConfig {
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (error) {
    throw new ProfileConfigError(file, error instanceof Error ? error.message : String(error));
  }

  const result = ProfilesFileSchema.safeParse(data ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue && issue.path.length > 0 ? issue.path.join('.') : undefined;
    throw new ProfileConfigError(file, issue?.message ?? result.error.message, location);
  }
  return { file, profiles: result.data };
}

/**
 * Load profiles from a file
 */
export async function loadProfileConfig(file: string): Promise<ProfileConfig> {
  const absolute = path.resolve(file);
  const content = await fs.readFile(absolute, 'utf-8');
  return parseProfileConfig(content, absolute);
}

/**
 * @throws ProfileNotFoundError
 */
export function getProfile(config: ProfileConfig, name: string): Profile {
  const profile = Object.hasOwn(config.profiles, name) ? config.profiles[name] : undefined;
  if (!profile) {
    throw new ProfileNotFoundError(name, config.file, Object.keys(config.profiles));
  }
  return profile;
}
