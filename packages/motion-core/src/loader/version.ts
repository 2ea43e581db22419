// ---------------------------------------------------------------------------
// Configuration version compatibility
// ---------------------------------------------------------------------------

import { ConfigVersionIncompatibleError, InvalidVersionFormatError } from '../errors.js';

export type ConfigComponent = 'discrete_time' | 'motion_profile' | 'controller' | 'plant';

/** Record versions this build reads. Only the major number is binding. */
export const SUPPORTED_CONFIG_VERSIONS: Readonly<Record<ConfigComponent, string>> = Object.freeze({
  discrete_time: '1.0.0',
  motion_profile: '1.0.0',
  controller: '1.0.0',
  plant: '1.0.0',
});

export interface SemVer {
  major: number;
  minor: number;
  patch: number;
}

const SEMVER = /^(\d+)\.(\d+)\.(\d+)$/;

export function parseVersion(parameter: string, text: string): SemVer {
  const match = SEMVER.exec(text.trim());
  if (!match) throw new InvalidVersionFormatError(parameter, text);
  const [, major = '', minor = '', patch = ''] = match;
  return { major: Number(major), minor: Number(minor), patch: Number(patch) };
}

/**
 * Same major version means compatible. Older and newer minors both load; a
 * newer record's extra fields are dropped, an older one's missing optional
 * fields take their defaults.
 */
export function isConfigCompatible(supportedVersion: string, configVersion: string): boolean {
  const supported = parseVersion('supportedVersion', supportedVersion);
  const config = parseVersion('configVersion', configVersion);
  return supported.major === config.major;
}

export function assertConfigCompatible(component: ConfigComponent, configVersion: string): void {
  const supported = SUPPORTED_CONFIG_VERSIONS[component];
  parseVersion(`${component}.version`, configVersion);
  if (!isConfigCompatible(supported, configVersion)) {
    throw new ConfigVersionIncompatibleError(component, supported, configVersion);
  }
}
