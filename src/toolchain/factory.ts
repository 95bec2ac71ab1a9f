/**
 * Provisioner factory: one implementation per platform
 */

import type { PlatformOS } from '../models/index.js';
import { assertNever } from '../models/index.js';
import type { Provisioner, ToolInstaller } from './base.js';
import { LinuxProvisioner } from './linux.js';
import { MacosProvisioner } from './macos.js';
import { WindowsProvisioner } from './windows.js';
import { CommandToolInstaller } from './installer.js';

export function createProvisioner(platform: PlatformOS, installer?: ToolInstaller): Provisioner {
  const tools = installer ?? new CommandToolInstaller(platform);
  switch (platform) {
    case 'linux':
      return new LinuxProvisioner(tools);
    case 'macos':
      return new MacosProvisioner(tools);
    case 'windows':
      return new WindowsProvisioner(tools);
    default:
      return assertNever(platform);
  }
}

export type ProvisionerFactory = (platform: PlatformOS) => Provisioner;

/**
 * Provisioners are stateless, so one per platform serves the whole run
 */
export function provisionerRegistry(installer?: (platform: PlatformOS) => ToolInstaller): ProvisionerFactory {
  const cache = new Map<PlatformOS, Provisioner>();
  return (platform) => {
    let provisioner = cache.get(platform);
    if (!provisioner) {
      provisioner = createProvisioner(platform, installer?.(platform));
      cache.set(platform, provisioner);
    }
    return provisioner;
  };
}
