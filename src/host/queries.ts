/**
 * Host Queries
 *
 * Read-only query functions that use the executor to inspect host state.
 */

import type { PowerShellExecutor } from './executor.js';
import type {
  ElevationResponse,
  LastLogonResponse,
  ProcessStatusResponse,
  RegistryValueResponse,
  ServiceStatusResponse,
} from './types.js';
import {
  buildCheckElevationScript,
  buildGetLastLogonScript,
  buildGetProcessScript,
  buildGetRegistryValueScript,
  buildGetServiceScript,
} from './commands.js';

/**
 * Get the current user's last logon time.
 *
 * @returns The logon time, or null when the account has none recorded
 */
export async function getLastLogon(executor: PowerShellExecutor): Promise<Date | null> {
  const result = await executor.execute<LastLogonResponse>(buildGetLastLogonScript());
  if (!result?.lastLogon) {
    return null;
  }
  const parsed = new Date(result.lastLogon);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Check whether the current session holds administrator rights.
 */
export async function checkElevation(executor: PowerShellExecutor): Promise<boolean> {
  const result = await executor.execute<ElevationResponse>(buildCheckElevationScript());
  return result?.elevated === true;
}

/**
 * Read a DWORD registry value.
 *
 * @returns The value, or null when the key or value is missing
 */
export async function getRegistryValue(
  executor: PowerShellExecutor,
  registryPath: string,
  valueName: string
): Promise<number | null> {
  const result = await executor.execute<RegistryValueResponse>(
    buildGetRegistryValueScript(registryPath, valueName)
  );
  return typeof result?.value === 'number' ? result.value : null;
}

/**
 * Query a service by name.
 */
export async function getService(
  executor: PowerShellExecutor,
  name: string
): Promise<ServiceStatusResponse> {
  const result = await executor.execute<ServiceStatusResponse>(buildGetServiceScript(name));
  return result ?? { exists: false, status: null };
}

/**
 * Query a process by name.
 */
export async function getProcess(
  executor: PowerShellExecutor,
  name: string
): Promise<ProcessStatusResponse> {
  const result = await executor.execute<ProcessStatusResponse>(buildGetProcessScript(name));
  return result ?? { exists: false, suspended: false, path: null };
}
