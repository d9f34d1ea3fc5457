/**
 * PowerShell Script Builders
 *
 * Builds the scripts PowerShellHostControl runs. Query scripts and the
 * launch batch print JSON via ConvertTo-Json; other mutating scripts print
 * 'null'.
 */

import type { ProcessLaunch } from './types.js';

/**
 * Escape a string for safe use in PowerShell single-quoted strings.
 * Single quotes in PowerShell are escaped by doubling them.
 */
export function escapePowerShellString(value: string): string {
  return value.replace(/'/g, "''");
}

/**
 * Quote an executable path for Start-Process.
 *
 * Single-quoted literals keep embedded spaces intact, so
 * `C:\Program Files\App\app.exe` launches as one path.
 */
export function quoteLaunchPath(path: string): string {
  return `'${escapePowerShellString(path)}'`;
}

/**
 * Render a name list as a PowerShell array literal.
 */
function toArrayLiteral(names: readonly string[]): string {
  return `@(${names.map((name) => `'${escapePowerShellString(name)}'`).join(', ')})`;
}

/**
 * Build script to read the last logon time of the current user.
 *
 * Returns: LastLogonResponse
 */
export function buildGetLastLogonScript(): string {
  return `
$user = Get-LocalUser -Name $env:USERNAME -ErrorAction SilentlyContinue
$result = @{ lastLogon = $null }
if ($user -and $user.LastLogon) { $result.lastLogon = $user.LastLogon.ToUniversalTime().ToString('o') }
$result | ConvertTo-Json
`.trim();
}

/**
 * Build script to check whether the session is in the Administrators role.
 *
 * Returns: ElevationResponse
 */
export function buildCheckElevationScript(): string {
  return `
$principal = New-Object Security.Principal.WindowsPrincipal([Security.Principal.WindowsIdentity]::GetCurrent())
@{ elevated = $principal.IsInRole([Security.Principal.WindowsBuiltInRole]::Administrator) } | ConvertTo-Json
`.trim();
}

/**
 * Build script to read a DWORD registry value.
 *
 * Returns: RegistryValueResponse
 */
export function buildGetRegistryValueScript(registryPath: string, valueName: string): string {
  const safePath = escapePowerShellString(registryPath);
  const safeName = escapePowerShellString(valueName);
  return `
$item = Get-ItemProperty -Path '${safePath}' -Name '${safeName}' -ErrorAction SilentlyContinue
$result = @{ value = $null }
if ($item) { $result.value = [int]$item.'${safeName}' }
$result | ConvertTo-Json
`.trim();
}

/**
 * Build script to write a DWORD registry value.
 */
export function buildSetRegistryValueScript(
  registryPath: string,
  valueName: string,
  value: number
): string {
  const safePath = escapePowerShellString(registryPath);
  const safeName = escapePowerShellString(valueName);
  return `
$ErrorActionPreference = 'Stop'
Set-ItemProperty -Path '${safePath}' -Name '${safeName}' -Value ${Math.trunc(value)} -Type DWord
'null'
`.trim();
}

/**
 * Build script to query a service by name.
 *
 * Returns: ServiceStatusResponse
 */
export function buildGetServiceScript(name: string): string {
  const safeName = escapePowerShellString(name);
  return `
$svc = Get-Service -Name '${safeName}' -ErrorAction SilentlyContinue
$result = @{ exists = $false; status = $null }
if ($svc) { $result.exists = $true; $result.status = $svc.Status.ToString() }
$result | ConvertTo-Json
`.trim();
}

/**
 * Wrap one cmdlet call per name in a loop that carries on past failures,
 * then exits non-zero when any of them failed.
 */
function buildBestEffortLoop(names: readonly string[], call: string): string {
  return `
$Error.Clear()
foreach ($name in ${toArrayLiteral(names)}) {
  ${call} -ErrorAction Continue
}
if ($Error.Count -gt 0) { exit 1 }
'null'
`.trim();
}

/**
 * Build script to stop a batch of services.
 */
export function buildStopServicesScript(names: readonly string[]): string {
  return buildBestEffortLoop(names, 'Stop-Service -Name $name -Force');
}

/**
 * Build script to start a batch of services.
 */
export function buildStartServicesScript(names: readonly string[]): string {
  return buildBestEffortLoop(names, 'Start-Service -Name $name');
}

/**
 * Build script to query a process by name.
 *
 * A process counts as suspended only when every thread of every instance
 * is waiting with reason Suspended.
 *
 * Returns: ProcessStatusResponse
 */
export function buildGetProcessScript(name: string): string {
  const safeName = escapePowerShellString(name);
  return `
$procs = @(Get-Process -Name '${safeName}' -ErrorAction SilentlyContinue)
$result = @{ exists = $false; suspended = $false; path = $null }
if ($procs.Count -gt 0) {
  $result.exists = $true
  $threads = @($procs | ForEach-Object { $_.Threads })
  $suspended = @($threads | Where-Object { $_.ThreadState -eq 'Wait' -and $_.WaitReason -eq 'Suspended' })
  $result.suspended = ($threads.Count -gt 0) -and ($suspended.Count -eq $threads.Count)
  $withPath = $procs | Where-Object { $_.Path } | Select-Object -First 1
  if ($withPath) { $result.path = $withPath.Path }
}
$result | ConvertTo-Json
`.trim();
}

/**
 * Build script to force-stop a batch of processes in the given order.
 */
export function buildStopProcessesScript(names: readonly string[]): string {
  return `
foreach ($name in ${toArrayLiteral(names)}) {
  Get-Process -Name $name -ErrorAction SilentlyContinue | Stop-Process -Force -ErrorAction Continue
}
'null'
`.trim();
}

/**
 * Build one launch script covering every process to restart.
 *
 * Each entry re-checks for a running instance right before it starts, since
 * launching an earlier entry may already have spawned a later one. A failed
 * launch is recorded and the batch moves on.
 *
 * Returns: LaunchResponse
 */
export function buildStartProcessesScript(launches: readonly ProcessLaunch[]): string {
  const lines = launches.map((launch) => {
    const safeName = escapePowerShellString(launch.name);
    return (
      `if (-not (Get-Process -Name '${safeName}' -ErrorAction SilentlyContinue)) { ` +
      `try { Start-Process -FilePath ${quoteLaunchPath(launch.executablePath)} -ErrorAction Stop; $started += '${safeName}' } ` +
      `catch { $failed += @{ name = '${safeName}'; message = $_.Exception.Message } } }`
    );
  });
  return [
    '$started = @()',
    '$failed = @()',
    ...lines,
    '@{ started = @($started); failed = @($failed) } | ConvertTo-Json -Depth 3',
  ].join('\n');
}
