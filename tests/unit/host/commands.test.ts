/**
 * Unit tests for PowerShell script builders
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  buildCheckElevationScript,
  buildGetLastLogonScript,
  buildGetProcessScript,
  buildGetRegistryValueScript,
  buildGetServiceScript,
  buildSetRegistryValueScript,
  buildStartProcessesScript,
  buildStartServicesScript,
  buildStopProcessesScript,
  buildStopServicesScript,
  escapePowerShellString,
  quoteLaunchPath,
} from '../../../src/host/commands.js';

const SCHEDULE_KEY = 'HKLM:\\SYSTEM\\CurrentControlSet\\Services\\Schedule';

describe('escapePowerShellString', () => {
  it('should double single quotes', () => {
    assert.strictEqual(escapePowerShellString("O'Brien's"), "O''Brien''s");
  });

  it('should leave other characters alone', () => {
    assert.strictEqual(escapePowerShellString('C:\\Program Files\\App'), 'C:\\Program Files\\App');
  });
});

describe('quoteLaunchPath', () => {
  it('should wrap a path with spaces in single quotes', () => {
    assert.strictEqual(
      quoteLaunchPath('C:\\Program Files\\Vendor\\agent.exe'),
      "'C:\\Program Files\\Vendor\\agent.exe'"
    );
  });

  it('should escape quotes inside the path', () => {
    assert.strictEqual(quoteLaunchPath("C:\\Bob's Tools\\x.exe"), "'C:\\Bob''s Tools\\x.exe'");
  });
});

describe('query scripts', () => {
  it('should read the logon time as a UTC ISO string', () => {
    const script = buildGetLastLogonScript();
    assert.ok(script.includes('Get-LocalUser -Name $env:USERNAME'));
    assert.ok(script.includes("ToUniversalTime().ToString('o')"));
    assert.ok(script.endsWith('ConvertTo-Json'));
  });

  it('should check the Administrator role', () => {
    assert.ok(buildCheckElevationScript().includes('[Security.Principal.WindowsBuiltInRole]::Administrator'));
  });

  it('should read the scheduler start value', () => {
    const script = buildGetRegistryValueScript(SCHEDULE_KEY, 'Start');
    assert.ok(script.includes(`Get-ItemProperty -Path '${SCHEDULE_KEY}' -Name 'Start'`));
    assert.ok(script.includes("[int]$item.'Start'"));
  });

  it('should query a service by escaped name', () => {
    const script = buildGetServiceScript("odd'name");
    assert.ok(script.includes("Get-Service -Name 'odd''name' -ErrorAction SilentlyContinue"));
  });

  it('should query a process and its suspension state', () => {
    const script = buildGetProcessScript('Updater');
    assert.ok(script.includes("@(Get-Process -Name 'Updater' -ErrorAction SilentlyContinue)"));
    assert.ok(script.includes("$_.WaitReason -eq 'Suspended'"));
  });
});

describe('mutating scripts', () => {
  it('should write the flag as a DWORD', () => {
    const script = buildSetRegistryValueScript(SCHEDULE_KEY, 'Start', 4);
    assert.ok(script.includes(`Set-ItemProperty -Path '${SCHEDULE_KEY}' -Name 'Start' -Value 4 -Type DWord`));
    assert.ok(script.startsWith("$ErrorActionPreference = 'Stop'"));
  });

  it('should stop services one by one and fail at the end if any failed', () => {
    assert.strictEqual(
      buildStopServicesScript(['WSearch', 'SysMain']),
      [
        '$Error.Clear()',
        "foreach ($name in @('WSearch', 'SysMain')) {",
        '  Stop-Service -Name $name -Force -ErrorAction Continue',
        '}',
        'if ($Error.Count -gt 0) { exit 1 }',
        "'null'",
      ].join('\n')
    );
  });

  it('should start services one by one without stopping at a failure', () => {
    const script = buildStartServicesScript(['SysMain', 'Spooler']);

    assert.ok(script.includes('  Start-Service -Name $name -ErrorAction Continue\n'));
    assert.ok(!script.includes("$ErrorActionPreference = 'Stop'"));
  });

  it('should stop processes in the given order', () => {
    const script = buildStopProcessesScript(['B', 'A']);
    assert.ok(script.startsWith("foreach ($name in @('B', 'A')) {"));
    assert.ok(script.includes('Stop-Process -Force'));
  });

  it('should re-check each process right before launching it', () => {
    const script = buildStartProcessesScript([
      { name: 'Agent', executablePath: 'C:\\Program Files\\Vendor\\agent.exe' },
      { name: 'Helper', executablePath: 'C:\\Tools\\helper.exe' },
    ]);

    assert.strictEqual(
      script,
      [
        '$started = @()',
        '$failed = @()',
        "if (-not (Get-Process -Name 'Agent' -ErrorAction SilentlyContinue)) { try { Start-Process -FilePath 'C:\\Program Files\\Vendor\\agent.exe' -ErrorAction Stop; $started += 'Agent' } catch { $failed += @{ name = 'Agent'; message = $_.Exception.Message } } }",
        "if (-not (Get-Process -Name 'Helper' -ErrorAction SilentlyContinue)) { try { Start-Process -FilePath 'C:\\Tools\\helper.exe' -ErrorAction Stop; $started += 'Helper' } catch { $failed += @{ name = 'Helper'; message = $_.Exception.Message } } }",
        '@{ started = @($started); failed = @($failed) } | ConvertTo-Json -Depth 3',
      ].join('\n')
    );
  });

  it('should keep a failed launch from ending the batch', () => {
    const script = buildStartProcessesScript([{ name: 'A', executablePath: 'a.exe' }]);
    assert.ok(!script.includes("$ErrorActionPreference = 'Stop'"));
  });
});
