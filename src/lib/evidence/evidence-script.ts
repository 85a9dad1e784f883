import type { ProductProfile } from '@/lib/probe/product-profile';

export const HOST_EVIDENCE_SCHEMA_VERSION = 'host-evidence-v1';

const UNINSTALL_ROOTS = [
  'HKLM:\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\Uninstall\\*',
  'HKLM:\\SOFTWARE\\WOW6432Node\\Microsoft\\Windows\\CurrentVersion\\Uninstall\\*',
];

/** PowerShell single-quoted literal. */
export function psQuote(value: string): string {
  return `'${value.replaceAll("'", "''")}'`;
}

function fileVersionBlock(filePath: string): string {
  return `$files[${psQuote(filePath)}] = Invoke-EvidenceSource {
    $info = (Get-Item -LiteralPath ${psQuote(filePath)} -ErrorAction Stop).VersionInfo
    if ($info.FileVersionRaw) { $info.FileVersionRaw.ToString() } else { [string]$info.FileVersion }
  }`;
}

/**
 * Script run in the target host's context. Emits one JSON evidence bundle; each source is
 * captured as `{ ok, value }` or `{ ok: false, error }` so a single failing read never aborts
 * the rest. Sub-sources are only read when at least two installer entries match.
 */
export function buildEvidenceScript(profile: ProductProfile): string {
  const registryValue = psQuote(profile.registry.value);
  const commandArgs = profile.command.args.map(psQuote).join(' ');
  const filePaths = [...profile.services, ...profile.drivers].map((b) => b.path);

  return `
$ErrorActionPreference = 'Stop'

function Invoke-EvidenceSource([scriptblock]$Block) {
  try {
    [pscustomobject]@{ ok = $true; value = (& $Block) }
  } catch {
    [pscustomobject]@{ ok = $false; error = $_.Exception.Message }
  }
}

$pattern = ${psQuote(profile.display_name_pattern)}
$installer = Invoke-EvidenceSource {
  $roots = @(${UNINSTALL_ROOTS.map(psQuote).join(', ')})
  ,@(Get-ItemProperty -Path $roots -ErrorAction SilentlyContinue |
    Where-Object { $_.DisplayName -like $pattern } |
    ForEach-Object {
      [pscustomobject]@{
        display_name = [string]$_.DisplayName
        display_version = if ($_.DisplayVersion) { [string]$_.DisplayVersion } else { $null }
        estimated_size = if ($_.EstimatedSize) { [int64]$_.EstimatedSize } else { $null }
      }
    })
}

$registry = $null
$command = $null
$files = [ordered]@{}

if ($installer.ok -and @($installer.value).Count -ge 2) {
  $registry = Invoke-EvidenceSource {
    [string](Get-ItemProperty -LiteralPath ${psQuote(profile.registry.key)} -Name ${registryValue} -ErrorAction Stop).${registryValue}
  }
  $command = Invoke-EvidenceSource {
    (& ${psQuote(profile.command.path)} ${commandArgs} 2>&1 | Out-String)
  }
  ${filePaths.map(fileVersionBlock).join('\n  ')}
}

[pscustomobject]@{
  schema_version = '${HOST_EVIDENCE_SCHEMA_VERSION}'
  installer_entries = $installer
  registry_version = $registry
  command_output = $command
  files = [pscustomobject]$files
} | ConvertTo-Json -Compress -Depth 6
`.trim();
}
