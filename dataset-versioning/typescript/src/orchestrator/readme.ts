/**
 * README committed at the root of every dataset repository.
 */

export interface ReadmeDetails {
  datasetId: string;
  datasetName: string;
  tenant: string;
  fileCount: number;
  totalSize: number;
  sourceFile: string;
  dataRemoteUrl: string;
}

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${bytes} B` : `${value.toFixed(1)} ${units[unit]}`;
}

export function renderDatasetReadme(details: ReadmeDetails): string {
  return [
    `# ${details.datasetName}`,
    '',
    `- Dataset ID: \`${details.datasetId}\``,
    `- Tenant: \`${details.tenant}\``,
    `- Files: ${details.fileCount}`,
    `- Total size: ${formatBytes(details.totalSize)} (${details.totalSize} bytes)`,
    `- Source: \`${details.sourceFile}\``,
    `- Data remote: \`${details.dataRemoteUrl}\``,
    '',
    '## Usage',
    '',
    'The content of `data/` is tracked with DVC and stored in the data remote.',
    'Each version is an annotated git tag (`v1`, `v2`, ...).',
    '',
    '```bash',
    'git checkout <tag>',
    'dvc pull',
    '```',
    '',
  ].join('\n');
}
