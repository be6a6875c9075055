export type { IInstaller, IInstallerContext } from './installer.js';
export { UrlInstaller } from './url-installer.js';
export { detectArchiveFormat, extractArchive, locateManifestDir, type ArchiveFormat } from './archive.js';
export { LocalInstaller, readManifestFile, MANIFEST_FILE } from './local-installer.js';
export { SourceControlInstaller } from './source-control-installer.js';
export { runCommand } from './command-runner.js';
export type { CommandRunner, CommandOptions, CommandResult } from './command-runner.js';
